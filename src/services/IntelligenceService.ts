import { HealthReport, Job, NewJob, PluginInfo } from '../types';
import { JobStore } from './JobStore';
import { JobQueue } from '../jobs/JobQueue';
import { WorkerPool } from '../jobs/WorkerPool';
import { PluginRegistry } from '../plugins/PluginRegistry';
import { MetricsCollector } from '../utils/metrics';
import { ApiError, ServiceUnavailableError } from '../middlewares/errorHandler.middleware';
import { logger } from '../utils/logger';
import { errorMessage, withRetry } from '../utils/retry';

export interface IntakeRetryOptions {
  retryAttempts: number;
  retryBackoffMs: number;
}

// Client errors are final; anything else is treated as a transient infrastructure fault.
const isClientError = (error: unknown): boolean => error instanceof ApiError && error.statusCode < 500;

/**
 * Service behind the REST API: creates, enqueues, reads and cancels jobs.
 * Store and queue calls are retried with backoff before surfacing a 503.
 */
export class IntelligenceService {
  constructor(
    private readonly store: JobStore,
    private readonly queue: JobQueue,
    private readonly registry: PluginRegistry,
    private readonly workers: WorkerPool | null,
    private readonly metrics: MetricsCollector,
    private readonly options: IntakeRetryOptions,
  ) {}

  /**
   * Persist a new job and hand its reference to the queue.
   * The plugin name is not checked here; an unknown plugin fails the job
   * once a worker picks it up.
   */
  async submitJob(input: NewJob): Promise<Job> {
    const job = await this.withIntakeRetry(`create ${input.kind} job`, () => this.store.create(input));

    try {
      await this.withIntakeRetry(`enqueue job ${job.id}`, () =>
        this.queue.enqueue({ jobId: job.id, tenantId: job.tenantId, priority: job.payload.priority }),
      );
    } catch (error) {
      // The record stays pending; recoverPendingJobs re-enqueues it on the next start.
      logger.error(`[Job ${job.id}] 💥 Created but not enqueued: ${errorMessage(error)}`);
      throw error;
    }

    logger.info(`[Job ${job.id}] 🧩 ${job.kind} job queued (plugin ${job.pluginName}, priority ${job.payload.priority})`);
    return job;
  }

  async getJob(tenantId: string, jobId: string): Promise<Job> {
    return this.withIntakeRetry(`read job ${jobId}`, () => this.store.get(jobId, tenantId));
  }

  /**
   * Flag a job for cancellation. A worker that has not started the job yet
   * fails it as `Cancelled`; running plugins are not interrupted.
   */
  async cancelJob(tenantId: string, jobId: string): Promise<Job> {
    const job = await this.withIntakeRetry(`cancel job ${jobId}`, () => this.store.requestCancel(jobId, tenantId));
    logger.info(`🛑 Job ${jobId} cancellation requested by tenant ${tenantId}`);
    return job;
  }

  async listPendingJobs(tenantId: string): Promise<Job[]> {
    return this.withIntakeRetry('list pending jobs', () => this.store.listPending(tenantId));
  }

  listPlugins(): PluginInfo[] {
    return this.registry.list();
  }

  async getHealth(): Promise<HealthReport> {
    let store = false;
    try {
      store = await this.store.ping();
    } catch (error) {
      logger.warn(`⚠️ Health check: store unreachable (${errorMessage(error)})`);
    }

    let queue: HealthReport['checks']['queue'] = null;
    try {
      queue = await this.queue.stats();
    } catch (error) {
      logger.warn(`⚠️ Health check: queue unreachable (${errorMessage(error)})`);
    }

    return {
      status: store && queue !== null ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks: {
        store,
        queue,
        workers: this.workers?.isRunning ? this.workers.size : 0,
        jobs: this.metrics.snapshot(),
      },
    };
  }

  /**
   * Re-enqueue every pending job. Covers jobs whose enqueue failed and an
   * in-memory queue that did not survive a restart.
   */
  async recoverPendingJobs(): Promise<number> {
    const pending = await this.store.listPending();
    for (const job of pending) {
      await this.queue.enqueue({ jobId: job.id, tenantId: job.tenantId, priority: job.payload.priority });
    }
    if (pending.length > 0) {
      logger.info(`♻️ Re-enqueued ${pending.length} pending job(s)`);
    }
    return pending.length;
  }

  private async withIntakeRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(() => fn(), {
        maxAttempts: this.options.retryAttempts,
        initialDelayMs: this.options.retryBackoffMs,
        maxDelayMs: this.options.retryBackoffMs * 8,
        shouldRetry: (error) => !isClientError(error),
        onRetry: (error, attempt, delayMs) =>
          logger.warn(`⚠️ Could not ${operation} (attempt ${attempt}): ${errorMessage(error)}; retrying in ${delayMs}ms`),
      });
    } catch (error) {
      if (isClientError(error)) throw error;
      throw new ServiceUnavailableError(`Could not ${operation}: ${errorMessage(error)}`);
    }
  }
}
