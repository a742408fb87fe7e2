import { Job as BullJob, Queue, Worker } from 'bullmq';
import { RedisOptions } from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { Delivery, JobRef, QueueStats } from '../types';
import { JobQueue } from './JobQueue';
import { BULLMQ_CONSTANTS } from '../utils/constants';
import { logger } from '../utils/logger';
import { errorMessage, sleep } from '../utils/retry';

export interface BullJobQueueOptions {
  name: string;
  prefix: string;
  connection: RedisOptions;
  /** Lock duration: how long a delivery stays invisible without an ack. */
  visibilityTimeoutMs: number;
  pollIntervalMs?: number;
  maxStalledCount?: number;
}

/**
 * 🧠 BullMQ driver.
 *
 * Jobs are fetched manually (`getNextJob` with a per-delivery token) so
 * the worker pool owns the loop. An unacknowledged job keeps its lock
 * until `visibilityTimeoutMs`; the stalled-job checker then moves it back
 * to the wait list for another worker.
 */
export class BullJobQueue implements JobQueue {
  private readonly queue: Queue<JobRef>;
  private readonly consumer: Worker<JobRef>;
  private readonly inflight = new Map<string, BullJob<JobRef>>();
  private readonly pollIntervalMs: number;
  private stalledCheckStarted = false;

  constructor(private readonly options: BullJobQueueOptions) {
    this.pollIntervalMs = options.pollIntervalMs ?? 250;

    this.queue = new Queue<JobRef>(options.name, {
      connection: options.connection,
      prefix: options.prefix,
      defaultJobOptions: {
        removeOnComplete: { age: 3600, count: 1000 },
        removeOnFail: { age: 86400, count: 500 },
      },
    });

    this.consumer = new Worker<JobRef>(options.name, null, {
      connection: options.connection,
      prefix: options.prefix,
      autorun: false,
      lockDuration: options.visibilityTimeoutMs,
      stalledInterval: Math.max(1000, Math.floor(options.visibilityTimeoutMs / 2)),
      maxStalledCount: options.maxStalledCount ?? 100,
    });

    this.consumer.on('stalled', (jobId: string) =>
      logger.warn(`[Job ${jobId}] 🚧 Stalled, returned to the queue for redelivery`),
    );
    this.consumer.on('error', (err: Error) => logger.error(`⚠️ Queue consumer error: ${err.message}`));

    logger.info(`✅ Queue "${options.name}" initialized.`);
  }

  async enqueue(ref: JobRef): Promise<void> {
    // Our job id doubles as the BullMQ id, so re-enqueueing the same job is a no-op.
    await this.queue.add(BULLMQ_CONSTANTS.JOBS.PROCESS_JOB, ref, {
      jobId: ref.jobId,
      priority: toBullPriority(ref.priority),
    });
  }

  async dequeue(timeoutMs: number): Promise<Delivery | null> {
    await this.ensureStalledChecker();

    const token = uuidv4();
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const job: BullJob<JobRef> | undefined = await this.consumer.getNextJob(token, { block: false });
      if (job) {
        this.inflight.set(token, job);
        return {
          deliveryId: token,
          jobId: job.data.jobId,
          tenantId: job.data.tenantId,
          deliveryCount: job.stalledCounter + 1,
        };
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) return null;
      await sleep(Math.min(this.pollIntervalMs, remaining));
    }
  }

  async ack(delivery: Delivery): Promise<void> {
    const job = this.inflight.get(delivery.deliveryId);
    if (!job) return;
    this.inflight.delete(delivery.deliveryId);

    try {
      await job.moveToCompleted('acknowledged', delivery.deliveryId, false);
    } catch (error) {
      // Lock lost: the job was already handed to another worker, whose ack settles it.
      logger.warn(`[Job ${delivery.jobId}] ⚠️ Ack rejected by BullMQ: ${errorMessage(error)}`);
    }
  }

  async abandon(delivery: Delivery): Promise<void> {
    this.inflight.delete(delivery.deliveryId);
  }

  /**
   * 📊 Basic counts for the health endpoint.
   */
  async stats(): Promise<QueueStats> {
    const counts = await this.queue.getJobCounts('waiting', 'prioritized', 'active', 'completed', 'failed');
    return {
      waiting: (counts.waiting ?? 0) + (counts.prioritized ?? 0),
      active: counts.active ?? 0,
      completed: counts.completed ?? 0,
      failed: counts.failed ?? 0,
    };
  }

  /**
   * 🧹 Close consumer and producer connections.
   */
  async close(): Promise<void> {
    await this.consumer.close();
    await this.queue.close();
    this.inflight.clear();
    logger.info(`🧹 Queue "${this.options.name}" closed.`);
  }

  private async ensureStalledChecker(): Promise<void> {
    if (this.stalledCheckStarted) return;
    this.stalledCheckStarted = true;
    await this.consumer.startStalledCheckTimer();
  }
}

/**
 * Our priority is "higher is more urgent"; BullMQ's is "1 is most urgent".
 * Every job gets an explicit priority so ordering stays consistent.
 */
export const toBullPriority = (priority: number): number =>
  Math.min(BULLMQ_CONSTANTS.MAX_PRIORITY, Math.max(1, BULLMQ_CONSTANTS.PRIORITY_BASE - priority));
