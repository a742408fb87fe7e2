import { Delivery, Job, JobFailure, JobResult, JobTransition } from '../types';
import { JobStore } from '../services/JobStore';
import { PredictionPublisher } from '../services/PredictionPublisher';
import { PluginRegistry } from '../plugins/PluginRegistry';
import { runPlugin } from '../plugins/pluginRunner';
import {
  InvalidTransitionError,
  JobCancelledError,
  JobLeaseHeldError,
  JobNotFoundError,
  toJobFailure,
} from './errors';
import { JobOutcome, MetricsCollector } from '../utils/metrics';
import { logger } from '../utils/logger';

export interface JobProcessorOptions {
  pluginTimeoutMs: number;
  /** How long a claim protects a running job from a second claimant. */
  leaseMs: number;
}

/**
 * 🧠 Runs one delivery through claim → cancel check → plugin → publish →
 * terminal transition.
 *
 * Failures of the job itself end up in the record and resolve to
 * `'failed'`. Only infrastructure errors (store unreachable) are thrown,
 * leaving the delivery unacknowledged for redelivery.
 */
export class JobProcessor {
  constructor(
    private readonly store: JobStore,
    private readonly registry: PluginRegistry,
    private readonly publisher: PredictionPublisher,
    private readonly options: JobProcessorOptions,
    private readonly metrics: MetricsCollector = new MetricsCollector(),
  ) {}

  async process(delivery: Delivery, workerId: string): Promise<JobOutcome> {
    const job = await this.claim(delivery, workerId);
    if (job === 'skipped' || job === 'deferred') {
      this.metrics.recordOutcome(job);
      return job;
    }

    const startedAt = Date.now();
    let transition: JobTransition;
    try {
      const result = await this.execute(job);
      transition = { type: 'complete', result };
    } catch (error) {
      const failure: JobFailure = toJobFailure(error);
      logger.warn(`[Job ${job.id}] 💀 ${failure.kind}: ${failure.message}`);
      transition = { type: 'fail', error: failure };
    }

    const outcome = await this.finish(job, transition);
    this.metrics.recordOutcome(outcome);
    if (outcome !== 'skipped') {
      this.metrics.recordJobDuration(job.kind, Date.now() - startedAt);
    }
    return outcome;
  }

  private async claim(delivery: Delivery, workerId: string): Promise<Job | 'skipped' | 'deferred'> {
    try {
      const job = await this.store.transition(delivery.jobId, delivery.tenantId, {
        type: 'claim',
        workerId,
        leaseMs: this.options.leaseMs,
      });
      const redelivered = delivery.deliveryCount > 1 ? ` (delivery #${delivery.deliveryCount})` : '';
      logger.info(`[Job ${job.id}] 🚀 Claimed by ${workerId}${redelivered}`);
      return job;
    } catch (error) {
      if (error instanceof JobNotFoundError) {
        logger.warn(`[Job ${delivery.jobId}] ⚠️ Record missing or expired, dropping delivery`);
        return 'skipped';
      }
      if (error instanceof InvalidTransitionError) {
        logger.info(`[Job ${delivery.jobId}] ⏭️ Already ${error.from}, dropping duplicate delivery`);
        return 'skipped';
      }
      if (error instanceof JobLeaseHeldError) {
        logger.info(`[Job ${delivery.jobId}] ⏳ ${error.message}`);
        return 'deferred';
      }
      throw error;
    }
  }

  private async execute(job: Job): Promise<JobResult> {
    if (job.cancelRequested) {
      throw new JobCancelledError(job.id);
    }

    const plugin = this.registry.resolve(job.pluginName);
    const { historicalData, predictionHorizon } = job.payload;
    const forecast = await runPlugin(plugin, historicalData, predictionHorizon, this.options.pluginTimeoutMs);
    logger.info(`[Job ${job.id}] 🧮 ${plugin.name} produced ${forecast.predictions.length} points`);

    if (job.kind !== 'predict') {
      return { ...forecast };
    }

    const ack = await this.publisher.publish({
      tenantId: job.tenantId,
      entityId: job.payload.entityId,
      attribute: job.payload.attribute,
      forecast,
      sourceJobId: job.id,
    });
    return { ...forecast, brokerEntityId: ack.entityId, publishedAt: ack.generatedAt };
  }

  private async finish(job: Job, transition: JobTransition): Promise<JobOutcome> {
    try {
      const finished = await this.store.transition(job.id, job.tenantId, transition);
      logger.info(`[Job ${job.id}] 🎯 ${finished.status}`);
      return finished.status === 'completed' ? 'completed' : 'failed';
    } catch (error) {
      if (error instanceof InvalidTransitionError || error instanceof JobNotFoundError) {
        logger.warn(`[Job ${job.id}] ⚠️ Result discarded: ${error.message}`);
        return 'skipped';
      }
      throw error;
    }
  }
}
