import type { Redis } from 'ioredis';
import { AppConfig, processingBudgetMs } from './app.config';
import { closeRedisClient, createRedisClient } from './redis';
import { buildQueueConnection } from './queue';
import { JobStore, RedisJobStore } from '../services/JobStore';
import { ContextBrokerClient, OrionContextBrokerClient } from '../services/ContextBrokerClient';
import { PredictionPublisher } from '../services/PredictionPublisher';
import { IntelligenceService } from '../services/IntelligenceService';
import { JobQueue } from '../jobs/JobQueue';
import { BullJobQueue } from '../jobs/BullJobQueue';
import { MemoryJobQueue } from '../jobs/MemoryJobQueue';
import { JobProcessor } from '../jobs/JobProcessor';
import { WorkerPool } from '../jobs/WorkerPool';
import { PluginRegistry, createDefaultRegistry } from '../plugins/PluginRegistry';
import { MetricsCollector } from '../utils/metrics';
import { MonotonicClock } from '../utils/clock';
import { logger } from '../utils/logger';

/**
 * Every long-lived client the API and the workers need, built once and
 * passed down explicitly.
 */
export interface ServiceContext {
  config: AppConfig;
  redis: Redis;
  store: JobStore;
  queue: JobQueue;
  registry: PluginRegistry;
  broker: ContextBrokerClient;
  publisher: PredictionPublisher;
  processor: JobProcessor;
  workers: WorkerPool;
  metrics: MetricsCollector;
  service: IntelligenceService;
  /** False when the Redis client was supplied by the caller, who then closes it. */
  ownsRedis: boolean;
}

export interface ServiceOverrides {
  redis?: Redis;
  queue?: JobQueue;
  broker?: ContextBrokerClient;
  registry?: PluginRegistry;
}

const createQueue = (config: AppConfig): JobQueue => {
  if (config.queue.driver === 'memory') {
    return new MemoryJobQueue({ visibilityTimeoutMs: config.queue.visibilityTimeoutMs });
  }
  return new BullJobQueue({
    name: config.queue.name,
    prefix: config.queue.prefix,
    connection: buildQueueConnection(config.redis),
    visibilityTimeoutMs: config.queue.visibilityTimeoutMs,
  });
};

export function createServiceContext(config: AppConfig, overrides: ServiceOverrides = {}): ServiceContext {
  const redis = overrides.redis ?? createRedisClient(config.redis);
  const store = new RedisJobStore(redis, {
    keyPrefix: config.jobs.keyPrefix,
    retentionSeconds: config.jobs.retentionSeconds,
  });
  const queue = overrides.queue ?? createQueue(config);
  const registry = overrides.registry ?? createDefaultRegistry();

  const broker =
    overrides.broker ??
    new OrionContextBrokerClient({
      baseUrl: config.broker.url,
      contextUrl: config.broker.contextUrl,
      timeoutMs: config.broker.timeoutMs,
    });
  const publisher = new PredictionPublisher(
    broker,
    {
      maxAttempts: config.broker.maxAttempts,
      backoffMs: config.broker.backoffMs,
      maxBackoffMs: config.broker.maxBackoffMs,
    },
    new MonotonicClock(),
  );

  const metrics = new MetricsCollector();
  // The lease covers the worst-case processing time, which config validation keeps below the visibility timeout.
  const processor = new JobProcessor(
    store,
    registry,
    publisher,
    { pluginTimeoutMs: config.jobs.pluginTimeoutMs, leaseMs: processingBudgetMs(config) },
    metrics,
  );
  const workers = new WorkerPool(queue, processor, {
    size: config.workers.count,
    dequeueTimeoutMs: config.queue.dequeueTimeoutMs,
    errorBackoffMs: config.workers.errorBackoffMs,
  });

  const service = new IntelligenceService(store, queue, registry, workers, metrics, {
    retryAttempts: config.intake.retryAttempts,
    retryBackoffMs: config.intake.retryBackoffMs,
  });

  logger.info(`📦 Service context ready (queue driver: ${config.queue.driver}, plugins: ${registry.list().length})`);

  return {
    config,
    redis,
    store,
    queue,
    registry,
    broker,
    publisher,
    processor,
    workers,
    metrics,
    service,
    ownsRedis: overrides.redis === undefined,
  };
}

/**
 * 🧹 Stop workers first, then the queue, then Redis.
 */
export async function closeServiceContext(context: ServiceContext): Promise<void> {
  await context.workers.stop();
  await context.queue.close();
  if (context.ownsRedis) {
    await closeRedisClient(context.redis);
  }
}
