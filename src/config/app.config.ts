import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const flag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  API_PREFIX: z.string().startsWith('/').default('/api/intelligence'),
  CORS_ORIGIN: z.string().default('*'),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(300),

  REDIS_HOST: z.string().default('127.0.0.1'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: z.string().optional(),

  QUEUE_DRIVER: z.enum(['bullmq', 'memory']).default('bullmq'),
  QUEUE_NAME: z.string().min(1).default('intelligence'),
  WORKER_COUNT: z.coerce.number().int().min(1).max(64).default(2),
  RUN_WORKERS_IN_API: flag,
  DEQUEUE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  VISIBILITY_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  PLUGIN_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  JOB_RETENTION_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),

  ORION_URL: z.string().url().default('http://orion-ld-service:1026'),
  CONTEXT_URL: z
    .string()
    .url()
    .default('https://uri.etsi.org/ngsi-ld/v1/ngsi-ld-core-context.jsonld'),
  BROKER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  BROKER_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(4),
  BROKER_BACKOFF_MS: z.coerce.number().int().nonnegative().default(500),
  BROKER_MAX_BACKOFF_MS: z.coerce.number().int().nonnegative().default(5000),

  INTAKE_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  INTAKE_RETRY_BACKOFF_MS: z.coerce.number().int().nonnegative().default(200),
});

export type QueueDriver = 'bullmq' | 'memory';

export interface RedisSettings {
  host: string;
  port: number;
  password?: string;
}

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  apiPrefix: string;
  corsOrigin: string;

  rateLimit: {
    windowMs: number;
    max: number;
  };

  redis: RedisSettings;

  queue: {
    driver: QueueDriver;
    name: string;
    prefix: string;
    dequeueTimeoutMs: number;
    visibilityTimeoutMs: number;
  };

  workers: {
    count: number;
    runInApi: boolean;
    errorBackoffMs: number;
  };

  jobs: {
    keyPrefix: string;
    retentionSeconds: number;
    pluginTimeoutMs: number;
  };

  broker: {
    url: string;
    contextUrl: string;
    timeoutMs: number;
    maxAttempts: number;
    backoffMs: number;
    maxBackoffMs: number;
  };

  intake: {
    retryAttempts: number;
    retryBackoffMs: number;
  };
}

/**
 * Worst-case time a worker can hold one delivery: the plugin budget plus
 * every broker attempt at its timeout and the longest back-off.
 */
export const processingBudgetMs = (config: AppConfig): number =>
  config.jobs.pluginTimeoutMs +
  config.broker.maxAttempts * (config.broker.timeoutMs + config.broker.maxBackoffMs);

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Parse and validate the environment. Throws `ConfigError` listing every
 * offending variable so a misconfigured deployment fails at startup.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const e = parsed.data;
  const config: AppConfig = {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    apiPrefix: e.API_PREFIX,
    corsOrigin: e.CORS_ORIGIN,

    rateLimit: {
      windowMs: 15 * 60 * 1000, // 15 minutes
      max: e.RATE_LIMIT_MAX,
    },

    redis: {
      host: e.REDIS_HOST,
      port: e.REDIS_PORT,
      password: e.REDIS_PASSWORD || undefined,
    },

    queue: {
      driver: e.QUEUE_DRIVER,
      name: e.QUEUE_NAME,
      prefix: 'bull',
      dequeueTimeoutMs: e.DEQUEUE_TIMEOUT_MS,
      visibilityTimeoutMs: e.VISIBILITY_TIMEOUT_MS,
    },

    workers: {
      count: e.WORKER_COUNT,
      runInApi: e.RUN_WORKERS_IN_API,
      errorBackoffMs: 1000,
    },

    jobs: {
      keyPrefix: 'intelligence:',
      retentionSeconds: e.JOB_RETENTION_SECONDS,
      pluginTimeoutMs: e.PLUGIN_TIMEOUT_MS,
    },

    broker: {
      url: e.ORION_URL.replace(/\/+$/, ''),
      contextUrl: e.CONTEXT_URL,
      timeoutMs: e.BROKER_TIMEOUT_MS,
      maxAttempts: e.BROKER_MAX_ATTEMPTS,
      backoffMs: e.BROKER_BACKOFF_MS,
      maxBackoffMs: e.BROKER_MAX_BACKOFF_MS,
    },

    intake: {
      retryAttempts: e.INTAKE_RETRY_ATTEMPTS,
      retryBackoffMs: e.INTAKE_RETRY_BACKOFF_MS,
    },
  };

  // A lease shorter than the processing budget would hand live work to a second worker.
  const budget = processingBudgetMs(config);
  if (config.queue.visibilityTimeoutMs <= budget) {
    throw new ConfigError(
      `VISIBILITY_TIMEOUT_MS (${config.queue.visibilityTimeoutMs}) must exceed the processing budget of ${budget}ms`,
    );
  }

  return config;
}
