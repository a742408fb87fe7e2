// config/redis.ts
import Redis, { RedisOptions } from 'ioredis';
import { RedisSettings } from './app.config';
import { logger } from '../utils/logger';

/**
 * 🧩 Centralized Redis options.
 * Used by the job store, the rate limiter and (with overrides) BullMQ.
 */
export const buildRedisOptions = (settings: RedisSettings): RedisOptions => ({
  host: settings.host,
  port: settings.port,
  password: settings.password,
  maxRetriesPerRequest: 3,
  connectTimeout: 10_000, // 10 seconds
  keepAlive: 30_000, // keep TCP socket alive
  enableReadyCheck: true,
  lazyConnect: false,
  retryStrategy: (times: number) => {
    const delay = Math.min(times * 200, 3000);
    logger.warn(`Redis reconnect attempt #${times}, retrying in ${delay}ms`);
    return delay;
  },
});

/**
 * 🔄 Create a Redis client with observability listeners attached.
 * The caller owns the client and closes it with `closeRedisClient`.
 */
export const createRedisClient = (settings: RedisSettings): Redis => {
  const client = new Redis(buildRedisOptions(settings));

  // ---- Event listeners for better observability ---- //
  client.on('connect', () => logger.info('✅ Redis connected successfully'));
  client.on('ready', () => logger.info('🔁 Redis connection is ready for use'));
  client.on('reconnecting', (time: number) => logger.warn(`⚠️ Redis reconnecting in ${time}ms`));
  client.on('error', (err: Error) => logger.error(`💥 Redis connection error: ${err.message}`));
  client.on('end', () => logger.warn('🛑 Redis connection closed'));

  return client;
};

/**
 * 🧹 Gracefully close a Redis client during shutdown.
 */
export const closeRedisClient = async (client: Redis): Promise<void> => {
  if (client.status !== 'end') {
    await client.quit();
    logger.info('🔒 Redis client closed gracefully');
  }
};
