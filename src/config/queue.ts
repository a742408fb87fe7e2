import { RedisOptions } from 'ioredis';
import { RedisSettings } from './app.config';
import { buildRedisOptions } from './redis';

// BullMQ requires blocking-safe connections.
export const buildQueueConnection = (settings: RedisSettings): RedisOptions => ({
  ...buildRedisOptions(settings),
  maxRetriesPerRequest: null,
});
