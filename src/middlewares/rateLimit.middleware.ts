import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import RedisStore, { RedisReply } from 'rate-limit-redis';
import type { Redis } from 'ioredis';
import { logger } from '../utils/logger';

export interface RateLimitOptions {
  windowMs: number;
  limit: number;
  /** Share counters across instances through Redis; in-memory otherwise. */
  redis?: Redis;
  prefix?: string;
}

/**
 * 🏗 Redis store for rate limiting, bridged to ioredis through `call`.
 */
function createRateLimitStore(redis: Redis, prefix: string): RedisStore {
  return new RedisStore({
    prefix,
    sendCommand: async (command: string, ...args: string[]): Promise<RedisReply> => {
      try {
        const result = await redis.call(command, ...args);
        return result as RedisReply;
      } catch (err) {
        logger.error(`Redis sendCommand error: ${err instanceof Error ? err.message : String(err)}`);
        throw err;
      }
    },
  });
}

/**
 * 🚀 Per-IP rate limiter for the public API.
 */
export const createRateLimitMiddleware = (options: RateLimitOptions): RateLimitRequestHandler =>
  rateLimit({
    store: options.redis ? createRateLimitStore(options.redis, options.prefix ?? 'rl:') : undefined,
    windowMs: options.windowMs,
    limit: options.limit,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      logger.warn(`🚫 Rate limit exceeded for IP: ${req.ip}`);
      res.status(429).json({
        success: false,
        message: 'Too many requests. Please wait before retrying.',
      });
    },
  });
