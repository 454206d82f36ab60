// =====================================================
// Rate Limiting Middleware
// =====================================================
// Fixed-window limits per client IP. Counters live in Redis so every
// instance shares them; the in-memory store is used in tests and
// single-instance development.

import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { RedisStore } from 'rate-limit-redis';
import { ApiResponse, ERROR_CODES } from '@triviaduel/shared-types';
import { getRedisConnection } from '../queues/connection';
import { logger } from '../utils/logger';

// ===========================================
// Types
// ===========================================

export type RateLimitStoreKind = 'redis' | 'memory';

export interface RateLimitConfig {
  windowMs: number;
  max: number;
  prefix: string;
  store: RateLimitStoreKind;
  message?: string;
}

type RedisReply = number | string | (number | string)[];

// ===========================================
// Redis Store Helper
// ===========================================

function toRedisReply(reply: unknown): RedisReply {
  if (typeof reply === 'number' || typeof reply === 'string') {
    return reply;
  }
  if (Array.isArray(reply)) {
    return reply.map((item) => (typeof item === 'number' ? item : String(item)));
  }
  throw new Error(`Unexpected Redis reply: ${String(reply)}`);
}

function createRedisStore(prefix: string): RedisStore | undefined {
  try {
    const client = getRedisConnection();
    return new RedisStore({
      sendCommand: async (...args: string[]) => {
        const [command, ...rest] = args;
        return toRedisReply(await client.call(command, ...rest));
      },
      prefix: `rl:${prefix}:`,
    });
  } catch (error) {
    logger.error(`[RateLimit] Redis store for "${prefix}" unavailable, using memory store:`, error);
    return undefined;
  }
}

// ===========================================
// Factory
// ===========================================

export function createRateLimiter(options: RateLimitConfig): RateLimitRequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.max,
    standardHeaders: true,
    legacyHeaders: false,
    store: options.store === 'redis' ? createRedisStore(options.prefix) : undefined,
    handler: (req, res) => {
      logger.warn(`[RateLimit] ${options.prefix} limit hit by ${req.ip ?? 'unknown'}`);
      const response: ApiResponse = {
        success: false,
        error: {
          code: ERROR_CODES.RATE_LIMITED,
          message: options.message ?? 'Too many requests. Please try again later.',
        },
        meta: {
          timestamp: new Date().toISOString(),
          requestId: req.id,
        },
      };
      res.status(429).json(response);
    },
  });
}
