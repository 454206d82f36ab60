// =====================================================
// Cache Service
// =====================================================
// Redis caching layer with an explicit degraded mode.
// Reads report 'hit', 'miss' or 'degraded' so callers pick their
// documented fallback instead of silently treating an outage as a miss.

import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../utils/logger';

// ===========================================
// Types
// ===========================================

export type CacheResult<T> =
  | { status: 'hit'; value: T }
  | { status: 'miss' }
  | { status: 'degraded'; reason: string };

export interface FetchResult<T> {
  value: T;
  source: 'cache' | 'origin';
  degraded: boolean;
}

interface CacheMetrics {
  hits: number;
  misses: number;
  errors: number;
}

// ===========================================
// Metrics (in-memory counters)
// ===========================================

const metrics: CacheMetrics = {
  hits: 0,
  misses: 0,
  errors: 0,
};

// ===========================================
// Redis Client Access
// ===========================================

/**
 * Get the Redis client for cache operations.
 * Uses lazy import to avoid circular dependencies.
 */
async function getRedis() {
  try {
    const { getRedisConnection } = await import('../queues/connection');
    return getRedisConnection();
  } catch (error) {
    logger.error('[Cache] Failed to get Redis connection:', error);
    return null;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ===========================================
// Cache Operations
// ===========================================

/**
 * Read and validate a cached value. A value that no longer matches the
 * schema counts as a miss.
 */
export async function get<T>(key: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<CacheResult<T>> {
  try {
    const redis = await getRedis();
    if (!redis) {
      metrics.errors++;
      return { status: 'degraded', reason: 'redis unavailable' };
    }

    const cached = await redis.get(key);

    if (cached === null) {
      metrics.misses++;
      logger.debug(`[Cache] cache_miss key=${key}`);
      return { status: 'miss' };
    }

    const parsed = schema.safeParse(JSON.parse(cached));
    if (!parsed.success) {
      metrics.misses++;
      logger.warn(`[Cache] cache_invalid key=${key}`);
      return { status: 'miss' };
    }

    metrics.hits++;
    logger.debug(`[Cache] cache_hit key=${key}`);
    return { status: 'hit', value: parsed.data };
  } catch (error) {
    metrics.errors++;
    logger.warn(`[Cache] cache_error key=${key} error=${errorMessage(error)}`);
    return { status: 'degraded', reason: errorMessage(error) };
  }
}

/**
 * Set a cached value with TTL. Returns false when the write did not land.
 */
export async function set<T>(key: string, value: T, ttlSeconds: number): Promise<boolean> {
  try {
    const redis = await getRedis();
    if (!redis) {
      metrics.errors++;
      return false;
    }

    await redis.setex(key, ttlSeconds, JSON.stringify(value));
    logger.debug(`[Cache] cache_set key=${key} ttl=${ttlSeconds}s`);
    return true;
  } catch (error) {
    metrics.errors++;
    logger.warn(`[Cache] cache_set_error key=${key} error=${errorMessage(error)}`);
    return false;
  }
}

/**
 * Delete a cached key. Returns false when Redis could not be reached.
 */
export async function del(key: string): Promise<boolean> {
  try {
    const redis = await getRedis();
    if (!redis) {
      return false;
    }

    await redis.del(key);
    logger.debug(`[Cache] cache_del key=${key}`);
    return true;
  } catch (error) {
    logger.warn(`[Cache] cache_del_error key=${key} error=${errorMessage(error)}`);
    return false;
  }
}

/**
 * Cache-aside: serve from cache, else call `fetcher` and cache the result.
 * `degraded` is true when Redis could not be consulted.
 */
export async function getOrFetch<T>(
  key: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  fetcher: () => Promise<T>,
  ttlSeconds: number
): Promise<FetchResult<T>> {
  const cached = await get(key, schema);
  if (cached.status === 'hit') {
    return { value: cached.value, source: 'cache', degraded: false };
  }

  const value = await fetcher();

  if (cached.status === 'miss') {
    await set(key, value, ttlSeconds);
  }

  return { value, source: 'origin', degraded: cached.status === 'degraded' };
}

/**
 * Get current cache metrics for monitoring.
 */
export function getCacheMetrics(): CacheMetrics {
  return { ...metrics };
}

/**
 * Reset cache metrics (for testing).
 */
export function resetCacheMetrics(): void {
  metrics.hits = 0;
  metrics.misses = 0;
  metrics.errors = 0;
}
