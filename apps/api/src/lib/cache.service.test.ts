// =====================================================
// Cache Service Test Suite
// =====================================================
// Tests for the Redis caching layer with a mocked Redis client.

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import {
  get,
  set,
  del,
  getOrFetch,
  getCacheMetrics,
  resetCacheMetrics,
} from './cache.service';

// ===========================================
// Mock Redis Connection
// ===========================================

const mockRedis = {
  get: vi.fn(),
  setex: vi.fn(),
  del: vi.fn(),
};

vi.mock('../queues/connection', () => ({
  getRedisConnection: () => mockRedis,
}));

const ratingSchema = z.object({ rating: z.number(), gamesPlayed: z.number() });

// ===========================================
// Test Setup
// ===========================================

beforeEach(() => {
  vi.clearAllMocks();
  resetCacheMetrics();
});

afterEach(() => {
  vi.resetAllMocks();
});

// ===========================================
// Test: get()
// ===========================================

describe('get', () => {
  it('returns a hit with the parsed value', async () => {
    const testData = { rating: 1240, gamesPlayed: 31 };
    mockRedis.get.mockResolvedValue(JSON.stringify(testData));

    const result = await get('rating:player:p1', ratingSchema);

    expect(result).toEqual({ status: 'hit', value: testData });
    expect(mockRedis.get).toHaveBeenCalledWith('rating:player:p1');
    expect(getCacheMetrics().hits).toBe(1);
  });

  it('returns a miss when the key is absent', async () => {
    mockRedis.get.mockResolvedValue(null);

    const result = await get('rating:player:missing', ratingSchema);

    expect(result).toEqual({ status: 'miss' });
    expect(getCacheMetrics().misses).toBe(1);
  });

  it('treats a value that fails the schema as a miss', async () => {
    mockRedis.get.mockResolvedValue(JSON.stringify({ rating: 'high' }));

    const result = await get('rating:player:stale', ratingSchema);

    expect(result).toEqual({ status: 'miss' });
  });

  it('reports degraded mode on Redis failure', async () => {
    mockRedis.get.mockRejectedValue(new Error('Connection refused'));

    const result = await get('rating:player:p1', ratingSchema);

    expect(result).toEqual({ status: 'degraded', reason: 'Connection refused' });
    expect(getCacheMetrics().errors).toBe(1);
  });
});

// ===========================================
// Test: set() / del()
// ===========================================

describe('set', () => {
  it('writes JSON with TTL', async () => {
    mockRedis.setex.mockResolvedValue('OK');

    const written = await set('rating:player:p1', { rating: 1000, gamesPlayed: 0 }, 300);

    expect(written).toBe(true);
    expect(mockRedis.setex).toHaveBeenCalledWith(
      'rating:player:p1',
      300,
      '{"rating":1000,"gamesPlayed":0}'
    );
  });

  it('returns false on Redis error', async () => {
    mockRedis.setex.mockRejectedValue(new Error('Connection refused'));

    await expect(set('rating:player:p1', { rating: 1 }, 300)).resolves.toBe(false);
    expect(getCacheMetrics().errors).toBe(1);
  });
});

describe('del', () => {
  it('deletes the key', async () => {
    mockRedis.del.mockResolvedValue(1);

    await expect(del('rating:player:p1')).resolves.toBe(true);
    expect(mockRedis.del).toHaveBeenCalledWith('rating:player:p1');
  });

  it('returns false on Redis error', async () => {
    mockRedis.del.mockRejectedValue(new Error('Connection refused'));

    await expect(del('rating:player:p1')).resolves.toBe(false);
  });
});

// ===========================================
// Test: getOrFetch()
// ===========================================

describe('getOrFetch', () => {
  it('serves a hit without calling the fetcher', async () => {
    mockRedis.get.mockResolvedValue(JSON.stringify({ rating: 1500, gamesPlayed: 40 }));
    const fetcher = vi.fn().mockResolvedValue({ rating: 1000, gamesPlayed: 0 });

    const result = await getOrFetch('rating:player:p1', ratingSchema, fetcher, 300);

    expect(result).toEqual({ value: { rating: 1500, gamesPlayed: 40 }, source: 'cache', degraded: false });
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('fetches and caches on a miss', async () => {
    mockRedis.get.mockResolvedValue(null);
    mockRedis.setex.mockResolvedValue('OK');
    const fetcher = vi.fn().mockResolvedValue({ rating: 1320, gamesPlayed: 12 });

    const result = await getOrFetch('rating:player:p2', ratingSchema, fetcher, 300);

    expect(result).toEqual({ value: { rating: 1320, gamesPlayed: 12 }, source: 'origin', degraded: false });
    expect(mockRedis.setex).toHaveBeenCalledWith('rating:player:p2', 300, '{"rating":1320,"gamesPlayed":12}');
  });

  it('falls through to the fetcher and flags degraded mode when Redis is down', async () => {
    mockRedis.get.mockRejectedValue(new Error('Connection refused'));
    const fetcher = vi.fn().mockResolvedValue({ rating: 1100, gamesPlayed: 3 });

    const result = await getOrFetch('rating:player:p3', ratingSchema, fetcher, 300);

    expect(result).toEqual({ value: { rating: 1100, gamesPlayed: 3 }, source: 'origin', degraded: true });
    expect(mockRedis.setex).not.toHaveBeenCalled();
  });
});

// ===========================================
// Test: getCacheMetrics()
// ===========================================

describe('getCacheMetrics', () => {
  it('tracks hits, misses, and errors', async () => {
    mockRedis.get
      .mockResolvedValueOnce(JSON.stringify({ rating: 1, gamesPlayed: 1 }))
      .mockResolvedValueOnce(null)
      .mockRejectedValueOnce(new Error('fail'));

    await get('key1', ratingSchema);
    await get('key2', ratingSchema);
    await get('key3', ratingSchema);

    expect(getCacheMetrics()).toEqual({ hits: 1, misses: 1, errors: 1 });
  });
});
