// =====================================================
// Redis Waiting Pool Test Suite
// =====================================================
// Script wiring and reply parsing against a mocked Redis client.

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RedisWaitingPool, POOL_KEY, SEQ_KEY } from './redis-waiting-pool';
import { TransientStoreError } from '../../utils/errors';

const mockRedis = {
  eval: vi.fn(),
  hget: vi.fn(),
  hgetall: vi.fn(),
  hdel: vi.fn(),
  hsetnx: vi.fn(),
};

vi.mock('../../queues/connection', () => ({
  getRedisConnection: () => mockRedis,
}));

function encoded(playerId: string, seq: number, lastSeen: number, rating = 1000): string {
  return JSON.stringify({ playerId, rating, joinTime: lastSeen, lastSeen, seq });
}

describe('RedisWaitingPool', () => {
  let pool: RedisWaitingPool;

  beforeEach(() => {
    vi.clearAllMocks();
    pool = new RedisWaitingPool(600);
  });

  it('upserts through the script and parses the stored entry', async () => {
    mockRedis.eval.mockResolvedValue(encoded('alice', 7, 5_000, 1200));

    const entry = await pool.upsert('alice', 1200, 5_000);

    expect(entry).toEqual({ playerId: 'alice', rating: 1200, joinTime: 5_000, lastSeen: 5_000, seq: 7 });
    expect(mockRedis.eval).toHaveBeenCalledWith(
      expect.any(String),
      2,
      POOL_KEY,
      SEQ_KEY,
      'alice',
      1200,
      5_000,
      600_000,
      600
    );
  });

  it('returns live entries in seq order and skips junk', async () => {
    mockRedis.hgetall.mockResolvedValue({
      bob: encoded('bob', 2, 100_000),
      alice: encoded('alice', 1, 100_000),
      stale: encoded('stale', 3, 0),
      broken: '{not json',
    });

    const snapshot = await pool.snapshot(650_000);

    expect(snapshot.map((e) => e.playerId)).toEqual(['alice', 'bob']);
  });

  it('claims a pair only when the script confirms both seqs', async () => {
    const alice = { playerId: 'alice', rating: 1000, joinTime: 0, lastSeen: 0, seq: 1 };
    const bob = { playerId: 'bob', rating: 1000, joinTime: 0, lastSeen: 0, seq: 2 };

    mockRedis.eval.mockResolvedValueOnce(1).mockResolvedValueOnce(0);

    expect(await pool.claimPair(alice, bob)).toBe(true);
    expect(await pool.claimPair(alice, bob)).toBe(false);
    expect(mockRedis.eval).toHaveBeenLastCalledWith(expect.any(String), 1, POOL_KEY, 'alice', 'bob', 1, 2);
  });

  it('treats an expired entry as absent', async () => {
    mockRedis.hget.mockResolvedValue(encoded('alice', 1, 0));

    expect(await pool.get('alice', 600_000)).toBeNull();
    expect(await pool.get('alice', 599_999)).not.toBeNull();
  });

  it('wraps Redis failures as transient store errors', async () => {
    mockRedis.hdel.mockRejectedValue(new Error('ECONNREFUSED'));

    await expect(pool.remove('alice')).rejects.toBeInstanceOf(TransientStoreError);
  });
});
