// =====================================================
// Redis Waiting Pool
// =====================================================
// Shared pool for multi-instance deployments.
//
// KEYS:
// - matchmaking:players  hash playerId -> JSON WaitingEntry
// - matchmaking:seq      insertion counter
//
// Upsert, claim and purge are Lua scripts so each is a single atomic step
// on the Redis server. Per-entry expiry is by lastSeen; the hash TTL is
// refreshed on every upsert so an abandoned pool disappears on its own.

import { z } from 'zod';
import { config } from '../../config';
import { getRedisConnection } from '../../queues/connection';
import { logger } from '../../utils/logger';
import { TransientStoreError } from '../../utils/errors';
import { isExpired, WaitingEntry, WaitingPool } from './waiting-pool';

export const POOL_KEY = 'matchmaking:players';
export const SEQ_KEY = 'matchmaking:seq';

const waitingEntrySchema = z.object({
  playerId: z.string(),
  rating: z.number(),
  joinTime: z.number(),
  lastSeen: z.number(),
  seq: z.number().int(),
});

// ===========================================
// Scripts
// ===========================================

const UPSERT_LUA = `
local poolKey = KEYS[1]
local seqKey = KEYS[2]
local playerId = ARGV[1]
local rating = tonumber(ARGV[2])
local now = tonumber(ARGV[3])
local ttlMs = tonumber(ARGV[4])
local ttlSeconds = tonumber(ARGV[5])
local raw = redis.call('HGET', poolKey, playerId)
local entry
if raw then
  entry = cjson.decode(raw)
  if now - entry.lastSeen < ttlMs then
    entry.rating = rating
    entry.lastSeen = now
  else
    entry = nil
  end
end
if not entry then
  local seq = redis.call('INCR', seqKey)
  entry = { playerId = playerId, rating = rating, joinTime = now, lastSeen = now, seq = seq }
end
local encoded = cjson.encode(entry)
redis.call('HSET', poolKey, playerId, encoded)
redis.call('EXPIRE', poolKey, ttlSeconds)
return encoded
`;

const CLAIM_PAIR_LUA = `
local poolKey = KEYS[1]
local first = redis.call('HGET', poolKey, ARGV[1])
local second = redis.call('HGET', poolKey, ARGV[2])
if not first or not second then
  return 0
end
if cjson.decode(first).seq ~= tonumber(ARGV[3]) or cjson.decode(second).seq ~= tonumber(ARGV[4]) then
  return 0
end
redis.call('HDEL', poolKey, ARGV[1], ARGV[2])
return 1
`;

const PURGE_LUA = `
local poolKey = KEYS[1]
local now = tonumber(ARGV[1])
local ttlMs = tonumber(ARGV[2])
local fields = redis.call('HGETALL', poolKey)
local removed = 0
for i = 1, #fields, 2 do
  local entry = cjson.decode(fields[i + 1])
  if now - entry.lastSeen >= ttlMs then
    redis.call('HDEL', poolKey, fields[i])
    removed = removed + 1
  end
end
return removed
`;

// ===========================================
// Pool
// ===========================================

function parseEntry(raw: string): WaitingEntry | null {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    logger.warn('[Matchmaking] Unreadable pool entry skipped:', error);
    return null;
  }
  const parsed = waitingEntrySchema.safeParse(decoded);
  return parsed.success ? parsed.data : null;
}

export class RedisWaitingPool implements WaitingPool {
  private readonly ttlMs: number;

  constructor(private readonly ttlSeconds: number = config.matchmaking.poolTtlSeconds) {
    this.ttlMs = ttlSeconds * 1000;
  }

  async upsert(playerId: string, rating: number, now: number = Date.now()): Promise<WaitingEntry> {
    const raw = await this.run('upsert', (redis) =>
      redis.eval(UPSERT_LUA, 2, POOL_KEY, SEQ_KEY, playerId, rating, now, this.ttlMs, this.ttlSeconds)
    );
    const entry = typeof raw === 'string' ? parseEntry(raw) : null;
    if (!entry) {
      throw new TransientStoreError('matchmaking pool', new Error(`unexpected upsert reply for ${playerId}`));
    }
    return entry;
  }

  async remove(playerId: string): Promise<boolean> {
    const removed = await this.run('remove', (redis) => redis.hdel(POOL_KEY, playerId));
    return removed > 0;
  }

  async get(playerId: string, now: number = Date.now()): Promise<WaitingEntry | null> {
    const raw = await this.run('get', (redis) => redis.hget(POOL_KEY, playerId));
    const entry = raw === null ? null : parseEntry(raw);
    return entry && !isExpired(entry, this.ttlMs, now) ? entry : null;
  }

  async snapshot(now: number = Date.now()): Promise<WaitingEntry[]> {
    const all = await this.run('snapshot', (redis) => redis.hgetall(POOL_KEY));
    const live: WaitingEntry[] = [];
    for (const raw of Object.values(all)) {
      const entry = parseEntry(raw);
      if (entry && !isExpired(entry, this.ttlMs, now)) {
        live.push(entry);
      }
    }
    return live.sort((a, b) => a.seq - b.seq);
  }

  async claimPair(first: WaitingEntry, second: WaitingEntry): Promise<boolean> {
    if (first.playerId === second.playerId) {
      return false;
    }
    const claimed = await this.run('claim', (redis) =>
      redis.eval(CLAIM_PAIR_LUA, 1, POOL_KEY, first.playerId, second.playerId, first.seq, second.seq)
    );
    return claimed === 1;
  }

  async restore(entries: WaitingEntry[]): Promise<void> {
    await this.run('restore', async (redis) => {
      for (const entry of entries) {
        await redis.hsetnx(POOL_KEY, entry.playerId, JSON.stringify(entry));
      }
    });
  }

  async size(now: number = Date.now()): Promise<number> {
    return (await this.snapshot(now)).length;
  }

  async purgeExpired(now: number = Date.now()): Promise<number> {
    const removed = await this.run('purge', (redis) => redis.eval(PURGE_LUA, 1, POOL_KEY, now, this.ttlMs));
    return typeof removed === 'number' ? removed : 0;
  }

  private async run<T>(operation: string, task: (redis: ReturnType<typeof getRedisConnection>) => Promise<T>): Promise<T> {
    try {
      return await task(getRedisConnection());
    } catch (error) {
      logger.warn(`[Matchmaking] Pool ${operation} failed:`, error);
      throw new TransientStoreError('matchmaking pool', error);
    }
  }
}
