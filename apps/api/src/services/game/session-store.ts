// =====================================================
// Session Snapshot Store
// =====================================================
// Public match views kept after a session leaves memory, so
// GET /matches/:id and reconnecting clients can still read them.
// Redis-backed in production, Map-backed in tests and single-node dev.

import { z } from 'zod';
import { MatchStatus, MatchView } from '@triviaduel/shared-types';
import { config } from '../../config';
import * as cache from '../../lib/cache.service';
import type { CacheResult } from '../../lib/cache.service';

export interface SessionStore {
  save(view: MatchView): Promise<boolean>;
  load(matchId: string): Promise<CacheResult<MatchView>>;
}

const statsSchema = z.object({
  score: z.number(),
  correctAnswers: z.number(),
  totalAnswers: z.number(),
  totalResponseTimeMs: z.number(),
});

export const matchViewSchema = z.object({
  matchId: z.string(),
  players: z.tuple([z.string(), z.string()]),
  status: z.nativeEnum(MatchStatus),
  currentRound: z.number().int(),
  maxRounds: z.number().int(),
  stats: z.record(statsSchema),
  winner: z.string().nullable(),
  ratingDelta: z.record(z.number()).nullable(),
  startedAt: z.string(),
  endedAt: z.string().nullable(),
});

export function sessionKey(matchId: string): string {
  return `match:${matchId}`;
}

export class RedisSessionStore implements SessionStore {
  constructor(private readonly ttlSeconds: number = config.game.sessionSnapshotTtlSeconds) {}

  save(view: MatchView): Promise<boolean> {
    return cache.set(sessionKey(view.matchId), view, this.ttlSeconds);
  }

  load(matchId: string): Promise<CacheResult<MatchView>> {
    return cache.get(sessionKey(matchId), matchViewSchema);
  }
}

export class InMemorySessionStore implements SessionStore {
  private readonly views = new Map<string, MatchView>();

  async save(view: MatchView): Promise<boolean> {
    this.views.set(view.matchId, view);
    return true;
  }

  async load(matchId: string): Promise<CacheResult<MatchView>> {
    const view = this.views.get(matchId);
    return view ? { status: 'hit', value: view } : { status: 'miss' };
  }
}
