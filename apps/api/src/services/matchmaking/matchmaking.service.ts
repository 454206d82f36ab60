// =====================================================
// Matchmaking Service
// =====================================================
// Queue operations exposed to HTTP and the socket router.
// A store outage during formation defers pairing: the player stays
// queued and the next poll or a later enqueue tries again.

import type { EnqueueResponse, QueueStatusResponse } from '@triviaduel/shared-types';
import { logger } from '../../utils/logger';
import { ConflictError, TransientStoreError } from '../../utils/errors';
import type { WaitingEntry, WaitingPool } from './waiting-pool';
import type { MatchFormationService } from './match-formation.service';

export interface MatchmakingDeps {
  pool: WaitingPool;
  formation: MatchFormationService;
  activeMatchOf: (playerId: string) => string | null;
  now?: () => number;
}

export class MatchmakingService {
  private readonly now: () => number;

  constructor(private readonly deps: MatchmakingDeps) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * Insert or refresh the player's pool entry.
   * @throws ConflictError while the player is in a live match
   */
  async enqueue(playerId: string, rating: number): Promise<WaitingEntry> {
    const activeMatchId = this.deps.activeMatchOf(playerId);
    if (activeMatchId) {
      throw new ConflictError(`Player ${playerId} is already in match ${activeMatchId}`);
    }
    return this.deps.pool.upsert(playerId, rating, this.now());
  }

  /** No-op when the player is not queued. */
  async dequeue(playerId: string): Promise<boolean> {
    const removed = await this.deps.pool.remove(playerId);
    if (removed) {
      logger.info(`[Matchmaking] ${playerId} left the queue`);
    }
    return removed;
  }

  /**
   * Enqueue, then try to pair immediately.
   */
  async requestMatch(playerId: string, rating: number): Promise<EnqueueResponse> {
    await this.enqueue(playerId, rating);

    try {
      const result = await this.deps.formation.tryForm(playerId);

      switch (result.status) {
        case 'matched':
          return { status: 'matched', matchId: result.matchId, opponentId: result.opponent.playerId };
        case 'claimed': {
          // A racing request paired us; its session may already be registered
          const matchId = this.deps.activeMatchOf(playerId);
          return matchId ? { status: 'matched', matchId } : { status: 'queued' };
        }
        case 'queued':
          return { status: 'queued' };
      }
    } catch (error) {
      if (error instanceof TransientStoreError) {
        logger.warn(`[Matchmaking] Formation deferred for ${playerId}: ${error.message}`);
        return { status: 'queued' };
      }
      throw error;
    }
  }

  async status(playerId: string): Promise<QueueStatusResponse> {
    const now = this.now();
    const [entry, poolSize] = await Promise.all([
      this.deps.pool.get(playerId, now),
      this.deps.pool.size(now),
    ]);

    return {
      waiting: entry !== null,
      rating: entry ? entry.rating : null,
      waitTimeMs: entry ? now - entry.joinTime : null,
      poolSize,
      activeMatchId: this.deps.activeMatchOf(playerId),
    };
  }

  async poolSize(): Promise<number> {
    return this.deps.pool.size(this.now());
  }

  async purgeExpired(): Promise<number> {
    const purged = await this.deps.pool.purgeExpired(this.now());
    if (purged > 0) {
      logger.info(`[Matchmaking] Purged ${purged} expired pool entries`);
    }
    return purged;
  }
}
