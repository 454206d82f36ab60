// =====================================================
// Match Formation
// =====================================================
// Turns a selector result into "remove both, create session".
// CRITICAL: this is the one place where concurrent requests contend.
// Both entries are removed with a single compare-and-delete; a lost race
// re-reads the pool and re-selects, up to maxAttempts.
// Once the session exists, both players' entries are cleared again: a
// player who re-enqueued while it was being created must not stay
// selectable.

import { logger } from '../../utils/logger';
import { ConcurrencyConflictError, PlayerInMatchError } from '../../utils/errors';
import type { WaitingEntry, WaitingPool } from './waiting-pool';
import {
  findOpponent,
  DEFAULT_SELECTOR_OPTIONS,
  SelectorOptions,
} from './opponent-selector';

// ===========================================
// Types
// ===========================================

export type SessionFactory = (first: WaitingEntry, second: WaitingEntry) => Promise<string>;

export type FormationResult =
  | { status: 'matched'; matchId: string; self: WaitingEntry; opponent: WaitingEntry; attempts: number }
  | { status: 'queued'; reason: 'no_candidate' | 'contention'; attempts: number }
  | { status: 'claimed'; attempts: number }; // a racing request already paired us

type OpenResult =
  | { status: 'opened'; matchId: string }
  | { status: 'busy'; busy: ReadonlyMap<string, string> };

export interface MatchFormationOptions {
  maxAttempts: number;
  selector: SelectorOptions;
  now: () => number;
}

// ===========================================
// Service
// ===========================================

export class MatchFormationService {
  private readonly options: MatchFormationOptions;

  constructor(
    private readonly pool: WaitingPool,
    private readonly createSession: SessionFactory,
    options: Partial<MatchFormationOptions> = {}
  ) {
    this.options = {
      maxAttempts: options.maxAttempts ?? 3,
      selector: options.selector ?? DEFAULT_SELECTOR_OPTIONS,
      now: options.now ?? Date.now,
    };
  }

  /**
   * Try to pair a player who is already in the pool.
   */
  async tryForm(playerId: string): Promise<FormationResult> {
    let attempts = 0;

    while (attempts < this.options.maxAttempts) {
      attempts++;
      const now = this.options.now();
      const snapshot = await this.pool.snapshot(now);

      const self = snapshot.find((entry) => entry.playerId === playerId);
      if (!self) {
        return { status: 'claimed', attempts };
      }

      const candidate = findOpponent(snapshot, self, now, this.options.selector);
      if (!candidate) {
        return { status: 'queued', reason: 'no_candidate', attempts };
      }

      try {
        await this.claim(self, candidate.entry);
      } catch (error) {
        if (error instanceof ConcurrencyConflictError) {
          logger.debug(
            `[Matchmaking] Claim conflict for ${playerId} vs ${candidate.entry.playerId} (attempt ${attempts})`
          );
          continue;
        }
        throw error;
      }

      const opened = await this.openSession(self, candidate.entry);
      if (opened.status === 'busy') {
        if (opened.busy.has(playerId)) {
          return { status: 'claimed', attempts };
        }
        continue;
      }
      const { matchId } = opened;

      logger.info(
        `[Matchmaking] Formed match ${matchId}: ${self.playerId} (${self.rating}) vs ${candidate.entry.playerId} (${candidate.entry.rating}), cost=${candidate.cost.toFixed(1)}`
      );

      return { status: 'matched', matchId, self, opponent: candidate.entry, attempts };
    }

    logger.info(`[Matchmaking] ${playerId} stays queued after ${attempts} contended attempts`);
    return { status: 'queued', reason: 'contention', attempts };
  }

  private async claim(self: WaitingEntry, opponent: WaitingEntry): Promise<void> {
    const claimed = await this.pool.claimPair(self, opponent);
    if (!claimed) {
      throw new ConcurrencyConflictError(`Opponent ${opponent.playerId} already claimed`);
    }
  }

  private async openSession(self: WaitingEntry, opponent: WaitingEntry): Promise<OpenResult> {
    let matchId: string;
    try {
      matchId = await this.createSession(self, opponent);
    } catch (error) {
      if (error instanceof PlayerInMatchError) {
        // Entries of players already in a match are stale; only the others go back
        const free = [self, opponent].filter((entry) => !error.busy.has(entry.playerId));
        logger.warn(
          `[Matchmaking] ${error.message}; restoring ${free.map((entry) => entry.playerId).join(', ') || 'nobody'}`
        );
        await this.pool.restore(free);
        return { status: 'busy', busy: error.busy };
      }
      // Nobody was paired; put both players back where they were
      logger.error(`[Matchmaking] Session creation failed, restoring ${self.playerId} and ${opponent.playerId}:`, error);
      await this.pool.restore([self, opponent]);
      throw error;
    }

    await this.clearEntries(matchId, [self.playerId, opponent.playerId]);
    return { status: 'opened', matchId };
  }

  private async clearEntries(matchId: string, playerIds: string[]): Promise<void> {
    try {
      const removed = await Promise.all(playerIds.map((id) => this.pool.remove(id)));
      if (removed.some(Boolean)) {
        logger.info(`[Matchmaking] Cleared entries re-queued during creation of match ${matchId}`);
      }
    } catch (error) {
      // The session is live; a leftover entry is refused at the next pairing
      logger.warn(`[Matchmaking] Could not clear pool entries for match ${matchId}:`, error);
    }
  }
}
