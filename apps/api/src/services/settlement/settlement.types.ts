// =====================================================
// Settlement Types
// =====================================================
// Durable-store contracts used by finalization and reconciliation.

import type { MatchRecord, RatingTier } from '@triviaduel/shared-types';
import type { RewardInput } from '../../lib/economy.service';

export type PlayerOutcome = 'WIN' | 'LOSS' | 'DRAW' | 'NO_CONTEST';

export interface PlayerRatingSnapshot {
  playerId: string;
  rating: number;
  tier: RatingTier;
  gamesPlayed: number;
  wins: number;
  losses: number;
  draws: number;
  currentStreak: number;
  longestStreak: number;
}

/**
 * Rating change to apply for one player. NO_CONTEST leaves the player's
 * rating and counters untouched.
 */
export interface PlayerResultUpdate {
  playerId: string;
  outcome: PlayerOutcome;
  newRating: number;
  tier: RatingTier;
}

export interface RecordOutcome {
  inserted: boolean; // false when the match was already recorded
  players: Record<string, PlayerRatingSnapshot>;
}

export interface RatingStore {
  getPlayer(playerId: string): Promise<PlayerRatingSnapshot | null>;
}

export interface MatchResultStore {
  /**
   * Insert the match record and apply rating results in one transaction.
   * Idempotent by matchId.
   */
  recordMatch(record: MatchRecord, results: PlayerResultUpdate[]): Promise<RecordOutcome>;
  getMatch(matchId: string): Promise<MatchRecord | null>;
}

export interface WalletStore {
  /** Idempotent by key. Returns false when the key was already applied. */
  credit(playerId: string, amount: number, idempotencyKey: string, reason: string): Promise<boolean>;
  getBalance(playerId: string): Promise<number>;
}

export interface CoinCredit {
  playerId: string;
  amount: number;
  /**
   * Present when the amount depends on a win streak that was unknown at
   * finalization because the match was not recorded. Such a credit is
   * held back; reconciliation recomputes it from the recorded streak.
   */
  pendingReward?: Omit<RewardInput, 'winStreak'>;
}

/**
 * Everything needed to finish settlement off the critical path.
 */
export interface SettlementPayload {
  record: MatchRecord;
  results: PlayerResultUpdate[];
  credits: CoinCredit[];
}

export function walletKey(matchId: string, playerId: string): string {
  return `match:${matchId}:${playerId}`;
}
