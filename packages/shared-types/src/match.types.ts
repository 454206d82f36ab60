// =====================================================
// Match Types
// =====================================================

import type { RatingTier } from './tier.types';

export enum MatchStatus {
  FORMING = 'FORMING',
  IN_ROUND = 'IN_ROUND',
  ROUND_RESOLVED = 'ROUND_RESOLVED',
  COMPLETED = 'COMPLETED',
  ABANDONED = 'ABANDONED',
  ERROR = 'ERROR',
}

export type MatchEndReason =
  | 'completed'
  | 'forfeit'
  | 'disconnect_timeout'
  | 'idle_timeout'
  | 'error';

export interface PlayerMatchStats {
  score: number;
  correctAnswers: number;
  totalAnswers: number;
  totalResponseTimeMs: number;
}

/**
 * Public view of a session, safe to hand to either participant.
 * Never carries the current round's correct answer.
 */
export interface MatchView {
  matchId: string;
  players: [string, string];
  status: MatchStatus;
  currentRound: number;
  maxRounds: number;
  stats: Record<string, PlayerMatchStats>;
  winner: string | null;
  ratingDelta: Record<string, number> | null;
  startedAt: string;
  endedAt: string | null;
}

/**
 * The record handed to persistence once a match is finalized.
 */
export interface MatchRecord {
  matchId: string;
  players: [string, string];
  scores: Record<string, number>;
  winner: string | null; // null = draw or no contest
  isDraw: boolean;
  reason: MatchEndReason;
  ratingDelta: Record<string, number>;
  ratingAfter: Record<string, number>;
  tierAfter: Record<string, RatingTier>;
  roundsPlayed: number;
  startedAt: string;
  endedAt: string;
}

/**
 * GET /matches/:id. Live and snapshot lookups carry the session view;
 * older matches only have the durable record.
 */
export type MatchLookupResponse =
  | { source: 'live' | 'snapshot'; match: MatchView }
  | { source: 'history'; record: MatchRecord };
