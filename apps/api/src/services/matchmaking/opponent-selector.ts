// =====================================================
// Opponent Selector
// =====================================================
// Pure, single-pass selection over a Waiting Pool snapshot.
//
// SELECTION RULES:
// 1. Skip the requester and anyone outside the acceptable band.
//    Band = baseBand + bandStep per bandStepMs waited, capped at maxBand,
//    using the longer of the two players' waits.
// 2. cost = |rating - candidateRating| - waitBonus(candidateWait)
// 3. Lowest cost wins; ties go to the longer wait, then the lower seq.

import { config } from '../../config';
import type { WaitingEntry } from './waiting-pool';

// ===========================================
// Types
// ===========================================

export interface SelectorOptions {
  baseBand: number;
  bandStep: number;
  bandStepMs: number;
  maxBand: number;
  waitBonusPerSecond: number;
  maxWaitBonus: number;
}

export interface OpponentRequest {
  playerId: string;
  rating: number;
  joinTime?: number;
}

export interface OpponentCandidate {
  entry: WaitingEntry;
  cost: number;
  ratingDiff: number;
  waitTimeMs: number;
}

export const DEFAULT_SELECTOR_OPTIONS: SelectorOptions = {
  baseBand: config.matchmaking.baseBand,
  bandStep: config.matchmaking.bandStep,
  bandStepMs: config.matchmaking.bandStepMs,
  maxBand: config.matchmaking.maxBand,
  waitBonusPerSecond: config.matchmaking.waitBonusPerSecond,
  maxWaitBonus: config.matchmaking.maxWaitBonus,
};

// ===========================================
// Pure Functions
// ===========================================

/**
 * Rating distance tolerated after waiting `waitTimeMs`.
 */
export function acceptableBand(
  waitTimeMs: number,
  options: SelectorOptions = DEFAULT_SELECTOR_OPTIONS
): number {
  const steps = Math.floor(Math.max(0, waitTimeMs) / options.bandStepMs);
  return Math.min(options.baseBand + steps * options.bandStep, options.maxBand);
}

/**
 * Non-decreasing in wait time, capped.
 */
export function waitBonus(
  waitTimeMs: number,
  options: SelectorOptions = DEFAULT_SELECTOR_OPTIONS
): number {
  const bonus = (Math.max(0, waitTimeMs) / 1000) * options.waitBonusPerSecond;
  return Math.min(bonus, options.maxWaitBonus);
}

function isBetter(candidate: OpponentCandidate, best: OpponentCandidate): boolean {
  if (candidate.cost !== best.cost) {
    return candidate.cost < best.cost;
  }
  if (candidate.entry.joinTime !== best.entry.joinTime) {
    return candidate.entry.joinTime < best.entry.joinTime;
  }
  return candidate.entry.seq < best.entry.seq;
}

/**
 * Pick the best opponent for `request` from `pool`, or null.
 * Deterministic for a fixed snapshot and `now`.
 */
export function findOpponent(
  pool: readonly WaitingEntry[],
  request: OpponentRequest,
  now: number = Date.now(),
  options: SelectorOptions = DEFAULT_SELECTOR_OPTIONS
): OpponentCandidate | null {
  const requesterWait = request.joinTime !== undefined ? now - request.joinTime : 0;
  let best: OpponentCandidate | null = null;

  for (const entry of pool) {
    if (entry.playerId === request.playerId) {
      continue;
    }

    const waitTimeMs = Math.max(0, now - entry.joinTime);
    const ratingDiff = Math.abs(request.rating - entry.rating);

    if (ratingDiff > acceptableBand(Math.max(waitTimeMs, requesterWait), options)) {
      continue;
    }

    const candidate: OpponentCandidate = {
      entry,
      cost: ratingDiff - waitBonus(waitTimeMs, options),
      ratingDiff,
      waitTimeMs,
    };

    if (best === null || isBetter(candidate, best)) {
      best = candidate;
    }
  }

  return best;
}
