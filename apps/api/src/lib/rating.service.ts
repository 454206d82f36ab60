// =====================================================
// Rating Service
// =====================================================
// Stateless ELO update with floor/ceiling clamping and tier detection.
//
// RULES:
// - expected = 1 / (1 + 10^((opponent - rating) / 400))
// - actual = 1 win, 0.5 draw, 0 loss
// - newRating = round(rating + K * (actual - expected)), then clamped
// - K adapts to experience and rating when gamesPlayed is known:
//   provisional (< 30 games) 40, >= 2000 16, >= 1500 24, otherwise 32

import {
  RatingTier,
  RatingUpdate,
  TIER_THRESHOLDS,
} from '@triviaduel/shared-types';
import { config } from '../config';

// ===========================================
// Types
// ===========================================

export type MatchOutcome = 'WIN' | 'LOSS' | 'DRAW';

export interface RatingOptions {
  kFactor: number;
  floor: number;
  ceiling: number;
  adaptiveK: boolean;
}

export interface RatingInput {
  rating: number;
  opponentRating: number;
  outcome: MatchOutcome;
  gamesPlayed?: number;
}

// ===========================================
// Constants
// ===========================================

export const PROVISIONAL_GAMES = 30;

const DEFAULT_OPTIONS: RatingOptions = {
  kFactor: config.rating.kFactor,
  floor: config.rating.floor,
  ceiling: config.rating.ceiling,
  adaptiveK: config.rating.adaptiveK,
};

const OUTCOME_SCORE: Record<MatchOutcome, number> = {
  WIN: 1,
  DRAW: 0.5,
  LOSS: 0,
};


// ===========================================
// Pure Functions
// ===========================================

export function expectedScore(rating: number, opponentRating: number): number {
  return 1 / (1 + Math.pow(10, (opponentRating - rating) / 400));
}

/**
 * Probability that `rating` beats `opponentRating`, as a percentage.
 */
export function winProbability(rating: number, opponentRating: number): number {
  return Math.round(expectedScore(rating, opponentRating) * 100);
}

export function getKFactor(rating: number, gamesPlayed: number): number {
  if (gamesPlayed < PROVISIONAL_GAMES) return 40;
  if (rating >= 2000) return 16;
  if (rating >= 1500) return 24;
  return 32;
}

export function clampRating(rating: number, floor: number, ceiling: number): number {
  return Math.min(ceiling, Math.max(floor, rating));
}

export function getTierForRating(rating: number): RatingTier {
  let tier = TIER_THRESHOLDS[0].tier;
  for (const threshold of TIER_THRESHOLDS) {
    if (rating >= threshold.minRating) {
      tier = threshold.tier;
    }
  }
  return tier;
}

function tierRank(tier: RatingTier): number {
  return TIER_THRESHOLDS.findIndex((threshold) => threshold.tier === tier);
}

export function compareTiers(a: RatingTier, b: RatingTier): number {
  return tierRank(a) - tierRank(b);
}

/**
 * Compute one player's rating change for a finished match.
 */
export function calculateRatingUpdate(
  input: RatingInput,
  overrides: Partial<RatingOptions> = {}
): RatingUpdate {
  const options: RatingOptions = { ...DEFAULT_OPTIONS, ...overrides };
  const { rating, opponentRating, outcome, gamesPlayed } = input;

  const k =
    options.adaptiveK && gamesPlayed !== undefined
      ? getKFactor(rating, gamesPlayed)
      : options.kFactor;

  const expected = expectedScore(rating, opponentRating);
  const raw = Math.round(rating + k * (OUTCOME_SCORE[outcome] - expected));
  const newRating = clampRating(raw, options.floor, options.ceiling);

  const previousTier = getTierForRating(rating);
  const newTier = getTierForRating(newRating);
  const tierOrder = compareTiers(newTier, previousTier);

  return {
    previousRating: rating,
    newRating,
    delta: newRating - rating,
    previousTier,
    newTier,
    tierChanged: tierOrder !== 0,
    promoted: tierOrder > 0,
    demoted: tierOrder < 0,
  };
}
