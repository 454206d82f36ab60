// =====================================================
// Economy Service
// =====================================================
// Coin rewards for a finished duel. Pure calculation; crediting happens
// in settlement through the wallet store.
//
// REWARD RULES:
// - Base: win 50, loss 10, draw 25
// - +10 per round won, +2 per round lost
// - Perfect game (every round won) doubles the base
// - Win streak at or above 3: +10% per streak game from the threshold on,
//   multiplier capped at x2
// - A forfeiting player, or a match with no contest, earns nothing

import { config } from '../config';

// ===========================================
// Types
// ===========================================

export type RewardOutcome = 'WIN' | 'LOSS' | 'DRAW' | 'NO_CONTEST';

export interface RewardInput {
  outcome: RewardOutcome;
  roundsWon: number;
  roundsLost: number;
  totalRounds: number;
  winStreak: number; // after this match
  forfeited: boolean;
}

export interface RewardRates {
  winGame: number;
  loseGame: number;
  drawGame: number;
  winRound: number;
  loseRound: number;
  perfectGameMultiplier: number;
  streakThreshold: number;
  streakBonusPerGame: number;
  maxStreakMultiplier: number;
}

export interface RewardBreakdown {
  base: number;
  rounds: number;
  streakMultiplier: number;
  total: number;
}

const DEFAULT_RATES: RewardRates = { ...config.economy };

// ===========================================
// Pure Functions
// ===========================================

export function streakMultiplier(winStreak: number, rates: RewardRates = DEFAULT_RATES): number {
  if (winStreak < rates.streakThreshold) {
    return 1;
  }
  const games = winStreak - rates.streakThreshold + 1;
  return Math.min(1 + games * rates.streakBonusPerGame, rates.maxStreakMultiplier);
}

export function calculateMatchReward(
  input: RewardInput,
  rates: RewardRates = DEFAULT_RATES
): RewardBreakdown {
  if (input.forfeited || input.outcome === 'NO_CONTEST') {
    return { base: 0, rounds: 0, streakMultiplier: 1, total: 0 };
  }

  let base =
    input.outcome === 'WIN'
      ? rates.winGame
      : input.outcome === 'LOSS'
        ? rates.loseGame
        : rates.drawGame;

  const perfect = input.totalRounds > 0 && input.roundsWon === input.totalRounds;
  if (perfect) {
    base *= rates.perfectGameMultiplier;
  }

  const rounds = input.roundsWon * rates.winRound + input.roundsLost * rates.loseRound;
  const multiplier = input.outcome === 'WIN' ? streakMultiplier(input.winStreak, rates) : 1;

  return {
    base,
    rounds,
    streakMultiplier: multiplier,
    total: Math.round((base + rounds) * multiplier),
  };
}
