// =====================================================
// Match Winner Determination
// =====================================================
// Pure tie-break cascade for a finished duel.
//
// WINNER RULES (first criterion that differs decides):
// 1. Higher cumulative score
// 2. Higher accuracy (correctAnswers / totalAnswers)
// 3. Lower average response time
// 4. Otherwise a DRAW. There is no hidden fourth tiebreak.

import type { PlayerMatchStats } from '@triviaduel/shared-types';

export interface MatchWinnerResult {
  winnerId: string | null;
  isDraw: boolean;
  decidedBy: 'score' | 'accuracy' | 'response_time' | 'draw';
  reason: string;
}

export function accuracyOf(stats: PlayerMatchStats): number {
  return stats.totalAnswers > 0 ? stats.correctAnswers / stats.totalAnswers : 0;
}

export function averageResponseTimeOf(stats: PlayerMatchStats): number {
  return stats.totalAnswers > 0 ? stats.totalResponseTimeMs / stats.totalAnswers : 0;
}

export function determineMatchWinner(
  firstId: string,
  secondId: string,
  first: PlayerMatchStats,
  second: PlayerMatchStats
): MatchWinnerResult {
  // Rule 1: score
  if (first.score !== second.score) {
    const winnerId = first.score > second.score ? firstId : secondId;
    return {
      winnerId,
      isDraw: false,
      decidedBy: 'score',
      reason: `${winnerId} wins on score: ${Math.max(first.score, second.score)} vs ${Math.min(first.score, second.score)}`,
    };
  }

  // Rule 2: accuracy
  const firstAccuracy = accuracyOf(first);
  const secondAccuracy = accuracyOf(second);
  if (firstAccuracy !== secondAccuracy) {
    const winnerId = firstAccuracy > secondAccuracy ? firstId : secondId;
    return {
      winnerId,
      isDraw: false,
      decidedBy: 'accuracy',
      reason: `${winnerId} wins on accuracy with scores tied at ${first.score}`,
    };
  }

  // Rule 3: average response time
  const firstAverage = averageResponseTimeOf(first);
  const secondAverage = averageResponseTimeOf(second);
  if (firstAverage !== secondAverage) {
    const winnerId = firstAverage < secondAverage ? firstId : secondId;
    return {
      winnerId,
      isDraw: false,
      decidedBy: 'response_time',
      reason: `${winnerId} wins on average response time (${Math.round(Math.min(firstAverage, secondAverage))}ms)`,
    };
  }

  return {
    winnerId: null,
    isDraw: true,
    decidedBy: 'draw',
    reason: `Draw: tied on score (${first.score}), accuracy and response time`,
  };
}
