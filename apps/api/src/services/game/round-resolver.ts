// =====================================================
// Round Resolver
// =====================================================
// Pure scoring of one round from zero, one or two submissions.
//
// RULES (in order):
// 1. A correct answer beats an incorrect or missing one
// 2. Both correct: the smaller elapsed time from round start wins
// 3. Both wrong or missing: nobody scores
//
// A missing submission counts as an incorrect answer that took the whole
// round, so it lowers accuracy and raises average response time.

import type { PlayerMatchStats } from '@triviaduel/shared-types';
import type { Submission } from './match-session';

// ===========================================
// Types
// ===========================================

export interface RoundInput {
  players: readonly [string, string];
  stats: Record<string, PlayerMatchStats>;
  submissions: readonly Submission[];
  correctAnswer: string;
  pointsPerRound: number;
  roundDurationMs: number;
}

export interface RoundResolution {
  winner: string | null;
  correct: Record<string, boolean>;
  stats: Record<string, PlayerMatchStats>;
}

// ===========================================
// Pure Functions
// ===========================================

function normalizeAnswer(answer: string): string {
  return answer.trim().toLowerCase();
}

export function isCorrectAnswer(answer: string, correctAnswer: string): boolean {
  return normalizeAnswer(answer) === normalizeAnswer(correctAnswer);
}

export function resolveRound(input: RoundInput): RoundResolution {
  const { players, stats, submissions, correctAnswer, pointsPerRound, roundDurationMs } = input;

  const byPlayer = new Map<string, Submission>();
  for (const submission of submissions) {
    // First submission per player counts
    if (!byPlayer.has(submission.playerId)) {
      byPlayer.set(submission.playerId, submission);
    }
  }

  const correct: Record<string, boolean> = {};
  const elapsed: Record<string, number> = {};

  for (const playerId of players) {
    const submission = byPlayer.get(playerId);
    correct[playerId] = submission !== undefined && isCorrectAnswer(submission.answer, correctAnswer);
    elapsed[playerId] = submission !== undefined
      ? Math.min(Math.max(0, submission.elapsedMs), roundDurationMs)
      : roundDurationMs;
  }

  const [a, b] = players;
  let winner: string | null = null;

  if (correct[a] && !correct[b]) {
    winner = a;
  } else if (correct[b] && !correct[a]) {
    winner = b;
  } else if (correct[a] && correct[b] && elapsed[a] !== elapsed[b]) {
    winner = elapsed[a] < elapsed[b] ? a : b;
  }

  const nextStats: Record<string, PlayerMatchStats> = {};
  for (const playerId of players) {
    const previous = stats[playerId];
    nextStats[playerId] = {
      score: previous.score + (winner === playerId ? pointsPerRound : 0),
      correctAnswers: previous.correctAnswers + (correct[playerId] ? 1 : 0),
      totalAnswers: previous.totalAnswers + 1,
      totalResponseTimeMs: previous.totalResponseTimeMs + elapsed[playerId],
    };
  }

  return { winner, correct, stats: nextStats };
}
