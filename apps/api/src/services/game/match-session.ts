// =====================================================
// Match Session Model
// =====================================================
// Authoritative state for one duel. Only the owning SessionCoordinator
// mutates a MatchSession.

import {
  MatchStatus,
  MatchView,
  PlayerMatchStats,
} from '@triviaduel/shared-types';

// ===========================================
// Types
// ===========================================

export interface Submission {
  playerId: string;
  matchId: string;
  round: number;
  answer: string;
  receivedAt: number;
  elapsedMs: number; // from round start, on the server clock
}

export interface RoundState {
  number: number;
  questionId: string;
  question: unknown;
  correctAnswer: string;
  startedAt: number;
  deadline: number;
  submissions: Map<string, Submission>;
}

export interface MatchSession {
  matchId: string;
  players: [string, string];
  ratings: Record<string, number>;
  gamesPlayed: Record<string, number>;
  status: MatchStatus;
  currentRound: number;
  maxRounds: number;
  stats: Record<string, PlayerMatchStats>;
  winner: string | null;
  ratingDelta: Record<string, number> | null;
  round: RoundState | null;
  usedQuestionIds: string[];
  lastActivityAt: Record<string, number>;
  startedAt: number;
  endedAt: number | null;
}

export interface SessionPlayer {
  playerId: string;
  rating: number;
  gamesPlayed?: number;
}

// ===========================================
// Helpers
// ===========================================

export function emptyStats(): PlayerMatchStats {
  return { score: 0, correctAnswers: 0, totalAnswers: 0, totalResponseTimeMs: 0 };
}

export function createMatchSession(
  matchId: string,
  first: SessionPlayer,
  second: SessionPlayer,
  maxRounds: number,
  now: number = Date.now()
): MatchSession {
  if (first.playerId === second.playerId) {
    throw new Error(`A match needs two distinct players, got ${first.playerId} twice`);
  }

  return {
    matchId,
    players: [first.playerId, second.playerId],
    ratings: { [first.playerId]: first.rating, [second.playerId]: second.rating },
    gamesPlayed: {
      [first.playerId]: first.gamesPlayed ?? 0,
      [second.playerId]: second.gamesPlayed ?? 0,
    },
    status: MatchStatus.FORMING,
    currentRound: 0,
    maxRounds,
    stats: { [first.playerId]: emptyStats(), [second.playerId]: emptyStats() },
    winner: null,
    ratingDelta: null,
    round: null,
    usedQuestionIds: [],
    lastActivityAt: { [first.playerId]: now, [second.playerId]: now },
    startedAt: now,
    endedAt: null,
  };
}

export function opponentOf(session: MatchSession, playerId: string): string {
  const [a, b] = session.players;
  return playerId === a ? b : a;
}

export function isParticipant(session: MatchSession, playerId: string): boolean {
  return session.players[0] === playerId || session.players[1] === playerId;
}

export function isTerminal(status: MatchStatus): boolean {
  return (
    status === MatchStatus.COMPLETED ||
    status === MatchStatus.ABANDONED ||
    status === MatchStatus.ERROR
  );
}

export function scoresOf(session: MatchSession): Record<string, number> {
  const [a, b] = session.players;
  return { [a]: session.stats[a].score, [b]: session.stats[b].score };
}

export function toMatchView(session: MatchSession): MatchView {
  const [a, b] = session.players;
  return {
    matchId: session.matchId,
    players: [a, b],
    status: session.status,
    currentRound: session.currentRound,
    maxRounds: session.maxRounds,
    stats: { [a]: { ...session.stats[a] }, [b]: { ...session.stats[b] } },
    winner: session.winner,
    ratingDelta: session.ratingDelta ? { ...session.ratingDelta } : null,
    startedAt: new Date(session.startedAt).toISOString(),
    endedAt: session.endedAt !== null ? new Date(session.endedAt).toISOString() : null,
  };
}
