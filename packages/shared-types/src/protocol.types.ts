// =====================================================
// Realtime Protocol - Message Envelopes
// =====================================================
// Every frame on the wire is `{ type, data }`. Both directions are
// closed tagged unions; anything else is rejected at ingress.

import type { PlayerMatchStats, MatchEndReason } from './match.types';
import type { RatingTier, RatingUpdate } from './tier.types';

export type Envelope<TType extends string, TData> = {
  type: TType;
  data: TData;
};

// ===========================================
// Client -> Server
// ===========================================

export interface AuthenticateData {
  token: string;
}

export interface SubmitAnswerData {
  playerId: string;
  matchId: string;
  round: number;
  answer: string;
  timestamp: number; // client clock, informational only
}

export type ClientMessage =
  | Envelope<'AUTHENTICATE', AuthenticateData>
  | Envelope<'START_MATCHMAKING', Record<string, never>>
  | Envelope<'CANCEL_MATCHMAKING', Record<string, never>>
  | Envelope<'SUBMIT_ANSWER', SubmitAnswerData>
  | Envelope<'FORFEIT', { matchId: string }>
  | Envelope<'SYNC_STATE', { matchId: string }>;

export type ClientMessageType = ClientMessage['type'];

// ===========================================
// Server -> Client
// ===========================================

export interface MatchFoundData {
  matchId: string;
  opponentId: string;
  opponentRating: number;
  maxRounds: number;
}

export interface GameStateData {
  matchId: string;
  round: number;
  maxRounds: number;
  question: unknown; // opaque content payload
  timeRemaining: number; // ms
  scores: Record<string, number>;
}

export interface RoundResultData {
  matchId: string;
  round: number;
  winner: string | null;
  scores: Record<string, number>;
  correctAnswer: string;
}

export interface GameCompletedData {
  matchId: string;
  winner: string | null;
  isDraw: boolean;
  reason: MatchEndReason;
  scores: Record<string, number>;
  stats: Record<string, PlayerMatchStats>;
  ratingDelta: number; // recipient's own delta
  rating: RatingUpdate | null;
  coinsEarned: number;
}

export type ServerMessage =
  | Envelope<'AUTHENTICATED', { playerId: string; rating: number; tier: RatingTier }>
  | Envelope<'MATCHMAKING_STATUS', { status: 'queued' | 'cancelled'; poolSize: number }>
  | Envelope<'MATCH_FOUND', MatchFoundData>
  | Envelope<'GAME_STATE', GameStateData>
  | Envelope<'ANSWER_RECEIVED', { matchId: string; round: number }>
  | Envelope<'ROUND_RESULT', RoundResultData>
  | Envelope<'GAME_COMPLETED', GameCompletedData>
  | Envelope<'OPPONENT_DISCONNECTED', { matchId: string; reconnectWindowMs: number }>
  | Envelope<'OPPONENT_RECONNECTED', { matchId: string }>
  | Envelope<'ERROR', { message: string; code: string }>;

export type ServerMessageType = ServerMessage['type'];
