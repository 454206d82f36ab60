// =====================================================
// Matchmaking Types
// =====================================================

export type QueueOutcome = 'queued' | 'matched';

export interface EnqueueResponse {
  status: QueueOutcome;
  matchId?: string;
  opponentId?: string;
}

export interface QueueStatusResponse {
  waiting: boolean;
  rating: number | null;
  waitTimeMs: number | null;
  poolSize: number;
  activeMatchId: string | null;
}
