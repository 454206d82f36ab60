// =====================================================
// API Types - Request/Response Contracts
// =====================================================

// Standard API response envelope
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  meta?: ResponseMeta;
}

export interface ApiError {
  code: string;
  message: string;
  details?: unknown;
}

export interface ResponseMeta {
  timestamp: string;
  requestId: string;
}

// Error codes
export const ERROR_CODES = {
  // Auth errors
  TOKEN_EXPIRED: 'AUTH_001',
  TOKEN_INVALID: 'AUTH_002',
  NOT_AUTHENTICATED: 'AUTH_003',
  PLAYER_MISMATCH: 'AUTH_004',

  // Matchmaking errors
  ALREADY_IN_MATCH: 'QUEUE_001',
  OPPONENT_CLAIMED: 'QUEUE_002',

  // Match errors
  MATCH_NOT_FOUND: 'MATCH_001',
  NOT_A_PARTICIPANT: 'MATCH_002',
  MATCH_NOT_ACTIVE: 'MATCH_003',
  ROUND_CLOSED: 'MATCH_004',
  DUPLICATE_SUBMISSION: 'MATCH_005',

  // Protocol errors
  MALFORMED_MESSAGE: 'PROTOCOL_001',
  TOO_MANY_MALFORMED: 'PROTOCOL_002',

  // Collaborator errors
  STORE_UNAVAILABLE: 'STORE_001',
  CONTENT_UNAVAILABLE: 'CONTENT_001',

  // Generic errors
  VALIDATION_ERROR: 'VALIDATION_001',
  INTERNAL_ERROR: 'INTERNAL_001',
  RATE_LIMITED: 'RATE_001',
  FORBIDDEN: 'FORBIDDEN_001',
  NOT_FOUND: 'NOT_FOUND_001',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
