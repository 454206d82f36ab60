// =====================================================
// Custom Error Classes
// =====================================================

import { ErrorCode, ERROR_CODES } from '@triviaduel/shared-types';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    code: ErrorCode = ERROR_CODES.INTERNAL_ERROR,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Malformed or missing fields. Over the socket this becomes an ERROR
 * envelope and the connection stays open.
 */
export class ValidationError extends AppError {
  constructor(message: string, code: ErrorCode = ERROR_CODES.VALIDATION_ERROR) {
    super(message, 400, code);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized', code: ErrorCode = ERROR_CODES.TOKEN_INVALID) {
    super(message, 401, code);
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Forbidden', code: ErrorCode = ERROR_CODES.FORBIDDEN) {
    super(message, 403, code);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, code: ErrorCode = ERROR_CODES.NOT_FOUND) {
    super(message, 404, code);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code: ErrorCode = ERROR_CODES.ALREADY_IN_MATCH) {
    super(message, 409, code);
  }
}

/**
 * Session creation refused: some of the paired players are already in a
 * live match. `busy` maps each of them to that match id.
 */
export class PlayerInMatchError extends ConflictError {
  public readonly busy: ReadonlyMap<string, string>;

  constructor(busy: ReadonlyMap<string, string>) {
    super(
      Array.from(busy, ([playerId, matchId]) => `Player ${playerId} is already in match ${matchId}`).join('; ')
    );
    this.busy = busy;
  }
}

/**
 * The opponent chosen for a pairing was claimed by a racing request.
 * Match formation retries on this; it never reaches a client.
 */
export class ConcurrencyConflictError extends AppError {
  constructor(message: string = 'Opponent already claimed') {
    super(message, 409, ERROR_CODES.OPPONENT_CLAIMED);
  }
}

/**
 * Ephemeral or durable store unreachable.
 */
export class TransientStoreError extends AppError {
  public readonly store: string;

  constructor(store: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`${store} unavailable${detail}`, 503, ERROR_CODES.STORE_UNAVAILABLE);
    this.store = store;
  }
}

/**
 * Repeated malformed input on one connection. Closes that connection only.
 */
export class FatalProtocolError extends AppError {
  constructor(message: string = 'Too many malformed messages') {
    super(message, 400, ERROR_CODES.TOO_MANY_MALFORMED);
  }
}
