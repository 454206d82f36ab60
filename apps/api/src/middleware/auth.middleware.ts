// =====================================================
// Authentication Middleware
// =====================================================
// Verifies the Bearer access token and attaches the player to the request.

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ERROR_CODES } from '@triviaduel/shared-types';
import { UnauthorizedError } from '../utils/errors';
import type { IdentityProvider, VerifiedPlayer } from '../modules/auth/identity.service';

// ===========================================
// Type Extensions
// ===========================================

declare global {
  namespace Express {
    interface Request {
      player?: VerifiedPlayer;
    }
  }
}

// ===========================================
// Middleware Functions
// ===========================================

function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }

  const parts = authHeader.split(' ');
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    return null;
  }

  return parts[1];
}

/**
 * 401 unless a valid access token is present.
 */
export function createRequireAuth(identity: IdentityProvider): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const token = extractBearerToken(req.headers.authorization);
      if (!token) {
        throw new UnauthorizedError('Authentication required', ERROR_CODES.NOT_AUTHENTICATED);
      }

      req.player = await identity.verify(token);
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Use after requireAuth.
 */
export function getAuthenticatedPlayer(req: Request): VerifiedPlayer {
  if (!req.player) {
    throw new UnauthorizedError('Player not authenticated', ERROR_CODES.NOT_AUTHENTICATED);
  }
  return req.player;
}
