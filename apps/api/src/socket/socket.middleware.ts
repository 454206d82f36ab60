// =====================================================
// Socket Authentication Middleware
// =====================================================
// A token in handshake.auth.token is verified before the connection is
// accepted. Without one the client must send AUTHENTICATE first.

import { AppError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { IdentityProvider } from '../modules/auth/identity.service';
import type { TypedSocket } from './socket.service';

type Next = (err?: Error) => void;

export function createSocketAuthMiddleware(identity: IdentityProvider) {
  return async (socket: TypedSocket, next: Next): Promise<void> => {
    socket.data.player = null;

    const auth: unknown = socket.handshake.auth;
    const token = typeof auth === 'object' && auth !== null && 'token' in auth ? auth.token : undefined;

    if (token === undefined || token === null || token === '') {
      next();
      return;
    }
    if (typeof token !== 'string') {
      logger.warn(`[Socket] Connection rejected: invalid token type (socket: ${socket.id})`);
      next(new Error('Authentication required: Invalid token format'));
      return;
    }

    try {
      socket.data.player = await identity.verify(token);
      next();
    } catch (error) {
      const code = error instanceof AppError ? error.code : 'AUTH_FAILED';
      logger.warn(`[Socket] Handshake authentication failed: ${code} (socket: ${socket.id})`);
      // Clients read the code from err.message
      next(new Error(code));
    }
  };
}
