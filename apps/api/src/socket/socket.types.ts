// =====================================================
// Socket.io Type Definitions
// =====================================================
// The realtime protocol rides on a single 'message' event in each
// direction carrying the { type, data } envelope. Inbound frames are
// typed `unknown` until the router validates them.

import type { ServerMessage } from '@triviaduel/shared-types';
import type { VerifiedPlayer } from '../modules/auth/identity.service';

// ===========================================
// Socket Session Data
// ===========================================

export interface SocketData {
  /** Set by the handshake middleware when the client sent a token. */
  player: VerifiedPlayer | null;
}

// ===========================================
// Event Maps
// ===========================================

export interface ClientToServerEvents {
  message: (frame: unknown) => void;
}

export interface ServerToClientEvents {
  message: (frame: ServerMessage) => void;
}

export interface InterServerEvents {
  ping: () => void;
}
