// =====================================================
// Socket Event Handlers
// =====================================================
// Adapts one socket.io socket to the transport-neutral router.

import { logger } from '../utils/logger';
import type { MessageRouter } from './message-router';
import { SocketConnection, TypedSocket } from './socket.service';

export function registerSocketHandlers(socket: TypedSocket, router: MessageRouter): void {
  const ctx = router.open(new SocketConnection(socket));

  const handshakePlayer = socket.data.player;
  if (handshakePlayer) {
    router.attach(ctx, handshakePlayer).catch((error: unknown) => {
      logger.error(`[Socket] Attaching ${handshakePlayer.playerId} to ${socket.id} failed:`, error);
      socket.disconnect(true);
    });
  }

  socket.on('message', (frame) => {
    router.handle(ctx, frame).catch((error: unknown) => {
      logger.error(`[Socket] Frame handling failed on ${socket.id}:`, error);
    });
  });

  socket.on('disconnect', (reason) => {
    logger.info(`[Socket] ${ctx.player?.playerId ?? 'anonymous'} disconnected (${reason})`);
    router.close(ctx).catch((error: unknown) => {
      logger.error(`[Socket] Cleanup for ${socket.id} failed:`, error);
    });
  });

  socket.on('error', (error) => {
    logger.error(`[Socket] Error on ${socket.id}: ${error.message}`);
  });
}
