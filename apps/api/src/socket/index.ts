// =====================================================
// Socket Module
// =====================================================
// Realtime transport over Socket.io.

import type { Server as HttpServer } from 'http';
import { logger } from '../utils/logger';
import type { GameRuntime } from '../runtime';
import { createSocketAuthMiddleware } from './socket.middleware';
import { initializeSocketServer, setupRedisAdapter } from './socket.service';
import type { TypedServer } from './socket.service';
import { registerSocketHandlers } from './socket.handlers';

export * from './socket.types';
export { shutdownSocketServer } from './socket.service';

/**
 * Call after the HTTP server is created and before it listens.
 */
export async function initializeSocket(
  httpServer: HttpServer,
  runtime: GameRuntime,
  options: { redisAdapter: boolean }
): Promise<TypedServer> {
  const io = initializeSocketServer(httpServer);

  if (options.redisAdapter) {
    await setupRedisAdapter(io);
  }

  io.use(createSocketAuthMiddleware(runtime.identity));

  io.on('connection', (socket) => {
    logger.info(`[Socket] New connection ${socket.id}${socket.data.player ? ` (${socket.data.player.playerId})` : ''}`);
    registerSocketHandlers(socket, runtime.router);
  });

  logger.info('[Socket] Socket.io infrastructure initialized');
  return io;
}
