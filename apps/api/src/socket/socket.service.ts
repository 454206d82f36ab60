// =====================================================
// Socket Service
// =====================================================
// Singleton Socket.io instance and the ClientConnection wrapper the
// game core sends through.

import type { Server as HttpServer } from 'http';
import { Server } from 'socket.io';
import type { Socket } from 'socket.io';
import { createAdapter } from '@socket.io/redis-adapter';
import type { ServerMessage } from '@triviaduel/shared-types';
import { config } from '../config';
import { logger } from '../utils/logger';
import { getRedisConnection, getSubscriberConnection } from '../queues/connection';
import type { ClientConnection } from './broadcaster';
import type {
  SocketData,
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
} from './socket.types';

// ===========================================
// Type Definitions
// ===========================================

export type TypedServer = Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

export type TypedSocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

// ===========================================
// Connection Wrapper
// ===========================================

export class SocketConnection implements ClientConnection {
  constructor(private readonly socket: TypedSocket) {}

  get id(): string {
    return this.socket.id;
  }

  async send(message: ServerMessage): Promise<void> {
    if (!this.socket.connected) {
      throw new Error(`Socket ${this.socket.id} is disconnected`);
    }
    this.socket.emit('message', message);
  }

  close(reason: string): void {
    logger.info(`[Socket] Closing ${this.socket.id}: ${reason}`);
    this.socket.disconnect(true);
  }
}

// ===========================================
// Singleton Instance
// ===========================================

let io: TypedServer | null = null;

export function initializeSocketServer(httpServer: HttpServer): TypedServer {
  if (io) {
    logger.warn('[Socket] Socket.io server already initialized');
    return io;
  }

  io = new Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>(httpServer, {
    cors: {
      origin: config.corsOrigin === '*' ? '*' : config.corsOrigin.split(','),
      credentials: true,
    },
    pingTimeout: 60000,
    pingInterval: 25000,
    transports: ['websocket', 'polling'],
    path: '/socket.io',
  });

  logger.info('[Socket] Socket.io server initialized');
  return io;
}

/**
 * Redis adapter for multi-instance deployments. Without Redis the server
 * keeps running in single-instance mode.
 */
export async function setupRedisAdapter(server: TypedServer): Promise<void> {
  try {
    const pubClient = getRedisConnection().duplicate();
    const subClient = getSubscriberConnection();

    await Promise.all(
      [pubClient, subClient].map(
        (client) =>
          new Promise<void>((resolve, reject) => {
            if (client.status === 'ready') {
              resolve();
              return;
            }
            client.once('ready', () => resolve());
            client.once('error', reject);
          })
      )
    );

    server.adapter(createAdapter(pubClient, subClient));
    logger.info('[Socket] Redis adapter configured');
  } catch (error) {
    logger.warn('[Socket] Redis adapter setup failed, running single-instance:', error);
  }
}

export async function shutdownSocketServer(): Promise<void> {
  const server = io;
  if (!server) {
    return;
  }
  io = null;

  logger.info('[Socket] Shutting down Socket.io server...');
  server.disconnectSockets(true);
  await new Promise<void>((resolve) => {
    server.close(() => {
      logger.info('[Socket] Socket.io server closed');
      resolve();
    });
  });
}
