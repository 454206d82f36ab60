// =====================================================
// Broadcaster
// =====================================================
// Per-connection sends bounded by a timeout and run concurrently, so a
// stalled connection only delays its own delivery.

import type { ServerMessage } from '@triviaduel/shared-types';
import { logger } from '../utils/logger';

// ===========================================
// Types
// ===========================================

/**
 * Transport-neutral handle for one live client connection.
 */
export interface ClientConnection {
  readonly id: string;
  send(message: ServerMessage): Promise<void>;
  close(reason: string): void;
}

export type MessageFactory = ServerMessage | ((playerId: string) => ServerMessage);

export interface DeliveryReport {
  delivered: string[];
  failed: string[]; // timed out or errored
  offline: string[]; // no bound connection
}

/**
 * Outbound side of the transport as seen by the game core.
 */
export interface PlayerNotifier {
  sendToPlayer(playerId: string, message: ServerMessage): Promise<boolean>;
  broadcast(playerIds: readonly string[], message: MessageFactory): Promise<DeliveryReport>;
}

export class SendTimeoutError extends Error {
  constructor(connectionId: string, timeoutMs: number) {
    super(`Send to ${connectionId} timed out after ${timeoutMs}ms`);
    this.name = 'SendTimeoutError';
  }
}

// ===========================================
// Delivery
// ===========================================

export async function sendWithTimeout(
  connection: ClientConnection,
  message: ServerMessage,
  timeoutMs: number
): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new SendTimeoutError(connection.id, timeoutMs)), timeoutMs);
  });

  try {
    await Promise.race([connection.send(message), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface DeliveryTarget {
  playerId: string;
  connection: ClientConnection | null;
}

export async function deliverAll(
  targets: readonly DeliveryTarget[],
  message: MessageFactory,
  timeoutMs: number
): Promise<DeliveryReport> {
  const report: DeliveryReport = { delivered: [], failed: [], offline: [] };

  const online: { playerId: string; connection: ClientConnection }[] = [];
  for (const { playerId, connection } of targets) {
    if (connection === null) {
      report.offline.push(playerId);
    } else {
      online.push({ playerId, connection });
    }
  }

  const outcomes = await Promise.allSettled(
    online.map(({ playerId, connection }) => {
      const payload = typeof message === 'function' ? message(playerId) : message;
      return sendWithTimeout(connection, payload, timeoutMs);
    })
  );

  outcomes.forEach((outcome, index) => {
    const { playerId } = online[index];
    if (outcome.status === 'fulfilled') {
      report.delivered.push(playerId);
    } else {
      report.failed.push(playerId);
      logger.warn(`[Socket] Delivery to ${playerId} failed: ${String(outcome.reason)}`);
    }
  });

  return report;
}
