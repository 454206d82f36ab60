// =====================================================
// Connection Registry
// =====================================================
// playerId -> live connection, and playerId -> in-progress matchId.
//
// A newer connection for the same player replaces (and closes) the older
// one. Dropping a connection mid-match opens a reconnect window; binding
// again inside it resumes the match, letting it lapse forfeits.

import type { ServerMessage } from '@triviaduel/shared-types';
import { logger } from '../utils/logger';
import {
  ClientConnection,
  deliverAll,
  DeliveryReport,
  MessageFactory,
  PlayerNotifier,
  sendWithTimeout,
} from './broadcaster';

export interface MatchPresenceListener {
  playerDisconnected(playerId: string, matchId: string): void;
  playerReconnected(playerId: string, matchId: string): void;
  reconnectWindowExpired(playerId: string, matchId: string): void;
}

export interface ConnectionRegistryOptions {
  reconnectWindowMs: number;
  sendTimeoutMs: number;
}

export class ConnectionRegistry implements PlayerNotifier {
  private readonly connections = new Map<string, ClientConnection>();
  private readonly owners = new Map<string, string>(); // connectionId -> playerId
  private readonly matches = new Map<string, string>();
  private readonly pendingReconnects = new Map<string, NodeJS.Timeout>();
  private listener: MatchPresenceListener | null = null;

  constructor(private readonly options: ConnectionRegistryOptions) {}

  setPresenceListener(listener: MatchPresenceListener): void {
    this.listener = listener;
  }

  // ===========================================
  // Binding
  // ===========================================

  bind(playerId: string, connection: ClientConnection): void {
    const previous = this.connections.get(playerId);
    if (previous && previous.id !== connection.id) {
      this.owners.delete(previous.id);
      previous.close('Replaced by a newer connection');
      logger.info(`[Socket] ${playerId} rebound from ${previous.id} to ${connection.id}`);
    }

    this.connections.set(playerId, connection);
    this.owners.set(connection.id, playerId);

    const pending = this.pendingReconnects.get(playerId);
    if (pending) {
      clearTimeout(pending);
      this.pendingReconnects.delete(playerId);
      const matchId = this.matches.get(playerId);
      if (matchId) {
        logger.info(`[Socket] ${playerId} reconnected to match ${matchId}`);
        this.listener?.playerReconnected(playerId, matchId);
      }
    }
  }

  /**
   * Forget a closed connection. Returns the player it belonged to, or null
   * when it was never bound or was already replaced.
   */
  unbind(connectionId: string): string | null {
    const playerId = this.owners.get(connectionId);
    if (!playerId) {
      return null;
    }
    this.owners.delete(connectionId);

    if (this.connections.get(playerId)?.id !== connectionId) {
      return null;
    }
    this.connections.delete(playerId);

    const matchId = this.matches.get(playerId);
    if (matchId && !this.pendingReconnects.has(playerId)) {
      this.openReconnectWindow(playerId, matchId);
    }
    return playerId;
  }

  private openReconnectWindow(playerId: string, matchId: string): void {
    const windowMs = this.options.reconnectWindowMs;
    logger.info(`[Socket] ${playerId} dropped from match ${matchId}; holding for ${windowMs}ms`);

    const timer = setTimeout(() => {
      this.pendingReconnects.delete(playerId);
      if (this.connections.has(playerId) || this.matches.get(playerId) !== matchId) {
        return;
      }
      logger.info(`[Socket] Reconnect window for ${playerId} in ${matchId} expired`);
      this.listener?.reconnectWindowExpired(playerId, matchId);
    }, windowMs);

    this.pendingReconnects.set(playerId, timer);
    this.listener?.playerDisconnected(playerId, matchId);
  }

  playerOf(connectionId: string): string | null {
    return this.owners.get(connectionId) ?? null;
  }

  connectionOf(playerId: string): ClientConnection | null {
    return this.connections.get(playerId) ?? null;
  }

  isConnected(playerId: string): boolean {
    return this.connections.has(playerId);
  }

  isAwaitingReconnect(playerId: string): boolean {
    return this.pendingReconnects.has(playerId);
  }

  // ===========================================
  // Match Membership
  // ===========================================

  attachMatch(playerIds: readonly string[], matchId: string): void {
    for (const playerId of playerIds) {
      this.matches.set(playerId, matchId);
      // Dropped while matchmaking: the window starts now
      if (!this.connections.has(playerId) && !this.pendingReconnects.has(playerId)) {
        this.openReconnectWindow(playerId, matchId);
      }
    }
  }

  detachMatch(matchId: string): void {
    for (const [playerId, current] of [...this.matches]) {
      if (current !== matchId) {
        continue;
      }
      this.matches.delete(playerId);
      const pending = this.pendingReconnects.get(playerId);
      if (pending) {
        clearTimeout(pending);
        this.pendingReconnects.delete(playerId);
      }
    }
  }

  matchOf(playerId: string): string | null {
    return this.matches.get(playerId) ?? null;
  }

  // ===========================================
  // Delivery
  // ===========================================

  async sendToPlayer(playerId: string, message: ServerMessage): Promise<boolean> {
    const connection = this.connections.get(playerId);
    if (!connection) {
      logger.debug(`[Socket] ${message.type} for ${playerId} dropped: not connected`);
      return false;
    }
    try {
      await sendWithTimeout(connection, message, this.options.sendTimeoutMs);
      return true;
    } catch (error) {
      logger.warn(`[Socket] ${message.type} to ${playerId} failed:`, error);
      return false;
    }
  }

  broadcast(playerIds: readonly string[], message: MessageFactory): Promise<DeliveryReport> {
    return deliverAll(
      playerIds.map((playerId) => ({ playerId, connection: this.connections.get(playerId) ?? null })),
      message,
      this.options.sendTimeoutMs
    );
  }

  size(): number {
    return this.connections.size;
  }

  closeAll(reason: string): void {
    for (const timer of this.pendingReconnects.values()) {
      clearTimeout(timer);
    }
    this.pendingReconnects.clear();
    for (const connection of this.connections.values()) {
      connection.close(reason);
    }
    this.connections.clear();
    this.owners.clear();
  }
}
