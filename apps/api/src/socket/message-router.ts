// =====================================================
// Message Router
// =====================================================
// Validates inbound envelopes once and dispatches them to matchmaking or
// the owning Session Coordinator.
//
// RULES:
// - Malformed frames get an ERROR reply; the connection stays open
// - maxMalformed malformed frames in a row close that connection only
// - Everything but AUTHENTICATE requires an authenticated connection
// - SUBMIT_ANSWER must carry the authenticated player's id

import * as Sentry from '@sentry/node';
import { ERROR_CODES, ServerMessage } from '@triviaduel/shared-types';
import { logger } from '../utils/logger';
import {
  AppError,
  FatalProtocolError,
  ForbiddenError,
  NotFoundError,
  UnauthorizedError,
} from '../utils/errors';
import type { IdentityProvider, VerifiedPlayer } from '../modules/auth/identity.service';
import type { MatchmakingService } from '../services/matchmaking/matchmaking.service';
import type { SessionRegistry } from '../services/game/session-registry';
import type { SessionCoordinator } from '../services/game/session-coordinator';
import type { RatingLookupService } from '../services/settlement/rating-lookup.service';
import { ClientConnection, sendWithTimeout } from './broadcaster';
import type { ConnectionRegistry } from './connection-registry';
import { InboundMessage, parseClientMessage } from './socket.schemas';

// ===========================================
// Types
// ===========================================

export interface ConnectionContext {
  readonly connection: ClientConnection;
  player: VerifiedPlayer | null;
  malformed: number;
}

export interface MessageRouterDeps {
  identity: IdentityProvider;
  ratings: Pick<RatingLookupService, 'getPlayerRating'>;
  matchmaking: MatchmakingService;
  sessions: SessionRegistry;
  connections: ConnectionRegistry;
  maxMalformed: number;
  sendTimeoutMs: number;
}

// ===========================================
// Router
// ===========================================

export class MessageRouter {
  constructor(private readonly deps: MessageRouterDeps) {}

  open(connection: ClientConnection): ConnectionContext {
    return { connection, player: null, malformed: 0 };
  }

  /**
   * Authenticate a connection from an AUTHENTICATE frame.
   */
  async authenticate(ctx: ConnectionContext, token: string): Promise<VerifiedPlayer> {
    const player = await this.deps.identity.verify(token);
    await this.attach(ctx, player);
    return player;
  }

  /**
   * Bind an already-verified player to the connection (handshake auth).
   */
  async attach(ctx: ConnectionContext, player: VerifiedPlayer): Promise<void> {
    if (ctx.player && ctx.player.playerId !== player.playerId) {
      throw new ForbiddenError('Connection is already bound to another player', ERROR_CODES.PLAYER_MISMATCH);
    }

    ctx.player = player;
    this.deps.connections.bind(player.playerId, ctx.connection);
    logger.info(`[Socket] ${player.playerId} authenticated on ${ctx.connection.id}`);

    await this.send(ctx, {
      type: 'AUTHENTICATED',
      data: { playerId: player.playerId, rating: player.rating, tier: player.tier },
    });

    // Resume an in-progress match on this connection
    const coordinator = this.deps.sessions.findByPlayer(player.playerId);
    if (coordinator) {
      await coordinator.resync(player.playerId);
    }
  }

  async handle(ctx: ConnectionContext, raw: unknown): Promise<void> {
    const parsed = parseClientMessage(raw);

    if (!parsed.success) {
      ctx.malformed++;
      if (ctx.malformed >= this.deps.maxMalformed) {
        const fatal = new FatalProtocolError();
        logger.warn(`[Socket] Closing ${ctx.connection.id}: ${fatal.message}`);
        await this.send(ctx, { type: 'ERROR', data: { message: fatal.message, code: fatal.code } });
        ctx.connection.close(fatal.message);
        return;
      }
      const issue = parsed.error.issues[0];
      await this.send(ctx, {
        type: 'ERROR',
        data: {
          message: issue ? `Malformed message: ${issue.path.join('.') || 'envelope'} ${issue.message}` : 'Malformed message',
          code: ERROR_CODES.MALFORMED_MESSAGE,
        },
      });
      return;
    }

    ctx.malformed = 0;

    try {
      await this.dispatch(ctx, parsed.data);
    } catch (error) {
      await this.replyError(ctx, error);
    }
  }

  /**
   * Connection closed. A queued player leaves the queue; a player in a
   * match gets the reconnect window instead.
   */
  async close(ctx: ConnectionContext): Promise<void> {
    const playerId = this.deps.connections.unbind(ctx.connection.id);
    if (!playerId || this.deps.sessions.findByPlayer(playerId)) {
      return;
    }
    try {
      await this.deps.matchmaking.dequeue(playerId);
    } catch (error) {
      logger.warn(`[Socket] Could not dequeue ${playerId} on disconnect:`, error);
    }
  }

  // ===========================================
  // Dispatch
  // ===========================================

  private async dispatch(ctx: ConnectionContext, message: InboundMessage): Promise<void> {
    if (message.type === 'AUTHENTICATE') {
      await this.authenticate(ctx, message.data.token);
      return;
    }

    const player = ctx.player;
    if (!player) {
      throw new UnauthorizedError('Authenticate first', ERROR_CODES.NOT_AUTHENTICATED);
    }
    const { playerId } = player;

    switch (message.type) {
      case 'START_MATCHMAKING': {
        const { rating } = await this.deps.ratings.getPlayerRating(playerId);
        const outcome = await this.deps.matchmaking.requestMatch(playerId, rating);
        if (outcome.status === 'queued') {
          await this.send(ctx, {
            type: 'MATCHMAKING_STATUS',
            data: { status: 'queued', poolSize: await this.deps.matchmaking.poolSize() },
          });
        }
        // On a match, MATCH_FOUND comes from the new session
        return;
      }

      case 'CANCEL_MATCHMAKING': {
        await this.deps.matchmaking.dequeue(playerId);
        await this.send(ctx, {
          type: 'MATCHMAKING_STATUS',
          data: { status: 'cancelled', poolSize: await this.deps.matchmaking.poolSize() },
        });
        return;
      }

      case 'SUBMIT_ANSWER': {
        const { data } = message;
        if (data.playerId !== playerId) {
          throw new ForbiddenError('playerId does not match the authenticated player', ERROR_CODES.PLAYER_MISMATCH);
        }
        await this.coordinatorFor(data.matchId).submit({
          playerId,
          round: data.round,
          answer: data.answer,
        });
        return;
      }

      case 'FORFEIT':
        await this.coordinatorFor(message.data.matchId).forfeit(playerId, 'forfeit');
        return;

      case 'SYNC_STATE':
        await this.coordinatorFor(message.data.matchId).resync(playerId);
        return;
    }
  }

  private coordinatorFor(matchId: string): SessionCoordinator {
    const coordinator = this.deps.sessions.get(matchId);
    if (!coordinator) {
      throw new NotFoundError(`Match ${matchId} is not active`, ERROR_CODES.MATCH_NOT_FOUND);
    }
    return coordinator;
  }

  // ===========================================
  // Replies
  // ===========================================

  private async replyError(ctx: ConnectionContext, error: unknown): Promise<void> {
    if (error instanceof AppError) {
      logger.debug(`[Socket] ${ctx.connection.id}: ${error.code} ${error.message}`);
      await this.send(ctx, { type: 'ERROR', data: { message: error.message, code: error.code } });
      return;
    }

    logger.error(`[Socket] Unhandled error on ${ctx.connection.id}:`, error);
    Sentry.captureException(error, { extra: { connectionId: ctx.connection.id, playerId: ctx.player?.playerId } });
    await this.send(ctx, {
      type: 'ERROR',
      data: { message: 'Internal server error', code: ERROR_CODES.INTERNAL_ERROR },
    });
  }

  private async send(ctx: ConnectionContext, message: ServerMessage): Promise<void> {
    try {
      await sendWithTimeout(ctx.connection, message, this.deps.sendTimeoutMs);
    } catch (error) {
      logger.warn(`[Socket] ${message.type} to ${ctx.connection.id} failed:`, error);
    }
  }
}
