// =====================================================
// Game Runtime
// =====================================================
// Wires the matchmaking, session, settlement and transport pieces into
// one object. index.ts builds it with Redis/PostgreSQL collaborators;
// tests build it with the in-memory ones.

import { ERROR_CODES } from '@triviaduel/shared-types';
import type { MatchLookupResponse, ServerMessage } from '@triviaduel/shared-types';
import { config } from './config';
import { logger } from './utils/logger';
import type { RatingOptions } from './lib/rating.service';
import type { QuestionProvider } from './services/content/question-provider';
import { Finalizer } from './services/game/finalizer';
import { isParticipant } from './services/game/match-session';
import { GameOptions, SessionCoordinator } from './services/game/session-coordinator';
import { SessionRegistry, SweepReport } from './services/game/session-registry';
import type { SessionStore } from './services/game/session-store';
import { MatchFormationService } from './services/matchmaking/match-formation.service';
import { MatchmakingService } from './services/matchmaking/matchmaking.service';
import type { WaitingPool } from './services/matchmaking/waiting-pool';
import { RatingLookupService } from './services/settlement/rating-lookup.service';
import type {
  MatchResultStore,
  RatingStore,
  SettlementPayload,
  WalletStore,
} from './services/settlement/settlement.types';
import { IdentityProvider, JwtIdentityProvider } from './modules/auth/identity.service';
import { ConnectionRegistry } from './socket/connection-registry';
import { MessageRouter } from './socket/message-router';
import { ForbiddenError, NotFoundError } from './utils/errors';

// ===========================================
// Types
// ===========================================

export interface GameRuntimeDeps {
  pool: WaitingPool;
  results: MatchResultStore;
  ratingStore: RatingStore;
  wallet: WalletStore;
  questions: QuestionProvider;
  sessionStore: SessionStore;
  identity?: IdentityProvider;
  ratingCache?: boolean;
  reconcile?: (payload: SettlementPayload) => Promise<void>;
  game?: Partial<GameOptions>;
  transport?: Partial<{ reconnectWindowMs: number; sendTimeoutMs: number; maxMalformedMessages: number }>;
  ratingOptions?: Partial<RatingOptions>;
  now?: () => number;
}

export interface GameRuntime {
  connections: ConnectionRegistry;
  sessions: SessionRegistry;
  matchmaking: MatchmakingService;
  finalizer: Finalizer;
  router: MessageRouter;
  ratings: RatingLookupService;
  identity: IdentityProvider;
  /** Live session, then Redis snapshot, then the durable record. */
  findMatch(matchId: string, playerId: string): Promise<MatchLookupResponse>;
  sweep(graceMs?: number): Promise<SweepReport>;
  shutdown(): void;
}

// ===========================================
// Factory
// ===========================================

export function createGameRuntime(deps: GameRuntimeDeps): GameRuntime {
  const now = deps.now ?? Date.now;
  const game: GameOptions = {
    maxRounds: deps.game?.maxRounds ?? config.game.maxRounds,
    roundDurationMs: deps.game?.roundDurationMs ?? config.game.roundDurationMs,
    interRoundDelayMs: deps.game?.interRoundDelayMs ?? config.game.interRoundDelayMs,
    pointsPerRound: deps.game?.pointsPerRound ?? config.game.pointsPerRound,
  };
  const transport = {
    reconnectWindowMs: deps.transport?.reconnectWindowMs ?? config.transport.reconnectWindowMs,
    sendTimeoutMs: deps.transport?.sendTimeoutMs ?? config.transport.sendTimeoutMs,
    maxMalformedMessages: deps.transport?.maxMalformedMessages ?? config.transport.maxMalformedMessages,
  };

  const ratings = new RatingLookupService(deps.ratingStore, deps.ratingCache ?? true);
  const identity = deps.identity ?? new JwtIdentityProvider(ratings);
  const connections = new ConnectionRegistry(transport);

  const finalizer = new Finalizer({
    results: deps.results,
    wallet: deps.wallet,
    notifier: connections,
    pointsPerRound: game.pointsPerRound,
    reconcile: deps.reconcile,
    ratingOptions: deps.ratingOptions,
    now,
    onSettled: async (record) => {
      await Promise.all(record.players.map((playerId) => ratings.invalidate(playerId)));
    },
  });

  const sessions = new SessionRegistry(
    (session, release) =>
      new SessionCoordinator(session, {
        questions: deps.questions,
        notifier: connections,
        finalizer,
        options: game,
        now,
        onStateChange: async (view) => {
          await deps.sessionStore.save(view);
        },
        onClosed: (closed) => {
          release(closed);
          connections.detachMatch(closed.matchId);
        },
      }),
    { maxRounds: game.maxRounds, now }
  );

  const formation = new MatchFormationService(
    deps.pool,
    async (first, second) => {
      const [firstRating, secondRating] = await Promise.all([
        ratings.getPlayerRating(first.playerId),
        ratings.getPlayerRating(second.playerId),
      ]);
      const coordinator = sessions.create(
        { playerId: first.playerId, rating: first.rating, gamesPlayed: firstRating.gamesPlayed },
        { playerId: second.playerId, rating: second.rating, gamesPlayed: secondRating.gamesPlayed }
      );
      connections.attachMatch(coordinator.session.players, coordinator.matchId);
      coordinator.start().catch((error: unknown) => {
        logger.error(`[Game] Match ${coordinator.matchId} failed to start:`, error);
      });
      return coordinator.matchId;
    },
    { maxAttempts: config.matchmaking.maxFormationAttempts, now }
  );

  const matchmaking = new MatchmakingService({
    pool: deps.pool,
    formation,
    activeMatchOf: (playerId) => sessions.activeMatchIdFor(playerId),
    now,
  });

  const router = new MessageRouter({
    identity,
    ratings,
    matchmaking,
    sessions,
    connections,
    maxMalformed: transport.maxMalformedMessages,
    sendTimeoutMs: transport.sendTimeoutMs,
  });

  connections.setPresenceListener({
    playerDisconnected: (playerId, matchId) => {
      notifyOpponent(playerId, matchId, {
        type: 'OPPONENT_DISCONNECTED',
        data: { matchId, reconnectWindowMs: transport.reconnectWindowMs },
      });
    },
    playerReconnected: (playerId, matchId) => {
      notifyOpponent(playerId, matchId, { type: 'OPPONENT_RECONNECTED', data: { matchId } });
    },
    reconnectWindowExpired: (playerId, matchId) => {
      const coordinator = sessions.get(matchId);
      if (!coordinator) {
        return;
      }
      coordinator.forfeit(playerId, 'disconnect_timeout').catch((error: unknown) => {
        logger.error(`[Game] Disconnect forfeit for ${playerId} in ${matchId} failed:`, error);
      });
    },
  });

  function notifyOpponent(
    playerId: string,
    matchId: string,
    message: ServerMessage
  ): void {
    const coordinator = sessions.get(matchId);
    if (!coordinator) {
      return;
    }
    for (const other of coordinator.session.players) {
      if (other !== playerId) {
        connections.sendToPlayer(other, message).catch((error: unknown) => {
          logger.warn(`[Socket] ${message.type} to ${other} failed:`, error);
        });
      }
    }
  }

  async function findMatch(matchId: string, playerId: string): Promise<MatchLookupResponse> {
    const live = sessions.get(matchId);
    if (live) {
      if (!isParticipant(live.session, playerId)) {
        throw new ForbiddenError('Not a participant in this match', ERROR_CODES.NOT_A_PARTICIPANT);
      }
      return { source: 'live', match: live.view() };
    }

    const snapshot = await deps.sessionStore.load(matchId);
    if (snapshot.status === 'hit') {
      if (!snapshot.value.players.includes(playerId)) {
        throw new ForbiddenError('Not a participant in this match', ERROR_CODES.NOT_A_PARTICIPANT);
      }
      return { source: 'snapshot', match: snapshot.value };
    }

    const record = await deps.results.getMatch(matchId);
    if (!record) {
      throw new NotFoundError(`Match ${matchId} not found`, ERROR_CODES.MATCH_NOT_FOUND);
    }
    if (!record.players.includes(playerId)) {
      throw new ForbiddenError('Not a participant in this match', ERROR_CODES.NOT_A_PARTICIPANT);
    }
    return { source: 'history', record };
  }

  async function sweep(graceMs: number = config.game.idleGraceMs): Promise<SweepReport> {
    await matchmaking.purgeExpired();
    return sessions.sweepIdle(graceMs, now());
  }

  return {
    connections,
    sessions,
    matchmaking,
    finalizer,
    router,
    ratings,
    identity,
    findMatch,
    sweep,
    shutdown: () => {
      sessions.disposeAll();
      connections.closeAll('Server shutting down');
    },
  };
}
