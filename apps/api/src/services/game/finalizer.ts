// =====================================================
// Match Finalizer
// =====================================================
// Runs once per match: winner, ratings, persistence, coins, broadcast.
// CRITICAL: finalize() never rejects. Every downstream failure is logged,
// reported and handed to async reconciliation; players always get their
// result. Concurrent or repeated calls for one matchId share one run.

import * as Sentry from '@sentry/node';
import {
  MatchEndReason,
  MatchRecord,
  MatchStatus,
  RatingUpdate,
  ServerMessage,
} from '@triviaduel/shared-types';
import { logger } from '../../utils/logger';
import {
  calculateRatingUpdate,
  getTierForRating,
  MatchOutcome,
  RatingOptions,
} from '../../lib/rating.service';
import { calculateMatchReward } from '../../lib/economy.service';
import type { PlayerNotifier } from '../../socket/broadcaster';
import type {
  CoinCredit,
  MatchResultStore,
  PlayerOutcome,
  PlayerRatingSnapshot,
  PlayerResultUpdate,
  SettlementPayload,
  WalletStore,
} from '../settlement/settlement.types';
import { walletKey } from '../settlement/settlement.types';
import { determineMatchWinner } from './match-winner';
import { MatchSession, opponentOf, scoresOf } from './match-session';

// ===========================================
// Types
// ===========================================

export interface FinalizeRequest {
  reason: MatchEndReason;
  forfeitedBy?: string; // loses by forfeit; the opponent wins
  noContest?: boolean; // nobody played; no winner, no rating change
}

export interface FinalizationResult {
  record: MatchRecord;
  ratingUpdates: Record<string, RatingUpdate>;
  coins: Record<string, number>;
  persisted: boolean;
  settled: boolean;
}

export interface FinalizerDeps {
  results: MatchResultStore;
  wallet: WalletStore;
  notifier: PlayerNotifier;
  pointsPerRound: number;
  reconcile?: (payload: SettlementPayload) => Promise<void>;
  reportError?: (error: unknown, context: Record<string, unknown>) => void;
  onSettled?: (record: MatchRecord) => Promise<void>;
  ratingOptions?: Partial<RatingOptions>;
  now?: () => number;
}

interface Decision {
  winner: string | null;
  isDraw: boolean;
  outcomes: Record<string, PlayerOutcome>;
}

const RESULT_CACHE_LIMIT = 1000;

function defaultReportError(error: unknown, context: Record<string, unknown>): void {
  Sentry.captureException(error, { extra: context });
}

/**
 * GAME_COMPLETED as seen by one participant: their own delta and coins.
 */
export function buildCompletionMessage(
  session: MatchSession,
  result: FinalizationResult,
  playerId: string
): ServerMessage {
  const { record } = result;
  const [a, b] = session.players;
  return {
    type: 'GAME_COMPLETED',
    data: {
      matchId: record.matchId,
      winner: record.winner,
      isDraw: record.isDraw,
      reason: record.reason,
      scores: record.scores,
      stats: { [a]: { ...session.stats[a] }, [b]: { ...session.stats[b] } },
      ratingDelta: record.ratingDelta[playerId] ?? 0,
      rating: result.ratingUpdates[playerId] ?? null,
      coinsEarned: result.coins[playerId] ?? 0,
    },
  };
}

// ===========================================
// Finalizer
// ===========================================

export class Finalizer {
  private readonly inflight = new Map<string, Promise<FinalizationResult>>();
  private readonly completed = new Map<string, FinalizationResult>();
  private readonly reportError: (error: unknown, context: Record<string, unknown>) => void;
  private readonly now: () => number;

  constructor(private readonly deps: FinalizerDeps) {
    this.reportError = deps.reportError ?? defaultReportError;
    this.now = deps.now ?? Date.now;
  }

  finalize(session: MatchSession, request: FinalizeRequest): Promise<FinalizationResult> {
    const done = this.completed.get(session.matchId);
    if (done) {
      return Promise.resolve(done);
    }

    const pending = this.inflight.get(session.matchId);
    if (pending) {
      logger.debug(`[Finalizer] Joining in-flight finalization for ${session.matchId}`);
      return pending;
    }

    const run = this.run(session, request)
      .catch((error: unknown) => this.fallback(session, request, error))
      .finally(() => {
        this.inflight.delete(session.matchId);
      });
    this.inflight.set(session.matchId, run);
    return run;
  }

  getResult(matchId: string): FinalizationResult | null {
    return this.completed.get(matchId) ?? null;
  }

  // ===========================================
  // Steps
  // ===========================================

  private async run(session: MatchSession, request: FinalizeRequest): Promise<FinalizationResult> {
    const decision = this.decide(session, request);
    const ratingUpdates = this.rate(session, decision);

    // The only place winner and ratingDelta are ever written
    const ratingDelta: Record<string, number> = {};
    for (const playerId of session.players) {
      ratingDelta[playerId] = ratingUpdates[playerId]?.delta ?? 0;
    }
    session.winner = decision.winner;
    session.ratingDelta = ratingDelta;
    session.status = request.reason === 'completed' ? MatchStatus.COMPLETED : MatchStatus.ABANDONED;
    session.round = null;
    session.endedAt = this.now();

    const record = this.buildRecord(session, request, decision, ratingUpdates);
    const results: PlayerResultUpdate[] = session.players.map((playerId) => ({
      playerId,
      outcome: decision.outcomes[playerId],
      newRating: ratingUpdates[playerId]?.newRating ?? session.ratings[playerId],
      tier: record.tierAfter[playerId],
    }));

    const persistedPlayers = await this.persist(record, results);
    const credits = this.computeCredits(session, request, decision, persistedPlayers);
    const settled = await this.credit(record.matchId, credits);

    if (persistedPlayers === null || !settled) {
      await this.scheduleReconcile({ record, results, credits });
    }

    const coins: Record<string, number> = {};
    for (const credit of credits) {
      coins[credit.playerId] = credit.amount;
    }

    const result: FinalizationResult = {
      record,
      ratingUpdates,
      coins,
      persisted: persistedPlayers !== null,
      settled,
    };

    this.remember(result);
    await this.announce(session, result);

    logger.info(
      `[Finalizer] Match ${record.matchId} finalized (${record.reason}): winner=${record.winner ?? 'none'} persisted=${result.persisted} settled=${settled}`
    );
    return result;
  }

  private decide(session: MatchSession, request: FinalizeRequest): Decision {
    const [a, b] = session.players;

    if (request.noContest) {
      return { winner: null, isDraw: false, outcomes: { [a]: 'NO_CONTEST', [b]: 'NO_CONTEST' } };
    }

    if (request.forfeitedBy !== undefined) {
      const winner = opponentOf(session, request.forfeitedBy);
      return {
        winner,
        isDraw: false,
        outcomes: { [winner]: 'WIN', [request.forfeitedBy]: 'LOSS' },
      };
    }

    const verdict = determineMatchWinner(a, b, session.stats[a], session.stats[b]);
    logger.debug(`[Finalizer] ${session.matchId}: ${verdict.reason}`);

    if (verdict.winnerId === null) {
      return { winner: null, isDraw: true, outcomes: { [a]: 'DRAW', [b]: 'DRAW' } };
    }

    const loser = opponentOf(session, verdict.winnerId);
    return {
      winner: verdict.winnerId,
      isDraw: false,
      outcomes: { [verdict.winnerId]: 'WIN', [loser]: 'LOSS' },
    };
  }

  private rate(session: MatchSession, decision: Decision): Record<string, RatingUpdate> {
    const updates: Record<string, RatingUpdate> = {};

    for (const playerId of session.players) {
      const outcome = decision.outcomes[playerId];
      if (outcome === 'NO_CONTEST') {
        continue;
      }
      const ratingOutcome: MatchOutcome = outcome;
      updates[playerId] = calculateRatingUpdate(
        {
          rating: session.ratings[playerId],
          opponentRating: session.ratings[opponentOf(session, playerId)],
          outcome: ratingOutcome,
          gamesPlayed: session.gamesPlayed[playerId],
        },
        this.deps.ratingOptions
      );
    }

    return updates;
  }

  private buildRecord(
    session: MatchSession,
    request: FinalizeRequest,
    decision: Decision,
    ratingUpdates: Record<string, RatingUpdate>
  ): MatchRecord {
    const ratingAfter: MatchRecord['ratingAfter'] = {};
    const tierAfter: MatchRecord['tierAfter'] = {};
    const ratingDelta: MatchRecord['ratingDelta'] = {};

    for (const playerId of session.players) {
      const update = ratingUpdates[playerId];
      ratingAfter[playerId] = update ? update.newRating : session.ratings[playerId];
      tierAfter[playerId] = update ? update.newTier : getTierForRating(session.ratings[playerId]);
      ratingDelta[playerId] = update ? update.delta : 0;
    }

    return {
      matchId: session.matchId,
      players: [session.players[0], session.players[1]],
      scores: scoresOf(session),
      winner: decision.winner,
      isDraw: decision.isDraw,
      reason: request.reason,
      ratingDelta,
      ratingAfter,
      tierAfter,
      roundsPlayed: session.currentRound,
      startedAt: new Date(session.startedAt).toISOString(),
      endedAt: new Date(session.endedAt ?? this.now()).toISOString(),
    };
  }

  private async persist(
    record: MatchRecord,
    results: PlayerResultUpdate[]
  ): Promise<Record<string, PlayerRatingSnapshot> | null> {
    try {
      const outcome = await this.deps.results.recordMatch(record, results);
      if (this.deps.onSettled) {
        await this.deps.onSettled(record).catch((error: unknown) => {
          logger.warn(`[Finalizer] Post-settlement hook failed for ${record.matchId}:`, error);
        });
      }
      return outcome.players;
    } catch (error) {
      logger.error(`[Finalizer] Failed to persist match ${record.matchId}:`, error);
      this.reportError(error, { matchId: record.matchId, step: 'persist' });
      return null;
    }
  }

  private computeCredits(
    session: MatchSession,
    request: FinalizeRequest,
    decision: Decision,
    players: Record<string, PlayerRatingSnapshot> | null
  ): CoinCredit[] {
    return session.players.map((playerId) => {
      const input = {
        outcome: decision.outcomes[playerId],
        roundsWon: Math.round(session.stats[playerId].score / this.deps.pointsPerRound),
        roundsLost: Math.round(session.stats[opponentOf(session, playerId)].score / this.deps.pointsPerRound),
        totalRounds: session.maxRounds,
        forfeited: request.forfeitedBy === playerId,
      };
      const streak = players?.[playerId]?.currentStreak;
      // Streak unknown: show the amount without bonus, credit it on reconcile
      if (streak === undefined && input.outcome === 'WIN' && !input.forfeited) {
        return {
          playerId,
          amount: calculateMatchReward({ ...input, winStreak: 0 }).total,
          pendingReward: input,
        };
      }
      return { playerId, amount: calculateMatchReward({ ...input, winStreak: streak ?? 0 }).total };
    });
  }

  /** False when any credit failed or was held back for reconciliation. */
  private async credit(matchId: string, credits: CoinCredit[]): Promise<boolean> {
    try {
      let complete = true;
      for (const { playerId, amount, pendingReward } of credits) {
        if (pendingReward) {
          complete = false;
        } else if (amount > 0) {
          await this.deps.wallet.credit(playerId, amount, walletKey(matchId, playerId), 'match_reward');
        }
      }
      return complete;
    } catch (error) {
      logger.error(`[Finalizer] Failed to credit rewards for ${matchId}:`, error);
      this.reportError(error, { matchId, step: 'economy' });
      return false;
    }
  }

  private async scheduleReconcile(payload: SettlementPayload): Promise<void> {
    if (!this.deps.reconcile) {
      logger.warn(`[Finalizer] No reconciler configured; settlement for ${payload.record.matchId} is incomplete`);
      return;
    }
    try {
      await this.deps.reconcile(payload);
      logger.info(`[Finalizer] Queued settlement reconciliation for ${payload.record.matchId}`);
    } catch (error) {
      logger.error(`[Finalizer] Could not queue reconciliation for ${payload.record.matchId}:`, error);
      this.reportError(error, { matchId: payload.record.matchId, step: 'reconcile' });
    }
  }

  private async announce(session: MatchSession, result: FinalizationResult): Promise<void> {
    try {
      await this.deps.notifier.broadcast(session.players, (playerId) =>
        buildCompletionMessage(session, result, playerId)
      );
    } catch (error) {
      logger.error(`[Finalizer] Broadcast failed for ${result.record.matchId}:`, error);
      this.reportError(error, { matchId: result.record.matchId, step: 'broadcast' });
    }
  }

  /**
   * Last resort when a step outside the guarded collaborators threw:
   * close the session with no rating change and still tell both players.
   */
  private async fallback(
    session: MatchSession,
    request: FinalizeRequest,
    error: unknown
  ): Promise<FinalizationResult> {
    logger.error(`[Finalizer] Finalization of ${session.matchId} failed, closing without settlement:`, error);
    this.reportError(error, { matchId: session.matchId, step: 'finalize' });

    const [a, b] = session.players;
    session.winner = null;
    session.ratingDelta = { [a]: 0, [b]: 0 };
    session.status = MatchStatus.ABANDONED;
    session.round = null;
    session.endedAt = session.endedAt ?? this.now();

    const result: FinalizationResult = {
      record: {
        matchId: session.matchId,
        players: [a, b],
        scores: scoresOf(session),
        winner: null,
        isDraw: false,
        reason: request.reason,
        ratingDelta: { [a]: 0, [b]: 0 },
        ratingAfter: { [a]: session.ratings[a], [b]: session.ratings[b] },
        tierAfter: { [a]: getTierForRating(session.ratings[a]), [b]: getTierForRating(session.ratings[b]) },
        roundsPlayed: session.currentRound,
        startedAt: new Date(session.startedAt).toISOString(),
        endedAt: new Date(session.endedAt).toISOString(),
      },
      ratingUpdates: {},
      coins: { [a]: 0, [b]: 0 },
      persisted: false,
      settled: false,
    };

    this.remember(result);
    await this.announce(session, result);
    return result;
  }

  private remember(result: FinalizationResult): void {
    this.completed.set(result.record.matchId, result);
    if (this.completed.size > RESULT_CACHE_LIMIT) {
      const oldest = this.completed.keys().next();
      if (!oldest.done) {
        this.completed.delete(oldest.value);
      }
    }
  }
}
