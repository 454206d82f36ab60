// =====================================================
// Session Coordinator
// =====================================================
// Owns the state machine of one match:
//
//   FORMING -> IN_ROUND(1) -> ROUND_RESOLVED(1) -> IN_ROUND(2) -> ...
//     -> ROUND_RESOLVED(maxRounds) -> COMPLETED
//   IN_ROUND / ROUND_RESOLVED -> ABANDONED   (forfeit, disconnect or idle timeout)
//   any live state -> ERROR                  (content failure, internal fault)
//
// Every mutation runs through runExclusive, so a submission, a timer and a
// forfeit for the same match never interleave. Round N+1 is only scheduled
// after round N has been resolved and broadcast.

import * as Sentry from '@sentry/node';
import {
  ERROR_CODES,
  ErrorCode,
  MatchStatus,
  MatchView,
} from '@triviaduel/shared-types';
import { logger } from '../../utils/logger';
import { ForbiddenError, ValidationError } from '../../utils/errors';
import type { PlayerNotifier } from '../../socket/broadcaster';
import type { QuestionProvider, RoundQuestion } from '../content/question-provider';
import {
  buildCompletionMessage,
  FinalizationResult,
  Finalizer,
  FinalizeRequest,
} from './finalizer';
import {
  isParticipant,
  isTerminal,
  MatchSession,
  opponentOf,
  scoresOf,
  toMatchView,
} from './match-session';
import { resolveRound } from './round-resolver';

// ===========================================
// Types
// ===========================================

export interface GameOptions {
  maxRounds: number;
  roundDurationMs: number;
  interRoundDelayMs: number;
  pointsPerRound: number;
}

export interface CoordinatorDeps {
  questions: QuestionProvider;
  notifier: PlayerNotifier;
  finalizer: Finalizer;
  options: GameOptions;
  now?: () => number;
  onStateChange?: (view: MatchView) => Promise<void>;
  onClosed?: (session: MatchSession) => void;
}

export interface AnswerInput {
  playerId: string;
  round: number;
  answer: string;
}

export interface SubmitResult {
  accepted: true;
  round: number;
  roundClosed: boolean;
}

export type ForfeitReason = 'forfeit' | 'disconnect_timeout' | 'idle_timeout';

// ===========================================
// Coordinator
// ===========================================

export class SessionCoordinator {
  private chain: Promise<unknown> = Promise.resolve();
  private roundTimer: NodeJS.Timeout | null = null;
  private nextRoundTimer: NodeJS.Timeout | null = null;
  private closed = false;
  private readonly now: () => number;

  constructor(
    readonly session: MatchSession,
    private readonly deps: CoordinatorDeps
  ) {
    this.now = deps.now ?? Date.now;
  }

  get matchId(): string {
    return this.session.matchId;
  }

  get status(): MatchStatus {
    return this.session.status;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  view(): MatchView {
    return toMatchView(this.session);
  }

  /** Most recent activity by either player. */
  lastActivityAt(): number {
    const [a, b] = this.session.players;
    return Math.max(this.session.lastActivityAt[a], this.session.lastActivityAt[b]);
  }

  // ===========================================
  // Public Operations
  // ===========================================

  /**
   * Announce the match to both players and open round 1.
   */
  start(): Promise<void> {
    return this.runExclusive(async () => {
      if (this.session.status !== MatchStatus.FORMING) {
        return;
      }

      const { matchId, players, ratings, maxRounds } = this.session;
      await this.deps.notifier.broadcast(players, (playerId) => {
        const opponentId = opponentOf(this.session, playerId);
        return {
          type: 'MATCH_FOUND',
          data: { matchId, opponentId, opponentRating: ratings[opponentId], maxRounds },
        };
      });

      await this.beginRound(1);
    });
  }

  submit(input: AnswerInput): Promise<SubmitResult> {
    return this.runExclusive(async () => {
      const { session } = this;
      const receivedAt = this.now();

      if (!isParticipant(session, input.playerId)) {
        throw new ForbiddenError('Not a participant in this match', ERROR_CODES.NOT_A_PARTICIPANT);
      }
      if (isTerminal(session.status)) {
        throw new ValidationError('Match is no longer active', ERROR_CODES.MATCH_NOT_ACTIVE);
      }

      const round = session.round;
      if (
        session.status !== MatchStatus.IN_ROUND ||
        round === null ||
        round.number !== input.round ||
        receivedAt > round.deadline
      ) {
        throw new ValidationError(`Round ${input.round} is not open`, ERROR_CODES.ROUND_CLOSED);
      }
      if (round.submissions.has(input.playerId)) {
        throw new ValidationError(
          `Answer for round ${input.round} already submitted`,
          ERROR_CODES.DUPLICATE_SUBMISSION
        );
      }

      round.submissions.set(input.playerId, {
        playerId: input.playerId,
        matchId: session.matchId,
        round: round.number,
        answer: input.answer,
        receivedAt,
        elapsedMs: receivedAt - round.startedAt,
      });
      session.lastActivityAt[input.playerId] = receivedAt;

      await this.deps.notifier.sendToPlayer(input.playerId, {
        type: 'ANSWER_RECEIVED',
        data: { matchId: session.matchId, round: round.number },
      });

      const roundClosed = round.submissions.size === session.players.length;
      if (roundClosed) {
        await this.closeRound(round.number);
      }

      return { accepted: true, round: input.round, roundClosed };
    });
  }

  /**
   * `playerId` loses; the opponent is awarded the match. Returns the
   * existing result if the match already ended.
   */
  forfeit(playerId: string, reason: ForfeitReason = 'forfeit'): Promise<FinalizationResult | null> {
    return this.runExclusive(async () => {
      if (!isParticipant(this.session, playerId)) {
        throw new ForbiddenError('Not a participant in this match', ERROR_CODES.NOT_A_PARTICIPANT);
      }
      if (isTerminal(this.session.status)) {
        return this.deps.finalizer.getResult(this.matchId);
      }

      logger.info(`[Game] ${playerId} forfeits match ${this.matchId} (${reason})`);
      return this.finish({ reason, forfeitedBy: playerId });
    });
  }

  /**
   * End a match nobody is playing: no winner, no rating change.
   */
  abandon(reason: ForfeitReason = 'idle_timeout'): Promise<FinalizationResult | null> {
    return this.runExclusive(async () => {
      if (isTerminal(this.session.status)) {
        return this.deps.finalizer.getResult(this.matchId);
      }
      logger.info(`[Game] Match ${this.matchId} abandoned with no contest (${reason})`);
      return this.finish({ reason, noContest: true });
    });
  }

  /**
   * Re-send the current state to one player (reconnect or explicit sync).
   */
  resync(playerId: string): Promise<void> {
    return this.runExclusive(async () => {
      const { session } = this;
      if (!isParticipant(session, playerId)) {
        throw new ForbiddenError('Not a participant in this match', ERROR_CODES.NOT_A_PARTICIPANT);
      }

      session.lastActivityAt[playerId] = this.now();

      if (isTerminal(session.status)) {
        const result = this.deps.finalizer.getResult(this.matchId);
        if (result) {
          await this.deps.notifier.sendToPlayer(playerId, buildCompletionMessage(session, result, playerId));
        }
        return;
      }

      if (session.status === MatchStatus.IN_ROUND && session.round) {
        await this.deps.notifier.sendToPlayer(playerId, {
          type: 'GAME_STATE',
          data: {
            matchId: session.matchId,
            round: session.round.number,
            maxRounds: session.maxRounds,
            question: session.round.question,
            timeRemaining: Math.max(0, session.round.deadline - this.now()),
            scores: scoresOf(session),
          },
        });
      }
    });
  }

  /**
   * Resolves once every queued operation, timer-driven ones included,
   * has run.
   */
  async settled(): Promise<void> {
    let current: Promise<unknown>;
    do {
      current = this.chain;
      await current;
    } while (current !== this.chain);
  }

  /** Stop timers without finalizing (shutdown). */
  dispose(): void {
    this.clearTimers();
    this.closed = true;
  }

  // ===========================================
  // Transitions
  // ===========================================

  private async beginRound(roundNumber: number): Promise<void> {
    const { session } = this;
    if (this.closed || isTerminal(session.status)) {
      return;
    }
    if (roundNumber > session.maxRounds) {
      await this.finish({ reason: 'completed' });
      return;
    }

    let question: RoundQuestion;
    try {
      question = await this.deps.questions.getQuestion(session.matchId, roundNumber, session.usedQuestionIds);
    } catch (error) {
      await this.fail(error, ERROR_CODES.CONTENT_UNAVAILABLE, 'Question content is unavailable');
      return;
    }

    const startedAt = this.now();
    const duration = this.deps.options.roundDurationMs;

    session.currentRound = roundNumber;
    session.status = MatchStatus.IN_ROUND;
    session.usedQuestionIds.push(question.questionId);
    session.round = {
      number: roundNumber,
      questionId: question.questionId,
      question: question.payload,
      correctAnswer: question.correctAnswer,
      startedAt,
      deadline: startedAt + duration,
      submissions: new Map(),
    };

    await this.deps.notifier.broadcast(session.players, {
      type: 'GAME_STATE',
      data: {
        matchId: session.matchId,
        round: roundNumber,
        maxRounds: session.maxRounds,
        question: question.payload,
        timeRemaining: duration,
        scores: scoresOf(session),
      },
    });

    this.roundTimer = setTimeout(() => {
      this.roundTimer = null;
      this.schedule(() => this.closeRound(roundNumber));
    }, duration);

    await this.publishState();
    logger.debug(`[Game] Match ${session.matchId} round ${roundNumber} open for ${duration}ms`);
  }

  private async closeRound(roundNumber: number): Promise<void> {
    const { session } = this;
    const round = session.round;

    // A timer can fire after both answers already closed the round
    if (session.status !== MatchStatus.IN_ROUND || round === null || round.number !== roundNumber) {
      return;
    }

    if (this.roundTimer) {
      clearTimeout(this.roundTimer);
      this.roundTimer = null;
    }

    const resolution = resolveRound({
      players: session.players,
      stats: session.stats,
      submissions: [...round.submissions.values()],
      correctAnswer: round.correctAnswer,
      pointsPerRound: this.deps.options.pointsPerRound,
      roundDurationMs: this.deps.options.roundDurationMs,
    });

    session.stats = resolution.stats;
    session.status = MatchStatus.ROUND_RESOLVED;

    await this.deps.notifier.broadcast(session.players, {
      type: 'ROUND_RESULT',
      data: {
        matchId: session.matchId,
        round: roundNumber,
        winner: resolution.winner,
        scores: scoresOf(session),
        correctAnswer: round.correctAnswer,
      },
    });

    if (roundNumber >= session.maxRounds) {
      await this.finish({ reason: 'completed' });
      return;
    }

    await this.publishState();

    this.nextRoundTimer = setTimeout(() => {
      this.nextRoundTimer = null;
      this.schedule(() => this.beginRound(roundNumber + 1));
    }, this.deps.options.interRoundDelayMs);
  }

  private async finish(request: FinalizeRequest): Promise<FinalizationResult> {
    this.clearTimers();
    const result = await this.deps.finalizer.finalize(this.session, request);
    await this.publishState();
    this.close();
    return result;
  }

  private async fail(error: unknown, code: ErrorCode, message: string): Promise<void> {
    const { session } = this;
    logger.error(`[Game] Match ${session.matchId} failed: ${message}`, error);
    Sentry.captureException(error, { extra: { matchId: session.matchId, round: session.currentRound } });

    this.clearTimers();
    session.status = MatchStatus.ERROR;
    session.round = null;
    session.endedAt = this.now();

    await this.deps.notifier.broadcast(session.players, {
      type: 'ERROR',
      data: { message: `Match aborted: ${message}`, code },
    });

    await this.publishState();
    this.close();
  }

  // ===========================================
  // Plumbing
  // ===========================================

  private runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.chain.then(task);
    this.chain = run.catch(() => undefined);
    return run;
  }

  /** Timer-driven work; faults land in the ERROR state instead of escaping. */
  private schedule(task: () => Promise<void>): void {
    this.runExclusive(task).catch((error: unknown) =>
      this.runExclusive(() => this.fail(error, ERROR_CODES.INTERNAL_ERROR, 'Internal error')).catch(
        (nested: unknown) => {
          logger.error(`[Game] Could not mark match ${this.matchId} as failed:`, nested);
        }
      )
    );
  }

  private async publishState(): Promise<void> {
    if (!this.deps.onStateChange) {
      return;
    }
    try {
      await this.deps.onStateChange(toMatchView(this.session));
    } catch (error) {
      logger.warn(`[Game] Snapshot of ${this.matchId} not stored:`, error);
    }
  }

  private clearTimers(): void {
    if (this.roundTimer) {
      clearTimeout(this.roundTimer);
      this.roundTimer = null;
    }
    if (this.nextRoundTimer) {
      clearTimeout(this.nextRoundTimer);
      this.nextRoundTimer = null;
    }
  }

  private close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.deps.onClosed?.(this.session);
  }
}
