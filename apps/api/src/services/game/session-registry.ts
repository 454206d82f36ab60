// =====================================================
// Session Registry
// =====================================================
// Live coordinators by matchId, plus the player -> matchId index used to
// refuse a second queue entry and to route socket traffic.

import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../utils/logger';
import { PlayerInMatchError } from '../../utils/errors';
import { createMatchSession, MatchSession, SessionPlayer } from './match-session';
import type { SessionCoordinator } from './session-coordinator';

export type CoordinatorFactory = (
  session: MatchSession,
  onClosed: (session: MatchSession) => void
) => SessionCoordinator;

export interface SessionRegistryOptions {
  maxRounds: number;
  now?: () => number;
  newMatchId?: () => string;
}

export interface SweepReport {
  forfeited: string[]; // matchIds ended by one player's inactivity
  abandoned: string[]; // matchIds where neither player was active
}

export class SessionRegistry {
  private readonly sessions = new Map<string, SessionCoordinator>();
  private readonly playerIndex = new Map<string, string>();
  private readonly now: () => number;
  private readonly newMatchId: () => string;

  constructor(
    private readonly factory: CoordinatorFactory,
    private readonly options: SessionRegistryOptions
  ) {
    this.now = options.now ?? Date.now;
    this.newMatchId = options.newMatchId ?? uuidv4;
  }

  /**
   * Create and register a session. Does not start it.
   */
  create(first: SessionPlayer, second: SessionPlayer): SessionCoordinator {
    const busy = new Map<string, string>();
    for (const { playerId } of [first, second]) {
      const existing = this.playerIndex.get(playerId);
      if (existing) {
        busy.set(playerId, existing);
      }
    }
    if (busy.size > 0) {
      throw new PlayerInMatchError(busy);
    }

    const session = createMatchSession(this.newMatchId(), first, second, this.options.maxRounds, this.now());
    const coordinator = this.factory(session, (closed) => this.release(closed.matchId));

    this.sessions.set(session.matchId, coordinator);
    this.playerIndex.set(first.playerId, session.matchId);
    this.playerIndex.set(second.playerId, session.matchId);

    logger.info(`[Game] Session ${session.matchId} created: ${first.playerId} vs ${second.playerId}`);
    return coordinator;
  }

  get(matchId: string): SessionCoordinator | null {
    return this.sessions.get(matchId) ?? null;
  }

  findByPlayer(playerId: string): SessionCoordinator | null {
    const matchId = this.playerIndex.get(playerId);
    return matchId ? this.get(matchId) : null;
  }

  activeMatchIdFor(playerId: string): string | null {
    return this.playerIndex.get(playerId) ?? null;
  }

  release(matchId: string): void {
    const coordinator = this.sessions.get(matchId);
    if (!coordinator) {
      return;
    }
    this.sessions.delete(matchId);
    for (const playerId of coordinator.session.players) {
      if (this.playerIndex.get(playerId) === matchId) {
        this.playerIndex.delete(playerId);
      }
    }
    logger.debug(`[Game] Session ${matchId} released`);
  }

  /**
   * End sessions with no recent activity. A lone idle player forfeits; a
   * match where both are idle ends with no contest.
   */
  async sweepIdle(graceMs: number, now: number = this.now()): Promise<SweepReport> {
    const report: SweepReport = { forfeited: [], abandoned: [] };

    for (const coordinator of [...this.sessions.values()]) {
      const { session } = coordinator;
      const idle = session.players.filter((playerId) => now - session.lastActivityAt[playerId] > graceMs);

      if (idle.length === 2) {
        await coordinator.abandon('idle_timeout');
        report.abandoned.push(session.matchId);
      } else if (idle.length === 1) {
        await coordinator.forfeit(idle[0], 'idle_timeout');
        report.forfeited.push(session.matchId);
      }
    }

    if (report.forfeited.length > 0 || report.abandoned.length > 0) {
      logger.info(
        `[Game] Idle sweep ended ${report.forfeited.length} forfeited and ${report.abandoned.length} abandoned sessions`
      );
    }
    return report;
  }

  size(): number {
    return this.sessions.size;
  }

  /** Stop every coordinator's timers (shutdown). */
  disposeAll(): void {
    for (const coordinator of this.sessions.values()) {
      coordinator.dispose();
    }
    this.sessions.clear();
    this.playerIndex.clear();
  }
}
