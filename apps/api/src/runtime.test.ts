import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MatchStatus, RatingTier } from '@triviaduel/shared-types';
import { ForbiddenError, NotFoundError } from './utils/errors';
import { FakeConnection, GatedRatingStore } from '../test/helpers/fakes';
import { buildTestRuntime, TestRuntime } from '../test/helpers/runtime';

vi.mock('@sentry/node', () => ({ captureException: vi.fn() }));

const T0 = new Date('2026-03-01T12:00:00.000Z').getTime();

describe('createGameRuntime', () => {
  let harness: TestRuntime;

  beforeEach(() => {
    // Installed before the runtime captures its clock
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    harness = buildTestRuntime();
  });

  afterEach(() => {
    harness.runtime.shutdown();
    vi.useRealTimers();
  });

  async function join(playerId: string): Promise<FakeConnection> {
    const connection = new FakeConnection(`conn-${playerId}`);
    const ctx = harness.runtime.router.open(connection);
    await harness.runtime.router.authenticate(ctx, `token-${playerId}`);
    await harness.runtime.router.handle(ctx, { type: 'START_MATCHMAKING' });
    return connection;
  }

  async function startMatch(): Promise<string> {
    await join('alice');
    await join('bob');
    const coordinator = harness.runtime.sessions.findByPlayer('alice');
    if (!coordinator) {
      throw new Error('match was not formed');
    }
    await coordinator.settled();
    return coordinator.matchId;
  }

  describe('findMatch', () => {
    it('returns the live view to a participant', async () => {
      const matchId = await startMatch();

      const found = await harness.runtime.findMatch(matchId, 'alice');

      expect(found.source).toBe('live');
      if (found.source !== 'history') {
        expect(found.match.status).toBe(MatchStatus.IN_ROUND);
        expect(found.match.currentRound).toBe(1);
      }
    });

    it('refuses a non-participant', async () => {
      const matchId = await startMatch();

      await expect(harness.runtime.findMatch(matchId, 'carol')).rejects.toBeInstanceOf(ForbiddenError);
    });

    it('falls back to the snapshot once the session is released', async () => {
      const matchId = await startMatch();
      const coordinator = harness.runtime.sessions.get(matchId);
      await coordinator?.forfeit('alice');

      expect(harness.runtime.sessions.get(matchId)).toBeNull();
      const found = await harness.runtime.findMatch(matchId, 'bob');

      expect(found.source).toBe('snapshot');
      if (found.source !== 'history') {
        expect(found.match.status).toBe(MatchStatus.ABANDONED);
        expect(found.match.winner).toBe('bob');
      }
    });

    it('falls back to the durable record', async () => {
      await harness.results.recordMatch(
        {
          matchId: 'old-match',
          players: ['alice', 'bob'],
          scores: { alice: 100, bob: 0 },
          winner: 'alice',
          isDraw: false,
          reason: 'completed',
          ratingDelta: { alice: 16, bob: -16 },
          ratingAfter: { alice: 1016, bob: 984 },
          tierAfter: { alice: RatingTier.APPRENTICE, bob: RatingTier.NOVICE },
          roundsPlayed: 5,
          startedAt: '2026-02-01T00:00:00.000Z',
          endedAt: '2026-02-01T00:01:00.000Z',
        },
        []
      );

      const found = await harness.runtime.findMatch('old-match', 'bob');

      expect(found.source).toBe('history');
      if (found.source === 'history') {
        expect(found.record.winner).toBe('alice');
      }
      await expect(harness.runtime.findMatch('old-match', 'carol')).rejects.toBeInstanceOf(ForbiddenError);
    });

    it('reports an unknown match', async () => {
      await expect(harness.runtime.findMatch('missing', 'alice')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('sweep', () => {
    it('purges waiting entries whose heartbeat lapsed', async () => {
      await join('carol');
      expect(await harness.runtime.matchmaking.poolSize()).toBe(1);

      vi.setSystemTime(T0 + 601_000);
      await harness.runtime.sweep();

      expect(await harness.runtime.matchmaking.poolSize()).toBe(0);
    });

    it('forfeits the idle player when the other is active', async () => {
      const matchId = await startMatch();
      const coordinator = harness.runtime.sessions.get(matchId);

      vi.setSystemTime(T0 + 100_000);
      await coordinator?.resync('alice');
      vi.setSystemTime(T0 + 150_000);
      const report = await harness.runtime.sweep(120_000);

      expect(report).toEqual({ forfeited: [matchId], abandoned: [] });
      const record = await harness.results.getMatch(matchId);
      expect(record?.winner).toBe('alice');
      expect(record?.reason).toBe('idle_timeout');
    });

    it('ends a match with no contest when both players are idle', async () => {
      const matchId = await startMatch();

      vi.setSystemTime(T0 + 150_000);
      const report = await harness.runtime.sweep(120_000);

      expect(report).toEqual({ forfeited: [], abandoned: [matchId] });
      const record = await harness.results.getMatch(matchId);
      expect(record?.winner).toBeNull();
      expect(record?.ratingDelta).toEqual({ alice: 0, bob: 0 });
      expect(await harness.wallet.getBalance('alice')).toBe(0);
    });
  });

  it('serves the winner rating after a forfeit', async () => {
    const matchId = await startMatch();
    await harness.runtime.sessions.get(matchId)?.forfeit('bob');

    const alice = await harness.runtime.ratings.getPlayerRating('alice');
    expect(alice.rating).toBe(1016);
    expect(alice.gamesPlayed).toBe(1);
  });
});

describe('match formation racing a re-poll', () => {
  let harness: TestRuntime;
  let ratingStore: GatedRatingStore;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    harness = buildTestRuntime(['alice', 'bob', 'carol'], {
      ratingStore: (results) => {
        ratingStore = new GatedRatingStore(results);
        return ratingStore;
      },
    });
  });

  afterEach(() => {
    harness.runtime.shutdown();
    vi.useRealTimers();
  });

  it('does not leave a matched player in the pool when they re-queue mid-formation', async () => {
    const { matchmaking, sessions } = harness.runtime;
    expect(await matchmaking.requestMatch('alice', 1000)).toEqual({ status: 'queued' });

    ratingStore.close();
    const parked = ratingStore.nextParkedLookup();
    const bobRequest = matchmaking.requestMatch('bob', 1000);
    await parked;

    // alice's entry is claimed; the session does not exist yet
    expect(await matchmaking.requestMatch('alice', 1000)).toEqual({ status: 'queued' });

    ratingStore.open();
    const bobResult = await bobRequest;
    expect(bobResult).toMatchObject({ status: 'matched', opponentId: 'alice' });

    const coordinator = sessions.findByPlayer('alice');
    expect(coordinator?.matchId).toBe(bobResult.matchId);
    await coordinator?.settled();
    expect(await matchmaking.status('alice')).toMatchObject({ waiting: false, activeMatchId: bobResult.matchId });
    expect(await matchmaking.poolSize()).toBe(0);

    expect(await matchmaking.requestMatch('carol', 1000)).toEqual({ status: 'queued' });
  });
});
