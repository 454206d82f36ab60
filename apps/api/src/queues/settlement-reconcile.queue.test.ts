import { describe, it, expect, vi } from 'vitest';
import { MatchRecord, RatingTier } from '@triviaduel/shared-types';
import { processSettlementReconcile } from './settlement-reconcile.queue';
import {
  InMemoryMatchResultStore,
  InMemoryWalletStore,
  newPlayerSnapshot,
} from '../services/settlement/memory.stores';
import type { SettlementPayload, WalletStore } from '../services/settlement/settlement.types';

vi.mock('./connection', () => ({ getRedisConnection: vi.fn() }));

function payload(): SettlementPayload {
  const record: MatchRecord = {
    matchId: 'match-9',
    players: ['alice', 'bob'],
    scores: { alice: 300, bob: 200 },
    winner: 'alice',
    isDraw: false,
    reason: 'completed',
    ratingDelta: { alice: 16, bob: -16 },
    ratingAfter: { alice: 1016, bob: 984 },
    tierAfter: { alice: RatingTier.APPRENTICE, bob: RatingTier.NOVICE },
    roundsPlayed: 5,
    startedAt: '2026-01-01T00:00:00.000Z',
    endedAt: '2026-01-01T00:02:00.000Z',
  };
  return {
    record,
    results: [
      { playerId: 'alice', outcome: 'WIN', newRating: 1016, tier: RatingTier.APPRENTICE },
      { playerId: 'bob', outcome: 'LOSS', newRating: 984, tier: RatingTier.NOVICE },
    ],
    credits: [
      { playerId: 'alice', amount: 84 },
      { playerId: 'bob', amount: 36 },
    ],
  };
}

describe('processSettlementReconcile', () => {
  it('records the match and applies both credits', async () => {
    const results = new InMemoryMatchResultStore();
    const wallet = new InMemoryWalletStore();

    const outcome = await processSettlementReconcile(payload(), { results, wallet });

    expect(outcome).toEqual({ matchId: 'match-9', inserted: true, credited: 2 });
    expect((await results.getMatch('match-9'))?.winner).toBe('alice');
    expect((await results.getPlayer('alice'))?.rating).toBe(1016);
    expect(await wallet.getBalance('alice')).toBe(84);
    expect(await wallet.getBalance('bob')).toBe(36);
  });

  it('is a no-op the second time', async () => {
    const results = new InMemoryMatchResultStore();
    const wallet = new InMemoryWalletStore();

    await processSettlementReconcile(payload(), { results, wallet });
    const again = await processSettlementReconcile(payload(), { results, wallet });

    expect(again).toEqual({ matchId: 'match-9', inserted: false, credited: 0 });
    expect(await wallet.getBalance('alice')).toBe(84);
    expect((await results.getPlayer('alice'))?.gamesPlayed).toBe(1);
  });

  it('skips zero credits', async () => {
    const results = new InMemoryMatchResultStore();
    const wallet = new InMemoryWalletStore();
    const job = payload();
    job.credits = [
      { playerId: 'alice', amount: 54 },
      { playerId: 'bob', amount: 0 },
    ];

    const outcome = await processSettlementReconcile(job, { results, wallet });

    expect(outcome.credited).toBe(1);
    expect(await wallet.getBalance('bob')).toBe(0);
  });

  it('prices a held-back win with the streak the recorded match produced', async () => {
    const results = new InMemoryMatchResultStore();
    const wallet = new InMemoryWalletStore();
    results.setPlayer({ ...newPlayerSnapshot('alice'), gamesPlayed: 2, wins: 2, currentStreak: 2, longestStreak: 2 });
    const job = payload();
    job.credits = [
      {
        playerId: 'alice',
        amount: 84,
        pendingReward: { outcome: 'WIN', roundsWon: 3, roundsLost: 2, totalRounds: 5, forfeited: false },
      },
      { playerId: 'bob', amount: 36 },
    ];

    const outcome = await processSettlementReconcile(job, { results, wallet });

    expect(outcome.credited).toBe(2);
    expect((await results.getPlayer('alice'))?.currentStreak).toBe(3);
    // (50 + 3 * 10 + 2 * 2) * 1.1
    expect(await wallet.getBalance('alice')).toBe(92);
    expect(await wallet.getBalance('bob')).toBe(36);
  });

  it('prices a held-back win without bonus below the streak threshold', async () => {
    const results = new InMemoryMatchResultStore();
    const wallet = new InMemoryWalletStore();
    const job = payload();
    job.credits = [
      {
        playerId: 'alice',
        amount: 84,
        pendingReward: { outcome: 'WIN', roundsWon: 3, roundsLost: 2, totalRounds: 5, forfeited: false },
      },
    ];

    await processSettlementReconcile(job, { results, wallet });

    expect(await wallet.getBalance('alice')).toBe(84);
  });

  it('rethrows a wallet failure so the job is retried', async () => {
    const results = new InMemoryMatchResultStore();
    const wallet: WalletStore = {
      credit: vi.fn().mockRejectedValue(new Error('wallet down')),
      getBalance: vi.fn(),
    };

    await expect(processSettlementReconcile(payload(), { results, wallet })).rejects.toThrow('wallet down');
    // The match insert already happened; the retry will skip it
    expect(await results.getMatch('match-9')).not.toBeNull();
  });
});
