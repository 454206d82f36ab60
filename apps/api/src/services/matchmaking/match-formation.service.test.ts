import { describe, it, expect, vi, beforeEach } from 'vitest';
import { MatchFormationService, FormationResult } from './match-formation.service';
import { InMemoryWaitingPool } from './waiting-pool';
import { PlayerInMatchError } from '../../utils/errors';

const NOW = 1_000_000;

describe('MatchFormationService', () => {
  let pool: InMemoryWaitingPool;
  let createSession: ReturnType<typeof vi.fn>;
  let formation: MatchFormationService;

  beforeEach(() => {
    pool = new InMemoryWaitingPool(600_000);
    let counter = 0;
    createSession = vi.fn().mockImplementation(async () => `match-${++counter}`);
    formation = new MatchFormationService(pool, createSession, { now: () => NOW });
  });

  it('pairs two compatible players and removes both', async () => {
    await pool.upsert('alice', 1000, NOW);
    await pool.upsert('bob', 1040, NOW);

    const result = await formation.tryForm('bob');

    expect(result).toMatchObject({ status: 'matched', matchId: 'match-1', attempts: 1 });
    expect(createSession).toHaveBeenCalledTimes(1);
    expect(await pool.size(NOW)).toBe(0);
  });

  it('keeps the player queued when nobody fits', async () => {
    await pool.upsert('alice', 1000, NOW);
    await pool.upsert('bob', 1600, NOW);

    const result = await formation.tryForm('alice');

    expect(result).toEqual({ status: 'queued', reason: 'no_candidate', attempts: 1 });
    expect(await pool.size(NOW)).toBe(2);
  });

  it('forms exactly one match when two requests race for one opponent', async () => {
    await pool.upsert('xavier', 1000, NOW - 5_000);
    await pool.upsert('alice', 1000, NOW);
    await pool.upsert('bob', 1000, NOW);

    const results: FormationResult[] = await Promise.all([formation.tryForm('alice'), formation.tryForm('bob')]);

    expect(results.filter((r) => r.status === 'matched')).toHaveLength(1);
    expect(createSession).toHaveBeenCalledTimes(1);
    expect(await pool.size(NOW)).toBe(1);
  });

  it('reports a player already paired by a racing request', async () => {
    await pool.upsert('alice', 1000, NOW);

    expect(await formation.tryForm('bob')).toEqual({ status: 'claimed', attempts: 1 });
  });

  it('gives up after the bounded number of contended attempts', async () => {
    await pool.upsert('alice', 1000, NOW);
    await pool.upsert('bob', 1000, NOW);
    vi.spyOn(pool, 'claimPair').mockResolvedValue(false);

    const result = await formation.tryForm('alice');

    expect(result).toEqual({ status: 'queued', reason: 'contention', attempts: 3 });
    expect(createSession).not.toHaveBeenCalled();
  });

  it('puts both players back when the session cannot be created', async () => {
    await pool.upsert('alice', 1000, NOW);
    await pool.upsert('bob', 1000, NOW);
    createSession.mockRejectedValueOnce(new Error('registry full'));

    await expect(formation.tryForm('alice')).rejects.toThrow('registry full');
    expect((await pool.snapshot(NOW)).map((e) => e.playerId)).toEqual(['alice', 'bob']);
  });

  it('clears entries a player re-queued while the session was being created', async () => {
    await pool.upsert('alice', 1000, NOW);
    await pool.upsert('bob', 1000, NOW);
    createSession.mockImplementationOnce(async () => {
      await pool.upsert('alice', 1000, NOW);
      return 'match-9';
    });

    const result = await formation.tryForm('bob');

    expect(result).toMatchObject({ status: 'matched', matchId: 'match-9' });
    expect(await pool.get('alice', NOW)).toBeNull();
    expect(await pool.size(NOW)).toBe(0);
  });

  it('drops a stale opponent already in a match and pairs with the next candidate', async () => {
    await pool.upsert('alice', 1000, NOW);
    await pool.upsert('carol', 1050, NOW);
    await pool.upsert('dave', 1000, NOW);
    createSession.mockRejectedValueOnce(new PlayerInMatchError(new Map([['alice', 'match-0']])));

    const result = await formation.tryForm('dave');

    expect(result).toMatchObject({ status: 'matched', matchId: 'match-1', attempts: 2 });
    expect(createSession).toHaveBeenCalledTimes(2);
    expect(createSession.mock.calls[1][1]).toMatchObject({ playerId: 'carol' });
    expect(await pool.size(NOW)).toBe(0);
  });

  it('keeps the requester queued when the only candidate is already in a match', async () => {
    await pool.upsert('alice', 1000, NOW);
    await pool.upsert('dave', 1000, NOW);
    createSession.mockRejectedValueOnce(new PlayerInMatchError(new Map([['alice', 'match-0']])));

    const result = await formation.tryForm('dave');

    expect(result).toEqual({ status: 'queued', reason: 'no_candidate', attempts: 2 });
    expect((await pool.snapshot(NOW)).map((e) => e.playerId)).toEqual(['dave']);
  });

  it('reports the requester as claimed when it is the player already in a match', async () => {
    await pool.upsert('alice', 1000, NOW);
    await pool.upsert('bob', 1000, NOW);
    createSession.mockRejectedValueOnce(new PlayerInMatchError(new Map([['alice', 'match-0']])));

    const result = await formation.tryForm('alice');

    expect(result).toEqual({ status: 'claimed', attempts: 1 });
    expect((await pool.snapshot(NOW)).map((e) => e.playerId)).toEqual(['bob']);
  });
});
