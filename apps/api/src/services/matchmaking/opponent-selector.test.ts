import { describe, it, expect } from 'vitest';
import { acceptableBand, findOpponent, waitBonus } from './opponent-selector';
import type { WaitingEntry } from './waiting-pool';

const NOW = 1_000_000;

function entry(playerId: string, rating: number, waitedMs: number, seq: number): WaitingEntry {
  return { playerId, rating, joinTime: NOW - waitedMs, lastSeen: NOW, seq };
}

describe('acceptableBand', () => {
  it('widens by one step per 30 seconds waited, capped', () => {
    expect(acceptableBand(0)).toBe(150);
    expect(acceptableBand(29_999)).toBe(150);
    expect(acceptableBand(30_000)).toBe(200);
    expect(acceptableBand(180_000)).toBe(450);
    expect(acceptableBand(600_000)).toBe(500);
  });
});

describe('waitBonus', () => {
  it('grows one point per second up to the cap', () => {
    expect(waitBonus(0)).toBe(0);
    expect(waitBonus(5_000)).toBe(5);
    expect(waitBonus(400_000)).toBe(300);
  });
});

describe('findOpponent', () => {
  it('picks the close rating and never one outside the band', () => {
    const pool = [entry('far', 1500, 30_000, 1), entry('near', 1020, 30_000, 2)];

    const result = findOpponent(pool, { playerId: 'me', rating: 1000 }, NOW);

    expect(result?.entry.playerId).toBe('near');
    expect(result?.ratingDiff).toBe(20);
    expect(result?.cost).toBe(-10);
  });

  it('returns null when nobody else is waiting', () => {
    expect(findOpponent([], { playerId: 'me', rating: 1000 }, NOW)).toBeNull();
    expect(findOpponent([entry('me', 1000, 0, 1)], { playerId: 'me', rating: 1000 }, NOW)).toBeNull();
  });

  it('lets a long wait outweigh a slightly closer rating', () => {
    const pool = [entry('fresh', 1050, 0, 1), entry('patient', 1080, 40_000, 2)];

    const result = findOpponent(pool, { playerId: 'me', rating: 1000 }, NOW);

    expect(result?.entry.playerId).toBe('patient');
    expect(result?.cost).toBe(40);
  });

  it('breaks a cost tie by longer wait, then by insertion order', () => {
    const byWait = [entry('recent', 1100, 0, 1), entry('earlier', 1110, 10_000, 2)];
    expect(findOpponent(byWait, { playerId: 'me', rating: 1000 }, NOW)?.entry.playerId).toBe('earlier');

    const bySeq = [entry('second', 1000, 0, 5), entry('first', 1000, 0, 3)];
    expect(findOpponent(bySeq, { playerId: 'me', rating: 1000 }, NOW)?.entry.playerId).toBe('first');
  });

  it('widens the band with the requester wait as well', () => {
    const pool = [entry('strong', 1400, 0, 1)];

    expect(findOpponent(pool, { playerId: 'me', rating: 1000, joinTime: NOW }, NOW)).toBeNull();
    expect(
      findOpponent(pool, { playerId: 'me', rating: 1000, joinTime: NOW - 180_000 }, NOW)?.entry.playerId
    ).toBe('strong');
  });

  it('never exceeds the maximum band', () => {
    const pool = [entry('distant', 1600, 900_000, 1)];

    expect(findOpponent(pool, { playerId: 'me', rating: 1000 }, NOW)).toBeNull();
  });

  it('scans 1,000 entries well under 100ms', () => {
    const pool: WaitingEntry[] = [];
    for (let i = 0; i < 1000; i++) {
      pool.push(entry(`player-${i}`, 500 + ((i * 7) % 2000), (i * 13) % 600_000, i + 1));
    }

    const started = performance.now();
    const result = findOpponent(pool, { playerId: 'me', rating: 1234 }, NOW);
    const elapsed = performance.now() - started;

    expect(result).not.toBeNull();
    expect(elapsed).toBeLessThan(100);
  });
});
