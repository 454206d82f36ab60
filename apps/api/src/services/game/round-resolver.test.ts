import { describe, it, expect } from 'vitest';
import { resolveRound, isCorrectAnswer } from './round-resolver';
import { emptyStats, Submission } from './match-session';

const players = ['alice', 'bob'] as const;

function submission(playerId: string, answer: string, elapsedMs: number): Submission {
  return { playerId, matchId: 'match-1', round: 1, answer, receivedAt: 0, elapsedMs };
}

function resolve(submissions: Submission[]) {
  return resolveRound({
    players,
    stats: { alice: emptyStats(), bob: emptyStats() },
    submissions,
    correctAnswer: 'A',
    pointsPerRound: 100,
    roundDurationMs: 15000,
  });
}

describe('isCorrectAnswer', () => {
  it('ignores case and surrounding whitespace', () => {
    expect(isCorrectAnswer('  paris ', 'Paris')).toBe(true);
    expect(isCorrectAnswer('Lyon', 'Paris')).toBe(false);
  });
});

describe('resolveRound', () => {
  it('awards the round to the faster of two correct answers', () => {
    const result = resolve([submission('alice', 'A', 2300), submission('bob', 'a ', 3100)]);

    expect(result.winner).toBe('alice');
    expect(result.stats.alice).toEqual({ score: 100, correctAnswers: 1, totalAnswers: 1, totalResponseTimeMs: 2300 });
    expect(result.stats.bob).toEqual({ score: 0, correctAnswers: 1, totalAnswers: 1, totalResponseTimeMs: 3100 });
  });

  it('prefers a slow correct answer over a fast wrong one', () => {
    const result = resolve([submission('alice', 'B', 1000), submission('bob', 'A', 9000)]);

    expect(result.winner).toBe('bob');
    expect(result.correct).toEqual({ alice: false, bob: true });
  });

  it('scores nobody when both answers are wrong', () => {
    const result = resolve([submission('alice', 'B', 1000), submission('bob', 'C', 2000)]);

    expect(result.winner).toBeNull();
    expect(result.stats.alice.score).toBe(0);
    expect(result.stats.bob.score).toBe(0);
    expect(result.stats.alice.totalAnswers).toBe(1);
  });

  it('counts a missing submission as wrong and as the full round duration', () => {
    const result = resolve([submission('alice', 'A', 4000)]);

    expect(result.winner).toBe('alice');
    expect(result.stats.bob).toEqual({ score: 0, correctAnswers: 0, totalAnswers: 1, totalResponseTimeMs: 15000 });
  });

  it('scores nobody when no one answered', () => {
    const result = resolve([]);

    expect(result.winner).toBeNull();
    expect(result.stats.alice.totalResponseTimeMs).toBe(15000);
  });

  it('uses only the first submission from a player', () => {
    const result = resolve([submission('alice', 'B', 1000), submission('alice', 'A', 1500), submission('bob', 'A', 5000)]);

    expect(result.winner).toBe('bob');
    expect(result.stats.alice.correctAnswers).toBe(0);
  });

  it('clamps elapsed times into the round window', () => {
    const result = resolve([submission('alice', 'A', -50), submission('bob', 'B', 20000)]);

    expect(result.stats.alice.totalResponseTimeMs).toBe(0);
    expect(result.stats.bob.totalResponseTimeMs).toBe(15000);
  });

  it('leaves an exact tie between correct answers unscored', () => {
    const result = resolve([submission('alice', 'A', 3000), submission('bob', 'A', 3000)]);

    expect(result.winner).toBeNull();
    expect(result.stats.alice.correctAnswers).toBe(1);
    expect(result.stats.bob.correctAnswers).toBe(1);
  });

  it('does not mutate the incoming stats', () => {
    const stats = { alice: emptyStats(), bob: emptyStats() };
    resolveRound({
      players,
      stats,
      submissions: [submission('alice', 'A', 1000)],
      correctAnswer: 'A',
      pointsPerRound: 100,
      roundDurationMs: 15000,
    });

    expect(stats.alice.score).toBe(0);
  });
});
