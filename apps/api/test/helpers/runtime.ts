// =====================================================
// In-Memory Runtime Builder
// =====================================================

import { createGameRuntime, GameRuntime } from '../../src/runtime';
import { InMemoryWaitingPool } from '../../src/services/matchmaking/waiting-pool';
import { InMemoryMatchResultStore, InMemoryWalletStore } from '../../src/services/settlement/memory.stores';
import { InMemorySessionStore } from '../../src/services/game/session-store';
import type { RatingStore } from '../../src/services/settlement/settlement.types';
import { ScriptedQuestionProvider, TokenTableIdentity } from './fakes';

export interface TestRuntime {
  runtime: GameRuntime;
  identity: TokenTableIdentity;
  results: InMemoryMatchResultStore;
  wallet: InMemoryWalletStore;
  sessionStore: InMemorySessionStore;
}

/**
 * A runtime with every store in process and round timers long enough
 * that tests drive rounds by submitting answers.
 */
export function buildTestRuntime(
  players: readonly string[] = ['alice', 'bob', 'carol'],
  overrides: { ratingStore?: (results: InMemoryMatchResultStore) => RatingStore } = {}
): TestRuntime {
  const identity = new TokenTableIdentity();
  for (const playerId of players) {
    identity.add(playerId);
  }
  const results = new InMemoryMatchResultStore();
  const wallet = new InMemoryWalletStore();
  const sessionStore = new InMemorySessionStore();

  const runtime = createGameRuntime({
    pool: new InMemoryWaitingPool(600_000),
    results,
    ratingStore: overrides.ratingStore ? overrides.ratingStore(results) : results,
    wallet,
    questions: new ScriptedQuestionProvider(),
    sessionStore,
    identity,
    ratingCache: false,
    game: { maxRounds: 3, roundDurationMs: 60_000, interRoundDelayMs: 1_000, pointsPerRound: 100 },
    transport: { reconnectWindowMs: 30_000, sendTimeoutMs: 2_000, maxMalformedMessages: 5 },
    ratingOptions: { adaptiveK: false },
  });

  return { runtime, identity, results, wallet, sessionStore };
}
