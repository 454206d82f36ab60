// =====================================================
// In-Memory Settlement Stores
// =====================================================
// Process-local stores used when DATABASE_URL is unset and by tests.
// Same idempotency rules as the PostgreSQL stores.

import type { MatchRecord } from '@triviaduel/shared-types';
import { config } from '../../config';
import { getTierForRating } from '../../lib/rating.service';
import type {
  MatchResultStore,
  PlayerRatingSnapshot,
  PlayerResultUpdate,
  RatingStore,
  RecordOutcome,
  WalletStore,
} from './settlement.types';

export function newPlayerSnapshot(playerId: string, rating: number = config.rating.defaultRating): PlayerRatingSnapshot {
  return {
    playerId,
    rating,
    tier: getTierForRating(rating),
    gamesPlayed: 0,
    wins: 0,
    losses: 0,
    draws: 0,
    currentStreak: 0,
    longestStreak: 0,
  };
}

export function applyResult(snapshot: PlayerRatingSnapshot, result: PlayerResultUpdate): PlayerRatingSnapshot {
  if (result.outcome === 'NO_CONTEST') {
    return snapshot;
  }

  const won = result.outcome === 'WIN';
  const currentStreak = won ? snapshot.currentStreak + 1 : 0;

  return {
    ...snapshot,
    rating: result.newRating,
    tier: result.tier,
    gamesPlayed: snapshot.gamesPlayed + 1,
    wins: snapshot.wins + (won ? 1 : 0),
    losses: snapshot.losses + (result.outcome === 'LOSS' ? 1 : 0),
    draws: snapshot.draws + (result.outcome === 'DRAW' ? 1 : 0),
    currentStreak,
    longestStreak: Math.max(snapshot.longestStreak, currentStreak),
  };
}

export class InMemoryMatchResultStore implements MatchResultStore, RatingStore {
  private readonly matches = new Map<string, MatchRecord>();
  private readonly players = new Map<string, PlayerRatingSnapshot>();

  async getPlayer(playerId: string): Promise<PlayerRatingSnapshot | null> {
    return this.players.get(playerId) ?? null;
  }

  /** Seed a player (dev tooling and tests). */
  setPlayer(snapshot: PlayerRatingSnapshot): void {
    this.players.set(snapshot.playerId, snapshot);
  }

  async recordMatch(record: MatchRecord, results: PlayerResultUpdate[]): Promise<RecordOutcome> {
    if (this.matches.has(record.matchId)) {
      return { inserted: false, players: this.snapshotsFor(record.players) };
    }

    this.matches.set(record.matchId, record);
    for (const result of results) {
      const current = this.players.get(result.playerId) ?? newPlayerSnapshot(result.playerId);
      this.players.set(result.playerId, applyResult(current, result));
    }

    return { inserted: true, players: this.snapshotsFor(record.players) };
  }

  async getMatch(matchId: string): Promise<MatchRecord | null> {
    return this.matches.get(matchId) ?? null;
  }

  private snapshotsFor(playerIds: readonly string[]): Record<string, PlayerRatingSnapshot> {
    const out: Record<string, PlayerRatingSnapshot> = {};
    for (const playerId of playerIds) {
      out[playerId] = this.players.get(playerId) ?? newPlayerSnapshot(playerId);
    }
    return out;
  }
}

export class InMemoryWalletStore implements WalletStore {
  private readonly balances = new Map<string, number>();
  private readonly appliedKeys = new Set<string>();

  async credit(playerId: string, amount: number, idempotencyKey: string): Promise<boolean> {
    if (this.appliedKeys.has(idempotencyKey)) {
      return false;
    }
    this.appliedKeys.add(idempotencyKey);
    this.balances.set(playerId, (this.balances.get(playerId) ?? 0) + amount);
    return true;
  }

  async getBalance(playerId: string): Promise<number> {
    return this.balances.get(playerId) ?? 0;
  }
}
