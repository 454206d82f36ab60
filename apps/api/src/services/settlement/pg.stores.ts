// =====================================================
// PostgreSQL Settlement Stores
// =====================================================
// Schema: apps/api/sql/001_init.sql
// CRITICAL: match insert and rating updates share one transaction, and
// ON CONFLICT on match_id makes a replay a no-op.

import type { Pool, PoolClient } from 'pg';
import { z } from 'zod';
import { MatchRecord, RatingTier } from '@triviaduel/shared-types';
import { getPool, withTransaction } from '../../lib/db';
import { logger } from '../../utils/logger';
import { newPlayerSnapshot } from './memory.stores';
import type {
  MatchResultStore,
  PlayerRatingSnapshot,
  PlayerResultUpdate,
  RatingStore,
  RecordOutcome,
  WalletStore,
} from './settlement.types';

// ===========================================
// Row Schemas
// ===========================================

const ratingRowSchema = z.object({
  player_id: z.string(),
  rating: z.number(),
  tier: z.nativeEnum(RatingTier),
  games_played: z.number(),
  wins: z.number(),
  losses: z.number(),
  draws: z.number(),
  current_streak: z.number(),
  longest_streak: z.number(),
});

const matchRowSchema = z.object({
  match_id: z.string(),
  player_one: z.string(),
  player_two: z.string(),
  winner_id: z.string().nullable(),
  is_draw: z.boolean(),
  end_reason: z.enum(['completed', 'forfeit', 'disconnect_timeout', 'idle_timeout', 'error']),
  scores: z.record(z.number()),
  rating_delta: z.record(z.number()),
  rounds_played: z.number(),
  started_at: z.date(),
  ended_at: z.date(),
});

function toSnapshot(row: z.infer<typeof ratingRowSchema>): PlayerRatingSnapshot {
  return {
    playerId: row.player_id,
    rating: row.rating,
    tier: row.tier,
    gamesPlayed: row.games_played,
    wins: row.wins,
    losses: row.losses,
    draws: row.draws,
    currentStreak: row.current_streak,
    longestStreak: row.longest_streak,
  };
}

const RATING_COLUMNS =
  'player_id, rating, tier, games_played, wins, losses, draws, current_streak, longest_streak';

// ===========================================
// Match Results + Ratings
// ===========================================

export class PgMatchResultStore implements MatchResultStore, RatingStore {
  constructor(private readonly pool: Pool = getPool()) {}

  async getPlayer(playerId: string): Promise<PlayerRatingSnapshot | null> {
    const result = await this.pool.query(
      `SELECT ${RATING_COLUMNS} FROM player_ratings WHERE player_id = $1`,
      [playerId]
    );
    if (result.rows.length === 0) {
      return null;
    }
    return toSnapshot(ratingRowSchema.parse(result.rows[0]));
  }

  async recordMatch(record: MatchRecord, results: PlayerResultUpdate[]): Promise<RecordOutcome> {
    return withTransaction(async (client) => {
      const inserted = await client.query(
        `INSERT INTO match_history
           (match_id, player_one, player_two, winner_id, is_draw, end_reason,
            scores, rating_delta, rounds_played, started_at, ended_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
         ON CONFLICT (match_id) DO NOTHING
         RETURNING match_id`,
        [
          record.matchId,
          record.players[0],
          record.players[1],
          record.winner,
          record.isDraw,
          record.reason,
          JSON.stringify(record.scores),
          JSON.stringify(record.ratingDelta),
          record.roundsPlayed,
          record.startedAt,
          record.endedAt,
        ]
      );

      if (inserted.rowCount === 0) {
        logger.info(`[Settlement] Match ${record.matchId} already recorded`);
        return { inserted: false, players: await this.readPlayers(client, record.players) };
      }

      for (const update of results) {
        if (update.outcome !== 'NO_CONTEST') {
          await this.applyResult(client, update);
        }
      }

      return { inserted: true, players: await this.readPlayers(client, record.players) };
    }, this.pool);
  }

  async getMatch(matchId: string): Promise<MatchRecord | null> {
    const result = await this.pool.query(
      `SELECT match_id, player_one, player_two, winner_id, is_draw, end_reason,
              scores, rating_delta, rounds_played, started_at, ended_at
         FROM match_history WHERE match_id = $1`,
      [matchId]
    );
    if (result.rows.length === 0) {
      return null;
    }

    const row = matchRowSchema.parse(result.rows[0]);
    return {
      matchId: row.match_id,
      players: [row.player_one, row.player_two],
      scores: row.scores,
      winner: row.winner_id,
      isDraw: row.is_draw,
      reason: row.end_reason,
      ratingDelta: row.rating_delta,
      // Post-match ratings live in player_ratings; the history row keeps deltas only
      ratingAfter: {},
      tierAfter: {},
      roundsPlayed: row.rounds_played,
      startedAt: row.started_at.toISOString(),
      endedAt: row.ended_at.toISOString(),
    };
  }

  private async applyResult(client: PoolClient, update: PlayerResultUpdate): Promise<void> {
    const win = update.outcome === 'WIN' ? 1 : 0;
    const loss = update.outcome === 'LOSS' ? 1 : 0;
    const draw = update.outcome === 'DRAW' ? 1 : 0;

    await client.query(
      `INSERT INTO player_ratings
         (player_id, rating, tier, games_played, wins, losses, draws, current_streak, longest_streak, updated_at)
       VALUES ($1, $2, $3, 1, $4, $5, $6, $4, $4, NOW())
       ON CONFLICT (player_id) DO UPDATE SET
         rating = EXCLUDED.rating,
         tier = EXCLUDED.tier,
         games_played = player_ratings.games_played + 1,
         wins = player_ratings.wins + EXCLUDED.wins,
         losses = player_ratings.losses + EXCLUDED.losses,
         draws = player_ratings.draws + EXCLUDED.draws,
         current_streak = CASE WHEN EXCLUDED.wins = 1 THEN player_ratings.current_streak + 1 ELSE 0 END,
         longest_streak = GREATEST(
           player_ratings.longest_streak,
           CASE WHEN EXCLUDED.wins = 1 THEN player_ratings.current_streak + 1 ELSE 0 END
         ),
         updated_at = NOW()`,
      [update.playerId, update.newRating, update.tier, win, loss, draw]
    );
  }

  private async readPlayers(
    client: PoolClient,
    playerIds: readonly string[]
  ): Promise<Record<string, PlayerRatingSnapshot>> {
    const result = await client.query(
      `SELECT ${RATING_COLUMNS} FROM player_ratings WHERE player_id = ANY($1::text[])`,
      [playerIds]
    );

    const players: Record<string, PlayerRatingSnapshot> = {};
    for (const playerId of playerIds) {
      players[playerId] = newPlayerSnapshot(playerId);
    }
    for (const row of result.rows) {
      const snapshot = toSnapshot(ratingRowSchema.parse(row));
      players[snapshot.playerId] = snapshot;
    }
    return players;
  }
}

// ===========================================
// Wallet
// ===========================================

export class PgWalletStore implements WalletStore {
  constructor(private readonly pool: Pool = getPool()) {}

  async credit(playerId: string, amount: number, idempotencyKey: string, reason: string): Promise<boolean> {
    return withTransaction(async (client) => {
      const recorded = await client.query(
        `INSERT INTO wallet_transactions (idempotency_key, player_id, amount, reason)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (idempotency_key) DO NOTHING
         RETURNING idempotency_key`,
        [idempotencyKey, playerId, amount, reason]
      );

      if (recorded.rowCount === 0) {
        return false;
      }

      await client.query(
        `INSERT INTO player_wallets (player_id, balance, updated_at)
         VALUES ($1, $2, NOW())
         ON CONFLICT (player_id) DO UPDATE SET
           balance = player_wallets.balance + EXCLUDED.balance,
           updated_at = NOW()`,
        [playerId, amount]
      );
      return true;
    }, this.pool);
  }

  async getBalance(playerId: string): Promise<number> {
    const result = await this.pool.query(
      'SELECT balance FROM player_wallets WHERE player_id = $1',
      [playerId]
    );
    if (result.rows.length === 0) {
      return 0;
    }
    // BIGINT arrives as a string
    return z.object({ balance: z.coerce.number() }).parse(result.rows[0]).balance;
  }
}
