// =====================================================
// Rating Lookup
// =====================================================
// Last-known rating for matchmaking and identity, cache-aside over the
// rating store. When both cache and store are unreachable the documented
// default (1000, zero games) is returned with degraded=true.

import { z } from 'zod';
import { config } from '../../config';
import { getOrFetch, del } from '../../lib/cache.service';
import { logger } from '../../utils/logger';
import type { RatingStore } from './settlement.types';

export interface PlayerRating {
  rating: number;
  gamesPlayed: number;
  degraded: boolean;
}

const cachedRatingSchema = z.object({
  rating: z.number(),
  gamesPlayed: z.number(),
});

const RATING_CACHE_TTL_SECONDS = 5 * 60;

export function ratingCacheKey(playerId: string): string {
  return `rating:player:${playerId}`;
}

export class RatingLookupService {
  constructor(
    private readonly store: RatingStore,
    private readonly useCache: boolean = true
  ) {}

  async getPlayerRating(playerId: string): Promise<PlayerRating> {
    const fetchFromStore = async () => {
      const snapshot = await this.store.getPlayer(playerId);
      return {
        rating: snapshot?.rating ?? config.rating.defaultRating,
        gamesPlayed: snapshot?.gamesPlayed ?? 0,
      };
    };

    try {
      if (!this.useCache) {
        return { ...(await fetchFromStore()), degraded: false };
      }

      const result = await getOrFetch(
        ratingCacheKey(playerId),
        cachedRatingSchema,
        fetchFromStore,
        RATING_CACHE_TTL_SECONDS
      );
      return { ...result.value, degraded: result.degraded };
    } catch (error) {
      logger.warn(`[Rating] Store unavailable for ${playerId}, using default rating:`, error);
      return { rating: config.rating.defaultRating, gamesPlayed: 0, degraded: true };
    }
  }

  async invalidate(playerId: string): Promise<void> {
    if (this.useCache) {
      await del(ratingCacheKey(playerId));
    }
  }
}
