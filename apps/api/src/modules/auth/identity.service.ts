// =====================================================
// Identity Service
// =====================================================
// Verifies access tokens issued by the account service and attaches the
// player's last-known rating. Tokens are HS256 with `sub` = player id
// and `type` = 'access'.

import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { ERROR_CODES, RatingTier } from '@triviaduel/shared-types';
import { config } from '../../config';
import { UnauthorizedError } from '../../utils/errors';
import { getTierForRating } from '../../lib/rating.service';
import type { RatingLookupService } from '../../services/settlement/rating-lookup.service';

export interface VerifiedPlayer {
  playerId: string;
  rating: number;
  gamesPlayed: number;
  tier: RatingTier;
  ratingDegraded: boolean;
}

export interface IdentityProvider {
  verify(token: string): Promise<VerifiedPlayer>;
}

const accessTokenSchema = z.object({
  sub: z.string().min(1),
  type: z.literal('access'),
});

export class JwtIdentityProvider implements IdentityProvider {
  constructor(
    private readonly ratings: Pick<RatingLookupService, 'getPlayerRating'>,
    private readonly secret: string = config.jwt.accessSecret
  ) {}

  async verify(token: string): Promise<VerifiedPlayer> {
    const playerId = this.verifyToken(token);
    const { rating, gamesPlayed, degraded } = await this.ratings.getPlayerRating(playerId);

    return {
      playerId,
      rating,
      gamesPlayed,
      tier: getTierForRating(rating),
      ratingDegraded: degraded,
    };
  }

  private verifyToken(token: string): string {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, this.secret, { algorithms: ['HS256'] });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new UnauthorizedError('Access token expired', ERROR_CODES.TOKEN_EXPIRED);
      }
      throw new UnauthorizedError('Invalid access token', ERROR_CODES.TOKEN_INVALID);
    }

    const payload = accessTokenSchema.safeParse(decoded);
    if (!payload.success) {
      throw new UnauthorizedError('Invalid token type', ERROR_CODES.TOKEN_INVALID);
    }
    return payload.data.sub;
  }
}
