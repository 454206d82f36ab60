import { describe, it, expect, vi } from 'vitest';
import jwt from 'jsonwebtoken';
import { ERROR_CODES, RatingTier } from '@triviaduel/shared-types';
import { JwtIdentityProvider } from './identity.service';

const SECRET = 'test-secret';

function provider(rating = 1250) {
  const ratings = {
    getPlayerRating: vi.fn().mockResolvedValue({ rating, gamesPlayed: 12, degraded: false }),
  };
  return { identity: new JwtIdentityProvider(ratings, SECRET), ratings };
}

describe('JwtIdentityProvider', () => {
  it('returns the player id and rating for a valid access token', async () => {
    const { identity, ratings } = provider();
    const token = jwt.sign({ sub: 'player-1', type: 'access' }, SECRET, { expiresIn: '15m' });

    await expect(identity.verify(token)).resolves.toEqual({
      playerId: 'player-1',
      rating: 1250,
      gamesPlayed: 12,
      tier: RatingTier.ADEPT,
      ratingDegraded: false,
    });
    expect(ratings.getPlayerRating).toHaveBeenCalledWith('player-1');
  });

  it('distinguishes an expired token', async () => {
    const { identity } = provider();
    const token = jwt.sign({ sub: 'player-1', type: 'access', exp: Math.floor(Date.now() / 1000) - 60 }, SECRET);

    await expect(identity.verify(token)).rejects.toMatchObject({ code: ERROR_CODES.TOKEN_EXPIRED, statusCode: 401 });
  });

  it('rejects a token signed with another secret', async () => {
    const { identity } = provider();
    const token = jwt.sign({ sub: 'player-1', type: 'access' }, 'other-secret');

    await expect(identity.verify(token)).rejects.toMatchObject({ code: ERROR_CODES.TOKEN_INVALID });
  });

  it('rejects refresh tokens', async () => {
    const { identity } = provider();
    const token = jwt.sign({ sub: 'player-1', type: 'refresh' }, SECRET);

    await expect(identity.verify(token)).rejects.toMatchObject({ code: ERROR_CODES.TOKEN_INVALID });
  });
});
