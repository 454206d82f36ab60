// =====================================================
// Matches Controller
// =====================================================

import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import type { MatchLookupResponse } from '@triviaduel/shared-types';
import { getAuthenticatedPlayer } from '../../middleware/auth.middleware';
import { validateRequest } from '../../middleware/validation.middleware';
import { successResponse } from '../../utils/api-response';
import type { GameRuntime } from '../../runtime';
import { matchIdParamsSchema } from './matches.schemas';

export function createMatchesRouter(runtime: Pick<GameRuntime, 'findMatch'>, requireAuth: RequestHandler): Router {
  const router = Router();

  /**
   * GET /api/v1/matches/:matchId
   * Participants only: 403 for anyone else, 404 when no trace of the
   * match remains.
   */
  router.get(
    '/:matchId',
    requireAuth,
    validateRequest(matchIdParamsSchema, 'params'),
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const player = getAuthenticatedPlayer(req);
        const found = await runtime.findMatch(req.params.matchId, player.playerId);
        res.status(200).json(successResponse<MatchLookupResponse>(req, found));
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
