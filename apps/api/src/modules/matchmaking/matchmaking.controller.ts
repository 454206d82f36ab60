// =====================================================
// Matchmaking Controller
// =====================================================
// HTTP face of the waiting pool. Realtime clients do the same through
// START_MATCHMAKING / CANCEL_MATCHMAKING on the socket.

import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import type { EnqueueResponse, QueueStatusResponse } from '@triviaduel/shared-types';
import { getAuthenticatedPlayer } from '../../middleware/auth.middleware';
import { validateRequest } from '../../middleware/validation.middleware';
import { successResponse } from '../../utils/api-response';
import type { GameRuntime } from '../../runtime';
import { joinQueueSchema, QueueLeaveResponse } from './matchmaking.schemas';

export function createMatchmakingRouter(
  runtime: Pick<GameRuntime, 'matchmaking' | 'ratings'>,
  requireAuth: RequestHandler,
  queueRateLimiter: RequestHandler
): Router {
  const router = Router();

  /**
   * POST /api/v1/matchmaking/queue
   * Join (or refresh) the queue and try to pair immediately.
   * 409 ALREADY_IN_MATCH while a match is live.
   */
  router.post(
    '/queue',
    requireAuth,
    queueRateLimiter,
    validateRequest(joinQueueSchema),
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const player = getAuthenticatedPlayer(req);
        const { rating } = await runtime.ratings.getPlayerRating(player.playerId);
        const outcome = await runtime.matchmaking.requestMatch(player.playerId, rating);

        res.status(outcome.status === 'matched' ? 201 : 202).json(successResponse<EnqueueResponse>(req, outcome));
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * DELETE /api/v1/matchmaking/queue
   */
  router.delete('/queue', requireAuth, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const player = getAuthenticatedPlayer(req);
      const removed = await runtime.matchmaking.dequeue(player.playerId);
      res.status(200).json(successResponse<QueueLeaveResponse>(req, { removed }));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/v1/matchmaking/queue/status
   */
  router.get('/queue/status', requireAuth, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const player = getAuthenticatedPlayer(req);
      const status = await runtime.matchmaking.status(player.playerId);
      res.status(200).json(successResponse<QueueStatusResponse>(req, status));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
