// =====================================================
// Express Application
// =====================================================

import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import * as Sentry from '@sentry/node';
import { ApiResponse, ERROR_CODES } from '@triviaduel/shared-types';
import { config } from './config';
import { logger } from './utils/logger';
import { AppError } from './utils/errors';
import type { GameRuntime } from './runtime';
import { createRequireAuth, createRateLimiter, requestIdMiddleware, RateLimitStoreKind } from './middleware';
import { createHealthRouter, HealthProbes } from './routes/health.routes';
import { createMatchmakingRouter } from './modules/matchmaking';
import { createMatchesRouter } from './modules/matches';

export interface AppOptions {
  rateLimitStore: RateLimitStoreKind;
  health?: HealthProbes;
}

export function createApp(runtime: GameRuntime, options: AppOptions): Express {
  const app: Express = express();

  // ===========================================
  // Middleware
  // ===========================================

  app.use(requestIdMiddleware);
  app.use(helmet());
  app.use(
    cors({
      origin: config.corsOrigin === '*' ? '*' : config.corsOrigin.split(','),
      credentials: true,
    })
  );
  app.use(express.json({ limit: '10kb' }));
  app.use(compression());

  // Request logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.info(`${req.method} ${req.path} ${res.statusCode} - ${Date.now() - start}ms`);
    });
    next();
  });

  // ===========================================
  // Routes
  // ===========================================

  const requireAuth = createRequireAuth(runtime.identity);
  const apiRateLimiter = createRateLimiter({
    windowMs: config.rateLimit.windowMs,
    max: config.rateLimit.max,
    prefix: 'api',
    store: options.rateLimitStore,
  });
  const queueRateLimiter = createRateLimiter({
    windowMs: config.rateLimit.windowMs,
    max: config.rateLimit.queueMax,
    prefix: 'queue',
    store: options.rateLimitStore,
    message: 'Too many queue requests. Please slow down.',
  });

  app.use('/health', createHealthRouter(runtime, options.health));
  app.use('/api/v1', apiRateLimiter);
  app.use('/api/v1/matchmaking', createMatchmakingRouter(runtime, requireAuth, queueRateLimiter));
  app.use('/api/v1/matches', createMatchesRouter(runtime, requireAuth));

  // ===========================================
  // Error Handling
  // ===========================================

  // 404 handler
  app.use((req: Request, res: Response) => {
    const response: ApiResponse = {
      success: false,
      error: {
        code: ERROR_CODES.NOT_FOUND,
        message: 'The requested resource was not found',
      },
      meta: {
        timestamp: new Date().toISOString(),
        requestId: req.id,
      },
    };
    res.status(404).json(response);
  });

  // Global error handler
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    const known = err instanceof AppError;
    if (known) {
      logger.debug(`[HTTP] ${req.method} ${req.path}: ${err.code} ${err.message}`);
    } else {
      logger.error('Unhandled error:', err);
      Sentry.captureException(err, { extra: { requestId: req.id } });
    }

    const response: ApiResponse = {
      success: false,
      error: {
        code: known ? err.code : ERROR_CODES.INTERNAL_ERROR,
        message: known || config.nodeEnv !== 'production' ? err.message : 'An unexpected error occurred',
      },
      meta: {
        timestamp: new Date().toISOString(),
        requestId: req.id,
      },
    };

    res.status(known ? err.statusCode : 500).json(response);
  });

  return app;
}
