// =====================================================
// Health Check Routes
// =====================================================

import { Router, Request, Response } from 'express';
import type { ApiResponse } from '@triviaduel/shared-types';
import type { GameRuntime } from '../runtime';
import { logger } from '../utils/logger';

type ServiceState = 'up' | 'down' | 'not_configured';

interface HealthStatus {
  status: 'healthy' | 'degraded';
  timestamp: string;
  uptime: number;
  version: string;
  services: {
    api: 'up';
    database: ServiceState;
  };
  game: {
    connections: number;
    activeMatches: number;
    waitingPlayers: number | null;
  };
}

export interface HealthProbes {
  /** Omitted when no database is configured. */
  database?: () => Promise<boolean>;
}

export function createHealthRouter(
  runtime: Pick<GameRuntime, 'connections' | 'sessions' | 'matchmaking'>,
  probes: HealthProbes = {}
): Router {
  const router = Router();

  // GET /health
  router.get('/', async (_req: Request, res: Response) => {
    const database: ServiceState = probes.database ? ((await probes.database()) ? 'up' : 'down') : 'not_configured';

    let waitingPlayers: number | null = null;
    try {
      waitingPlayers = await runtime.matchmaking.poolSize();
    } catch (error) {
      logger.warn('[Health] Waiting pool unavailable:', error);
    }

    const healthStatus: HealthStatus = {
      status: database === 'down' || waitingPlayers === null ? 'degraded' : 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: process.env.npm_package_version || '0.1.0',
      services: { api: 'up', database },
      game: {
        connections: runtime.connections.size(),
        activeMatches: runtime.sessions.size(),
        waitingPlayers,
      },
    };

    const response: ApiResponse<HealthStatus> = { success: true, data: healthStatus };
    res.json(response);
  });

  // GET /health/ready
  router.get('/ready', async (_req: Request, res: Response) => {
    const ready = probes.database ? await probes.database() : true;
    res.status(ready ? 200 : 503).json({ ready });
  });

  // GET /health/live
  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({ alive: true });
  });

  return router;
}
