// =====================================================
// API Server Entry Point
// =====================================================

import 'dotenv/config';
import './instrument';
import { createServer } from 'http';
import { v4 as uuidv4 } from 'uuid';
import { config, validateConfig } from './config';
import { logger } from './utils/logger';
import { createApp } from './app';
import { createGameRuntime, GameRuntimeDeps } from './runtime';
import { closePool, pingDatabase } from './lib/db';
import { PgMatchResultStore, PgWalletStore } from './services/settlement/pg.stores';
import { InMemoryMatchResultStore, InMemoryWalletStore } from './services/settlement/memory.stores';
import { InMemoryWaitingPool } from './services/matchmaking/waiting-pool';
import { RedisWaitingPool } from './services/matchmaking/redis-waiting-pool';
import { InMemorySessionStore, RedisSessionStore } from './services/game/session-store';
import { HttpQuestionProvider } from './services/content/http-question-provider';
import { StaticQuestionProvider } from './services/content/question-provider';
import { initializeSocket, shutdownSocketServer } from './socket';
import {
  closeRedisConnections,
  enqueueSettlementReconcile,
  startMatchSweep,
  startSettlementReconcileWorker,
  stopMatchSweep,
  stopSettlementReconcileWorker,
} from './queues';

validateConfig();

// ===========================================
// Collaborators
// ===========================================

function buildDeps(): GameRuntimeDeps {
  const durable = config.databaseUrl !== '';
  const results = durable ? new PgMatchResultStore() : new InMemoryMatchResultStore();
  const wallet = durable ? new PgWalletStore() : new InMemoryWalletStore();
  if (!durable) {
    logger.warn('DATABASE_URL not set: match results and coins are kept in memory');
  }

  const questions = config.content.catalogUrl
    ? new HttpQuestionProvider(config.content.catalogUrl, config.content.requestTimeoutMs)
    : StaticQuestionProvider.fromFile();

  if (!config.redis.enabled) {
    logger.warn('REDIS_DISABLED: waiting pool and session snapshots are process-local');
    return {
      pool: new InMemoryWaitingPool(config.matchmaking.poolTtlSeconds * 1000),
      results,
      ratingStore: results,
      wallet,
      questions,
      sessionStore: new InMemorySessionStore(),
      ratingCache: false,
    };
  }

  return {
    pool: new RedisWaitingPool(),
    results,
    ratingStore: results,
    wallet,
    questions,
    sessionStore: new RedisSessionStore(),
    reconcile: enqueueSettlementReconcile,
  };
}

// ===========================================
// Startup
// ===========================================

async function main(): Promise<void> {
  const deps = buildDeps();
  const runtime = createGameRuntime(deps);
  const app = createApp(runtime, {
    rateLimitStore: config.redis.enabled ? 'redis' : 'memory',
    health: config.databaseUrl ? { database: pingDatabase } : {},
  });
  const server = createServer(app);

  await initializeSocket(server, runtime, { redisAdapter: config.redis.enabled });

  if (config.redis.enabled) {
    startSettlementReconcileWorker({ results: deps.results, wallet: deps.wallet });
    await startMatchSweep(uuidv4(), () => runtime.sweep());
  } else {
    const timer = setInterval(() => {
      runtime.sweep().catch((error: unknown) => logger.error('[Sweep] Failed:', error));
    }, 30 * 1000);
    timer.unref();
  }

  server.listen(config.port, () => {
    logger.info(`Trivia duel API running on port ${config.port}`);
    logger.info(`Environment: ${config.nodeEnv}`);
  });

  let shuttingDown = false;
  const gracefulShutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`${signal} received. Shutting down gracefully...`);

    const forceExit = setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, 10000);
    forceExit.unref();

    runtime.shutdown();
    await shutdownSocketServer();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    if (config.redis.enabled) {
      await stopMatchSweep();
      await stopSettlementReconcileWorker();
      await closeRedisConnections();
    }
    await closePool();
    logger.info('Shutdown complete');
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      gracefulShutdown(signal).catch((error: unknown) => {
        logger.error('Shutdown failed:', error);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
