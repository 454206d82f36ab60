// =====================================================
// Redis Connections
// =====================================================
// Shared by the waiting pool, the session snapshot cache, the socket.io
// adapter and the BullMQ queues. Connections are created lazily.

import { Redis, RedisOptions } from 'ioredis';
import { config } from '../config';
import { logger } from '../utils/logger';

// ===========================================
// Connection Configuration
// ===========================================

const MAX_RETRIES = 10;

const baseOptions: RedisOptions = {
  maxRetriesPerRequest: null, // BullMQ workers block on commands
  enableReadyCheck: false,
  retryStrategy: (times: number) => {
    if (times > MAX_RETRIES) {
      logger.error(`[Redis] Giving up after ${MAX_RETRIES} retries`);
      return null;
    }
    const delay = Math.min(times * 100, 3000);
    logger.warn(`[Redis] Retry #${times} in ${delay}ms`);
    return delay;
  },
};

function usesUrl(): boolean {
  return config.redis.url !== '' && config.redis.url !== 'redis://localhost:6379';
}

function createClient(label: string): Redis {
  const client = usesUrl()
    ? new Redis(config.redis.url, baseOptions)
    : new Redis({
        ...baseOptions,
        host: config.redis.host,
        port: config.redis.port,
        password: config.redis.password,
      });

  client.on('connect', () => {
    logger.info(`[Redis] ${label} connection established`);
  });
  client.on('error', (err) => {
    logger.error(`[Redis] ${label} connection error:`, err);
  });
  return client;
}

// ===========================================
// Singleton Connections
// ===========================================

let connection: Redis | null = null;
let subscriberConnection: Redis | null = null;

/**
 * Main connection: pool scripts, cache reads/writes and queue producers.
 */
export function getRedisConnection(): Redis {
  if (!connection) {
    connection = createClient('main');
  }
  return connection;
}

/**
 * Pub/sub needs a connection of its own (socket.io adapter).
 */
export function getSubscriberConnection(): Redis {
  if (!subscriberConnection) {
    subscriberConnection = createClient('subscriber');
  }
  return subscriberConnection;
}

export async function closeRedisConnections(): Promise<void> {
  const open = [connection, subscriberConnection].filter((client): client is Redis => client !== null);
  connection = null;
  subscriberConnection = null;
  await Promise.all(open.map((client) => client.quit()));
  logger.info(`[Redis] Closed ${open.length} connection(s)`);
}
