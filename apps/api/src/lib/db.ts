// =====================================================
// PostgreSQL Pool Singleton
// =====================================================
// Lazily created pg pool plus a transaction helper.

import { Pool, PoolClient } from 'pg';
import { config } from '../config';
import { logger } from '../utils/logger';

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: config.databaseUrl,
      max: 10,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
    });

    pool.on('error', (err) => {
      logger.error('[DB] Idle client error:', err);
    });
  }

  return pool;
}

/**
 * Run `work` inside BEGIN/COMMIT on one client; rolls back on any error.
 */
export async function withTransaction<T>(
  work: (client: PoolClient) => Promise<T>,
  source: Pool = getPool()
): Promise<T> {
  const client = await source.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      logger.error('[DB] Rollback failed:', rollbackError);
    });
    throw error;
  } finally {
    client.release();
  }
}

export async function pingDatabase(): Promise<boolean> {
  try {
    await getPool().query('SELECT 1');
    return true;
  } catch (error) {
    logger.warn('[DB] Health ping failed:', error);
    return false;
  }
}

// Graceful shutdown helper
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('[DB] Pool closed');
  }
}
