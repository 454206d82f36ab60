// =====================================================
// Match Sweep Queue
// =====================================================
// Repeating housekeeping job: drops waiting-pool entries whose heartbeat
// lapsed and ends sessions nobody has touched within the idle grace.
// Sessions live in this process, so every instance runs its own worker
// under a per-instance queue name.

import { Queue, Worker } from 'bullmq';
import { getRedisConnection } from './connection';
import { logger } from '../utils/logger';
import type { SweepReport } from '../services/game/session-registry';

export const MATCH_SWEEP_QUEUE_PREFIX = 'match-sweep-queue';
const SWEEP_EVERY_MS = 30 * 1000;

export interface MatchSweepJobData {
  triggeredBy: 'scheduled' | 'manual';
}

export type SweepFn = () => Promise<SweepReport>;

let sweepQueue: Queue<MatchSweepJobData, SweepReport> | null = null;
let sweepWorker: Worker<MatchSweepJobData, SweepReport> | null = null;

export async function startMatchSweep(instanceId: string, sweep: SweepFn): Promise<void> {
  if (sweepWorker) {
    logger.warn('[Sweep] Worker already running');
    return;
  }
  const queueName = `${MATCH_SWEEP_QUEUE_PREFIX}-${instanceId}`;

  sweepQueue = new Queue<MatchSweepJobData, SweepReport>(queueName, {
    connection: getRedisConnection(),
    defaultJobOptions: { removeOnComplete: { count: 50 }, removeOnFail: { count: 200 } },
  });

  sweepWorker = new Worker<MatchSweepJobData, SweepReport>(queueName, () => sweep(), {
    connection: getRedisConnection().duplicate(),
    concurrency: 1,
  });
  sweepWorker.on('failed', (job, error) => {
    logger.error(`[Sweep] Job ${job?.id} failed:`, error);
  });
  sweepWorker.on('error', (error) => {
    logger.error('[Sweep] Worker error:', error);
  });

  await sweepQueue.add(
    'sweep',
    { triggeredBy: 'scheduled' },
    { repeat: { every: SWEEP_EVERY_MS }, jobId: 'match-sweep' }
  );
  logger.info(`[Sweep] Scheduled every ${SWEEP_EVERY_MS / 1000}s on ${queueName}`);
}

export async function stopMatchSweep(): Promise<void> {
  if (sweepWorker) {
    await sweepWorker.close();
    sweepWorker = null;
  }
  if (sweepQueue) {
    await sweepQueue.obliterate({ force: true }).catch((error: unknown) => {
      logger.warn('[Sweep] Could not remove queue on shutdown:', error);
    });
    await sweepQueue.close();
    sweepQueue = null;
  }
}
