// =====================================================
// Settlement Reconcile Queue
// =====================================================
// Finishes a match settlement that failed on the critical path. Both
// steps are idempotent: the match insert is keyed on match_id and each
// wallet credit carries the key `match:{matchId}:{playerId}`, so a retry
// never double-applies. A winner's credit held back at finalization is
// priced here, with the streak the recorded match produced.

import { Queue, Worker, Job } from 'bullmq';
import { getRedisConnection } from './connection';
import { logger } from '../utils/logger';
import { calculateMatchReward } from '../lib/economy.service';
import {
  MatchResultStore,
  SettlementPayload,
  WalletStore,
  walletKey,
} from '../services/settlement/settlement.types';

// ===========================================
// Queue Name Constants
// ===========================================

export const SETTLEMENT_RECONCILE_QUEUE_NAME = 'settlement-reconcile-queue';

export interface ReconcileResult {
  matchId: string;
  inserted: boolean;
  credited: number;
}

export interface ReconcileDeps {
  results: MatchResultStore;
  wallet: WalletStore;
}

// ===========================================
// Queue Instance (Singleton)
// ===========================================

let reconcileQueue: Queue<SettlementPayload, ReconcileResult> | null = null;
let reconcileWorker: Worker<SettlementPayload, ReconcileResult> | null = null;

export function getSettlementReconcileQueue(): Queue<SettlementPayload, ReconcileResult> {
  if (!reconcileQueue) {
    reconcileQueue = new Queue<SettlementPayload, ReconcileResult>(SETTLEMENT_RECONCILE_QUEUE_NAME, {
      connection: getRedisConnection(),
      defaultJobOptions: {
        attempts: 8,
        backoff: { type: 'exponential', delay: 5000 },
        removeOnComplete: { age: 24 * 60 * 60, count: 1000 },
        removeOnFail: { age: 7 * 24 * 60 * 60 },
      },
    });
    logger.info(`[Reconcile] Queue initialized: ${SETTLEMENT_RECONCILE_QUEUE_NAME}`);
  }
  return reconcileQueue;
}

/**
 * Enqueue one settlement. The job id is the match id, so a second
 * request for the same match while one is pending is a no-op.
 */
export async function enqueueSettlementReconcile(payload: SettlementPayload): Promise<void> {
  await getSettlementReconcileQueue().add('reconcile-settlement', payload, {
    jobId: `reconcile-${payload.record.matchId}`,
  });
}

// ===========================================
// Job Processor
// ===========================================

/**
 * Throws on any store failure so BullMQ retries with backoff.
 */
export async function processSettlementReconcile(
  payload: SettlementPayload,
  deps: ReconcileDeps
): Promise<ReconcileResult> {
  const { record, results, credits } = payload;

  const outcome = await deps.results.recordMatch(record, results);

  let credited = 0;
  for (const { playerId, amount: provisional, pendingReward } of credits) {
    const amount = pendingReward
      ? calculateMatchReward({ ...pendingReward, winStreak: outcome.players[playerId]?.currentStreak ?? 0 }).total
      : provisional;
    if (amount <= 0) {
      continue;
    }
    const applied = await deps.wallet.credit(playerId, amount, walletKey(record.matchId, playerId), 'match_reward');
    if (applied) {
      credited++;
    }
  }

  logger.info(
    `[Reconcile] Match ${record.matchId}: ${outcome.inserted ? 'recorded' : 'already recorded'}, ${credited} credit(s) applied`
  );
  return { matchId: record.matchId, inserted: outcome.inserted, credited };
}

// ===========================================
// Worker Management
// ===========================================

export function startSettlementReconcileWorker(deps: ReconcileDeps): Worker<SettlementPayload, ReconcileResult> {
  if (reconcileWorker) {
    logger.warn('[Reconcile] Worker already running');
    return reconcileWorker;
  }

  reconcileWorker = new Worker<SettlementPayload, ReconcileResult>(
    SETTLEMENT_RECONCILE_QUEUE_NAME,
    (job: Job<SettlementPayload, ReconcileResult>) => processSettlementReconcile(job.data, deps),
    { connection: getRedisConnection().duplicate(), concurrency: 2 }
  );

  reconcileWorker.on('failed', (job, error) => {
    logger.error(`[Reconcile] Job ${job?.id} failed (attempt ${job?.attemptsMade ?? 0}):`, error);
  });
  reconcileWorker.on('error', (error) => {
    logger.error('[Reconcile] Worker error:', error);
  });

  logger.info('[Reconcile] Worker started');
  return reconcileWorker;
}

export async function stopSettlementReconcileWorker(): Promise<void> {
  if (reconcileWorker) {
    await reconcileWorker.close();
    reconcileWorker = null;
  }
  if (reconcileQueue) {
    await reconcileQueue.close();
    reconcileQueue = null;
  }
  logger.info('[Reconcile] Worker stopped');
}
