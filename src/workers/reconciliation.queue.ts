import { Queue, Worker, Job, type ConnectionOptions } from 'bullmq';
import { env } from '../config';
import type { InvoiceRequest, RunResult } from '../agent';
import { logger } from '../utils';

// ============================================
// Job payload
// ============================================

export interface ReconciliationJobData {
  runId: string;
  dataSource: string;
  modelArtifact: string;
  invoices: InvoiceRequest[];
  minConf: number;
}

export type ReconciliationJob = Job<ReconciliationJobData, RunResult>;

// ============================================
// Redis Connection for BullMQ
// ============================================

const connection = (): ConnectionOptions => ({
  host: env.REDIS_HOST,
  port: env.REDIS_PORT,
  // BullMQ requires maxRetriesPerRequest to be null
  maxRetriesPerRequest: null,
});

// ============================================
// Queue Definition
// ============================================

export const RECONCILIATION_QUEUE_NAME = 'reconciliation-runs';

let queue: Queue<ReconciliationJobData, RunResult> | null = null;

/**
 * The queue connects on construction, so it is only created on first use.
 */
export function getReconciliationQueue(): Queue<ReconciliationJobData, RunResult> {
  if (!queue) {
    queue = new Queue<ReconciliationJobData, RunResult>(RECONCILIATION_QUEUE_NAME, {
      connection: connection(),
      defaultJobOptions: {
        attempts: 3,
        backoff: {
          type: 'exponential',
          delay: 1000,
        },
        removeOnComplete: { age: env.RUN_STATE_TTL_SECONDS },
        removeOnFail: false,
      },
    });
  }
  return queue;
}

export async function closeReconciliationQueue(): Promise<void> {
  if (queue) {
    await queue.close();
    queue = null;
  }
}

// ============================================
// Worker Setup
// ============================================

export function setupReconciliationWorker(
  processor: (job: ReconciliationJob) => Promise<RunResult>
): Worker<ReconciliationJobData, RunResult> {
  const worker = new Worker<ReconciliationJobData, RunResult>(RECONCILIATION_QUEUE_NAME, processor, {
    connection: connection(),
    concurrency: env.WORKER_CONCURRENCY,
    lockDuration: 60000,
  });

  worker.on('completed', (job) => {
    logger.info(`[Job ${job.id}] Reconciliation run completed`);
  });

  worker.on('failed', (job, err) => {
    logger.error(`[Job ${job?.id}] Reconciliation run failed: ${err.message}`);
  });

  worker.on('error', (err) => {
    logger.error(`Worker error: ${err.message}`);
  });

  return worker;
}
