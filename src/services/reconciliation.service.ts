/**
 * Reconciliation Service
 *
 * Orchestration layer between routes, the reconciliation engine and the
 * background queue:
 * - Scoring a single (invoice, PO) pair
 * - Running a batch synchronously
 * - Queueing a batch and reading its state back
 *
 * REDIS INTEGRATION:
 * - Run state is mirrored in Redis for fast polling
 * - The queue job remains the SOURCE OF TRUTH for background runs
 * - Without Redis, synchronous scoring and runs work unchanged
 */

import { randomUUID } from 'crypto';
import { env } from '../config';
import { run, defaultToolDependencies, type InvoiceRequest, type RunResult, type ToolDependencies } from '../agent';
import { decide, undeterminedResult, type MatchResult } from '../matching';
import { buildRunState, getCachedRunState, markRunFinished, markRunQueued, type CachedRunState } from '../redis';
import { getReconciliationQueue } from '../workers/reconciliation.queue';
import { AppError } from '../utils';
import { score } from './scoring.service';

// ============================================
// Types
// ============================================

export interface ReconciliationSettings {
  dataDir: string;
  modelPath: string;
  minConf: number;
  backgroundRuns: boolean;
}

export interface PairVerdict extends MatchResult {
  invoiceId: string;
  poNumber: string;
  found: boolean;
  /** Mismatch probability from the classifier; null when the pair has no feature row */
  probability: number | null;
}

export interface QueuedRun {
  runId: string;
  status: 'queued';
}

export const defaultSettings = (): ReconciliationSettings => ({
  dataDir: env.DATA_DIR,
  modelPath: env.MODEL_PATH,
  minConf: env.MIN_CONFIDENCE,
  backgroundRuns: env.REDIS_ENABLED,
});

// ============================================
// Service
// ============================================

export class ReconciliationService {
  constructor(
    private readonly dependencies: ToolDependencies = defaultToolDependencies(),
    private readonly settings: ReconciliationSettings = defaultSettings()
  ) {}

  /**
   * Scores one pair and applies the decision policy.
   *
   * @throws ConfigurationError when the dataset or model is unavailable
   */
  async scoreInvoice(invoiceId: string, poNumber: string): Promise<PairVerdict> {
    const source = await this.dependencies.resolveDataSource(this.settings.dataDir);
    const store = this.dependencies.resolveModelArtifact(this.settings.modelPath);
    const result = await score(source, store, invoiceId, poNumber, this.dependencies.resources);

    if (!result.found) {
      return { invoiceId, poNumber, found: false, probability: null, ...undeterminedResult() };
    }

    return {
      invoiceId,
      poNumber,
      found: true,
      probability: result.probability,
      ...decide(result.probability, result.facts),
    };
  }

  /**
   * Runs a batch to its approval checkpoint and mirrors the result to Redis.
   */
  async runBatch(invoices: InvoiceRequest[], minConf?: number): Promise<RunResult> {
    const result = await run(this.settings.dataDir, this.settings.modelPath, invoices, {
      minConf: minConf ?? this.settings.minConf,
      dependencies: this.dependencies,
    });
    await markRunFinished(result);
    return result;
  }

  /**
   * Queues a batch for the background worker.
   *
   * @throws AppError (503) when background runs are disabled
   */
  async enqueueRun(invoices: InvoiceRequest[], minConf?: number): Promise<QueuedRun> {
    if (!this.settings.backgroundRuns) {
      throw new AppError('Background runs require Redis (REDIS_ENABLED=true)', 503);
    }

    const runId = randomUUID();
    await getReconciliationQueue().add(
      'run',
      {
        runId,
        dataSource: this.settings.dataDir,
        modelArtifact: this.settings.modelPath,
        invoices,
        minConf: minConf ?? this.settings.minConf,
      },
      { jobId: runId }
    );
    await markRunQueued(runId);

    return { runId, status: 'queued' };
  }

  /**
   * Reads run state from Redis, falling back to the queue job.
   */
  async getRun(runId: string): Promise<CachedRunState | null> {
    const cached = await getCachedRunState(runId);
    if (cached || !this.settings.backgroundRuns) {
      return cached;
    }

    const job = await getReconciliationQueue().getJob(runId);
    if (!job) {
      return null;
    }

    const state = await job.getState();
    if (state === 'completed') {
      return buildRunState(runId, job.returnvalue.status, job.returnvalue);
    }
    if (state === 'failed') {
      return buildRunState(runId, 'failed', null, job.failedReason);
    }
    return buildRunState(runId, state === 'active' ? 'processing' : 'queued');
  }
}

export const reconciliationService = new ReconciliationService();

export default reconciliationService;
