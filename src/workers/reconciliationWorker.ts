/**
 * Reconciliation Background Worker
 *
 * Executes queued orchestrator runs and mirrors their progress into Redis:
 * queued → processing → AWAITING_APPROVAL | COMPLETED | failed
 *
 * The job's return value is the run result; the Redis entry only serves
 * fast polling.
 */

import { run, type RunOptions, type RunResult } from '../agent';
import { logger } from '../utils';
import { markRunFailed, markRunFinished, markRunProcessing } from '../redis';
import type { ReconciliationJob, ReconciliationJobData } from './reconciliation.queue';

/**
 * Runs one batch. Exposed separately from the job handler so it can be
 * called without a queue.
 */
export async function processReconciliationRun(
  data: ReconciliationJobData,
  options: Pick<RunOptions, 'dependencies'> = {}
): Promise<RunResult> {
  const startTime = Date.now();
  await markRunProcessing(data.runId);
  logger.info(`[${data.runId}] Starting run for ${data.invoices.length} invoice(s)`);

  try {
    const result = await run(data.dataSource, data.modelArtifact, data.invoices, {
      runId: data.runId,
      minConf: data.minConf,
      dependencies: options.dependencies,
    });

    await markRunFinished(result);
    logger.info(`[${data.runId}] ✅ ${result.status} in ${Date.now() - startTime}ms`);
    return result;
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    await markRunFailed(data.runId, message);
    logger.error(`[${data.runId}] ❌ Run failed: ${message}`);
    throw error;
  }
}

export async function processReconciliationJob(
  job: Pick<ReconciliationJob, 'id' | 'attemptsMade' | 'data'>
): Promise<RunResult> {
  logger.debug(`Job ${job.id ?? 'unknown'} picked up (attempt ${job.attemptsMade + 1})`);
  return processReconciliationRun(job.data);
}
