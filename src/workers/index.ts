/**
 * Workers Module
 *
 * Background execution of reconciliation runs.
 */

export { processReconciliationRun, processReconciliationJob } from './reconciliationWorker';
export {
  getReconciliationQueue,
  closeReconciliationQueue,
  setupReconciliationWorker,
  RECONCILIATION_QUEUE_NAME,
  type ReconciliationJobData,
  type ReconciliationJob,
} from './reconciliation.queue';
