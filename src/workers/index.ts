/**
 * Workers Module
 *
 * Background processing of uploaded CSV files.
 */

export {
  createReconciliationJobProcessor,
  CHUNK_SIZE,
  type ReconciliationJob,
  type ReconciliationWorkerDeps,
} from './reconciliationWorker';

export {
  RECONCILIATION_QUEUE_NAME,
  getReconciliationQueue,
  enqueueReconciliationJob,
  closeReconciliationQueue,
  setupReconciliationWorker,
  type ReconciliationJobData,
} from './reconciliation.queue';
