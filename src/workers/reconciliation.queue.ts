import { Queue, Worker, Job, ConnectionOptions } from 'bullmq';
import { env } from '../config';
import { logger } from '../utils';

// ============================================
// Job Payload
// ============================================

export interface ReconciliationJobData {
  batchId: string;
  filePath: string;
  filename: string;
}

// ============================================
// Redis Connection for BullMQ
// ============================================

const connection: ConnectionOptions = {
  host: env.REDIS_HOST,
  port: env.REDIS_PORT,
  // BullMQ requires maxRetriesPerRequest to be null
  maxRetriesPerRequest: null,
};

// ============================================
// Queue Definition
// ============================================

export const RECONCILIATION_QUEUE_NAME = 'product-reconciliation-batch';
export const RECONCILIATION_JOB_NAME = 'reconcile-csv';

let reconciliationQueue: Queue<ReconciliationJobData> | null = null;

/**
 * Creates the queue on first use, so that importing this module opens no
 * Redis connection.
 */
export function getReconciliationQueue(): Queue<ReconciliationJobData> {
  if (!reconciliationQueue) {
    reconciliationQueue = new Queue<ReconciliationJobData>(RECONCILIATION_QUEUE_NAME, {
      connection,
      defaultJobOptions: {
        // The uploaded file is removed after the first attempt
        attempts: 1,
        removeOnComplete: true,
        removeOnFail: false,
      },
    });
  }
  return reconciliationQueue;
}

export async function enqueueReconciliationJob(data: ReconciliationJobData): Promise<void> {
  await getReconciliationQueue().add(RECONCILIATION_JOB_NAME, data, { jobId: data.batchId });
}

export async function closeReconciliationQueue(): Promise<void> {
  if (reconciliationQueue) {
    await reconciliationQueue.close();
    reconciliationQueue = null;
  }
}

// ============================================
// Worker Setup
// ============================================

export function setupReconciliationWorker(
  processor: (job: Job<ReconciliationJobData>) => Promise<void>
): Worker<ReconciliationJobData> {
  const worker = new Worker<ReconciliationJobData>(RECONCILIATION_QUEUE_NAME, processor, {
    connection,
    concurrency: env.WORKER_CONCURRENCY,
    // Large files hold the lock while their catalog calls run
    lockDuration: 60000,
  });

  worker.on('completed', (job) => {
    logger.info(`[Job ${job.id}] Batch reconciliation completed`);
  });

  worker.on('failed', (job, err) => {
    logger.error(`[Job ${job?.id}] Batch reconciliation failed: ${err.message}`);
  });

  worker.on('error', (err) => {
    logger.error(`Worker error: ${err.message}`);
  });

  return worker;
}
