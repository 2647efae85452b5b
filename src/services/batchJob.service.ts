/**
 * Batch Job Service
 *
 * Background reconciliation of uploaded CSV files:
 *   upload → queued → processing → completed | failed
 *
 * Progress and the finished cleaning log live in a `BatchJobStore`
 * (Redis in production). Work is handed to a `BatchJobQueue` (BullMQ).
 */

import { unlink } from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import type { CleaningLogEntry } from '../matching/types';
import {
  createBatchProgress,
  getCachedBatchProgress,
  getCachedCleaningLog,
  isRedisAvailable,
  setCachedBatchProgress,
  setCachedCleaningLog,
  type BatchProgress,
} from '../redis';
import { AppError, errorMessage, logger } from '../utils';
import {
  enqueueReconciliationJob,
  type ReconciliationJobData,
} from '../workers/reconciliation.queue';

// ============================================
// Seams
// ============================================

export interface BatchJobStore {
  saveProgress(batchId: string, progress: BatchProgress): Promise<void>;
  getProgress(batchId: string): Promise<BatchProgress | null>;
  saveCleaningLog(batchId: string, entries: readonly CleaningLogEntry[]): Promise<void>;
  getCleaningLog(batchId: string): Promise<CleaningLogEntry[] | null>;
}

export interface BatchJobQueue {
  /** False when jobs cannot be accepted right now */
  isAvailable(): boolean;
  enqueue(data: ReconciliationJobData): Promise<void>;
}

export const redisBatchJobStore: BatchJobStore = {
  saveProgress: setCachedBatchProgress,
  getProgress: getCachedBatchProgress,
  saveCleaningLog: setCachedCleaningLog,
  getCleaningLog: getCachedCleaningLog,
};

export const bullmqBatchJobQueue: BatchJobQueue = {
  isAvailable: isRedisAvailable,
  enqueue: enqueueReconciliationJob,
};

// ============================================
// Status View
// ============================================

export interface BatchStatusView {
  batchId: string;
  filename: string;
  status: BatchProgress['status'];
  progress: number;
  statistics: {
    processed: number;
    autoMatched: number;
    ambiguous: number;
    unmatched: number;
    error: number;
  };
  cleaning: {
    totalRows: number;
    droppedBlank: number;
    droppedDuplicates: number;
  };
  error?: string;
}

/**
 * Percentage of accepted rows processed so far (100 once completed).
 */
export function calculateProgress(progress: BatchProgress): number {
  if (progress.status === 'completed') {
    return 100;
  }

  const accepted =
    progress.totalRows - progress.droppedBlankCount - progress.droppedDuplicateCount;
  if (accepted <= 0) {
    return 0;
  }

  return Math.min(99, Math.floor((progress.processedCount / accepted) * 100));
}

export function toBatchStatusView(batchId: string, progress: BatchProgress): BatchStatusView {
  return {
    batchId,
    filename: progress.filename,
    status: progress.status,
    progress: calculateProgress(progress),
    statistics: {
      processed: progress.processedCount,
      autoMatched: progress.autoMatchedCount,
      ambiguous: progress.ambiguousCount,
      unmatched: progress.unmatchedCount,
      error: progress.errorCount,
    },
    cleaning: {
      totalRows: progress.totalRows,
      droppedBlank: progress.droppedBlankCount,
      droppedDuplicates: progress.droppedDuplicateCount,
    },
    ...(progress.error ? { error: progress.error } : {}),
  };
}

// ============================================
// Service
// ============================================

export class BatchJobService {
  constructor(
    private readonly store: BatchJobStore = redisBatchJobStore,
    private readonly queue: BatchJobQueue = bullmqBatchJobQueue
  ) {}

  /**
   * Accepts an uploaded file for background reconciliation.
   *
   * @returns the new batch id
   * @throws AppError (503) when the job queue is unavailable
   */
  async submit(filePath: string, filename: string): Promise<string> {
    if (!this.queue.isAvailable()) {
      await this.discardUpload(filePath);
      throw AppError.serviceUnavailable('Background processing is unavailable. Try the batch endpoint.');
    }

    const batchId = uuidv4();
    await this.store.saveProgress(batchId, createBatchProgress(filename));

    try {
      await this.queue.enqueue({ batchId, filePath, filename });
    } catch (error) {
      logger.error(
        `[${batchId}] Enqueue failed: ${errorMessage(error)}`
      );
      await this.discardUpload(filePath);
      throw AppError.serviceUnavailable('Could not queue the upload for processing');
    }

    logger.info(`[${batchId}] Queued ${filename} for reconciliation`);
    return batchId;
  }

  async getStatus(batchId: string): Promise<BatchStatusView | null> {
    const progress = await this.store.getProgress(batchId);
    return progress ? toBatchStatusView(batchId, progress) : null;
  }

  /**
   * @throws AppError (404) for an unknown batch, (400) while it is still running
   */
  async getCleaningLog(batchId: string): Promise<CleaningLogEntry[]> {
    const progress = await this.store.getProgress(batchId);
    if (!progress) {
      throw AppError.notFound('Reconciliation batch not found');
    }

    if (progress.status !== 'completed') {
      throw AppError.badRequest(`Batch is ${progress.status}; the cleaning log is not ready`);
    }

    const entries = await this.store.getCleaningLog(batchId);
    if (!entries) {
      throw AppError.notFound('Cleaning log has expired');
    }

    return entries;
  }

  private async discardUpload(filePath: string): Promise<void> {
    try {
      await unlink(filePath);
    } catch (error) {
      logger.debug(
        `Could not remove upload ${filePath}: ${errorMessage(error)}`
      );
    }
  }
}

export default BatchJobService;
