/**
 * Reconciliation Background Worker
 *
 * Processes uploaded product CSV files:
 * 1. STREAMING - rows are parsed as the file is read
 * 2. CHUNKING - accepted rows are reconciled CHUNK_SIZE at a time, with
 *    progress published after each chunk
 * 3. PERSISTENCE - progress and the cleaning log go to the job store
 */

import { unlink } from 'fs/promises';
import type { Job } from 'bullmq';
import type { CleaningLogEntry, Query } from '../matching/types';
import { createBatchProgress, type BatchProgress } from '../redis';
import type { BatchJobStore } from '../services/batchJob.service';
import { summarizeCleaningLog } from '../services/cleaningLog.service';
import type { ReconciliationService } from '../services/reconciliation.service';
import { errorMessage, logger } from '../utils';
import { CsvQueryCleaner, createCsvRecordStream } from '../utils/csv';
import type { ReconciliationJobData } from './reconciliation.queue';

// ============================================
// Types
// ============================================

export type ReconciliationJob = Pick<Job<ReconciliationJobData>, 'id' | 'data' | 'updateProgress'>;

export interface ReconciliationWorkerDeps {
  reconciler: ReconciliationService;
  store: BatchJobStore;
  chunkSize?: number;
}

// ============================================
// Constants
// ============================================

export const CHUNK_SIZE = 200;

// ============================================
// Helpers
// ============================================

function withCounts(
  progress: BatchProgress,
  entries: readonly CleaningLogEntry[]
): BatchProgress {
  const summary = summarizeCleaningLog(entries);

  return {
    ...progress,
    processedCount: summary.total,
    autoMatchedCount: summary.autoMatched,
    ambiguousCount: summary.ambiguous,
    unmatchedCount: summary.unmatched,
    errorCount: summary.error,
  };
}

// ============================================
// Main Worker Job Handler
// ============================================

export function createReconciliationJobProcessor(deps: ReconciliationWorkerDeps) {
  const { reconciler, store } = deps;
  const chunkSize = Math.max(1, deps.chunkSize ?? CHUNK_SIZE);

  return async function processReconciliationJob(job: ReconciliationJob): Promise<void> {
    const { batchId, filePath, filename } = job.data;
    const startTime = Date.now();
    const cleaner = new CsvQueryCleaner(reconciler.config.punctuation);
    const cleaningLog: CleaningLogEntry[] = [];
    let progress = createBatchProgress(filename, 'processing');

    const publish = async (): Promise<void> => {
      const stats = cleaner.stats();
      progress = withCounts(
        {
          ...progress,
          totalRows: stats.totalRows,
          droppedBlankCount: stats.droppedBlank,
          droppedDuplicateCount: stats.droppedDuplicates,
        },
        cleaningLog
      );
      await store.saveProgress(batchId, progress);
    };

    const runChunk = async (chunk: Query[]): Promise<void> => {
      const report = await reconciler.reconcileBatch(chunk);
      cleaningLog.push(...report.cleaningLog);
      await publish();
    };

    try {
      await store.saveProgress(batchId, progress);
      logger.info(`[${batchId}] Starting job ${job.id ?? 'direct'} for file ${filename}`);

      let currentChunk: Query[] = [];

      for await (const record of createCsvRecordStream(filePath)) {
        const query = cleaner.accept(record);
        if (query) {
          currentChunk.push(query);
        }

        if (currentChunk.length >= chunkSize) {
          await runChunk(currentChunk);
          await job.updateProgress(cleaningLog.length);
          currentChunk = [];
        }
      }

      // Process final remaining chunk
      if (currentChunk.length > 0) {
        await runChunk(currentChunk);
      }

      await publish();
      await store.saveCleaningLog(batchId, cleaningLog);

      progress = { ...progress, status: 'completed' };
      await store.saveProgress(batchId, progress);
      await job.updateProgress(cleaningLog.length);

      const duration = Date.now() - startTime;
      logger.info(
        `[${batchId}] ✅ Job ${job.id ?? 'direct'} complete: ${cleaningLog.length} rows in ${duration}ms`
      );
    } catch (error) {
      const message = errorMessage(error);
      await store.saveProgress(batchId, { ...progress, status: 'failed', error: message });
      logger.error(`[${batchId}] ❌ Job ${job.id ?? 'direct'} failed: ${message}`);
      throw error;
    } finally {
      // Always cleanup temp file
      try {
        await unlink(filePath);
        logger.debug(`[${batchId}] Cleaned up temp file`);
      } catch (error) {
        logger.debug(
          `[${batchId}] Temp file cleanup skipped: ${errorMessage(error)}`
        );
      }
    }
  };
}

export default createReconciliationJobProcessor;
