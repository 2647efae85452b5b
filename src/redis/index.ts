/**
 * Redis Module
 *
 * Client and storage helpers for background reconciliation jobs.
 * Synchronous reconciliation works without Redis.
 */

// Client exports
export {
  getRedisClient,
  isRedisAvailable,
  disconnectRedis,
  safeRedisOperation,
  safeRedisWrite,
} from './client';

// Batch progress exports
export {
  BATCH_STATUSES,
  BATCH_TTL_SECONDS,
  createBatchProgress,
  serializeBatchProgress,
  deserializeBatchProgress,
  getCachedBatchProgress,
  setCachedBatchProgress,
  type BatchProgress,
  type BatchStatus,
} from './batchProgress';

// Cleaning log exports
export { getCachedCleaningLog, setCachedCleaningLog, parseStoredCleaningLog } from './cleaningLogCache';
