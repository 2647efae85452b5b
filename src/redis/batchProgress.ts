/**
 * Batch Progress Module
 *
 * Redis-backed progress tracking for background CSV reconciliation jobs.
 *
 * KEY FORMAT: batch:{batchId}:progress
 */

import { z } from 'zod';
import { safeRedisOperation, safeRedisWrite } from './client';

// ============================================
// Configuration
// ============================================

const CACHE_KEY_PREFIX = 'batch:';
const CACHE_KEY_SUFFIX = ':progress';

/**
 * Cache TTL in seconds (24 hours)
 * Long enough for a client to come back for the cleaning log
 */
export const BATCH_TTL_SECONDS = 24 * 60 * 60;

function getCacheKey(batchId: string): string {
  return `${CACHE_KEY_PREFIX}${batchId}${CACHE_KEY_SUFFIX}`;
}

// ============================================
// Data Structure
// ============================================

export const BATCH_STATUSES = ['queued', 'processing', 'completed', 'failed'] as const;

export type BatchStatus = (typeof BATCH_STATUSES)[number];

export interface BatchProgress {
  status: BatchStatus;
  filename: string;
  totalRows: number;
  processedCount: number;
  autoMatchedCount: number;
  ambiguousCount: number;
  unmatchedCount: number;
  errorCount: number;
  droppedBlankCount: number;
  droppedDuplicateCount: number;
  error?: string;
}

const count = z.coerce.number().int().nonnegative().catch(0);

// Redis hashes hold strings only
const storedProgressSchema = z.object({
  status: z.enum(BATCH_STATUSES),
  filename: z.string().default(''),
  totalRows: count,
  processedCount: count,
  autoMatchedCount: count,
  ambiguousCount: count,
  unmatchedCount: count,
  errorCount: count,
  droppedBlankCount: count,
  droppedDuplicateCount: count,
  error: z.string().optional(),
});

/**
 * Fresh progress record for a newly accepted upload.
 */
export function createBatchProgress(filename: string, status: BatchStatus = 'queued'): BatchProgress {
  return {
    status,
    filename,
    totalRows: 0,
    processedCount: 0,
    autoMatchedCount: 0,
    ambiguousCount: 0,
    unmatchedCount: 0,
    errorCount: 0,
    droppedBlankCount: 0,
    droppedDuplicateCount: 0,
  };
}

/**
 * Flattens progress into the string map stored in the Redis hash.
 */
export function serializeBatchProgress(progress: BatchProgress): Record<string, string> {
  const fields: Record<string, string> = {};

  for (const [key, value] of Object.entries(progress)) {
    if (value !== undefined) {
      fields[key] = String(value);
    }
  }

  return fields;
}

/**
 * Parses a stored hash. Returns null for a missing or unreadable record.
 */
export function deserializeBatchProgress(data: Record<string, string>): BatchProgress | null {
  if (Object.keys(data).length === 0) {
    return null;
  }

  const parsed = storedProgressSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}

// ============================================
// Cache Operations
// ============================================

export async function getCachedBatchProgress(batchId: string): Promise<BatchProgress | null> {
  const cacheKey = getCacheKey(batchId);

  return safeRedisOperation(
    async (client) => deserializeBatchProgress(await client.hgetall(cacheKey)),
    null,
    `Batch progress GET (${batchId})`
  );
}

/**
 * Replaces the stored progress. The hash is deleted first so that a field
 * left out (such as `error`) does not survive from an older write.
 */
export async function setCachedBatchProgress(
  batchId: string,
  progress: BatchProgress
): Promise<void> {
  const cacheKey = getCacheKey(batchId);

  await safeRedisWrite(async (client) => {
    const multi = client.multi();

    multi.del(cacheKey);
    multi.hset(cacheKey, serializeBatchProgress(progress));
    multi.expire(cacheKey, BATCH_TTL_SECONDS);

    await multi.exec();
  }, `Batch progress SET (${batchId})`);
}
