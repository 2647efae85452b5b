/**
 * Cleaning-Log Cache
 *
 * Keeps the finished cleaning log of a background job so that it can be
 * downloaded later.
 *
 * KEY FORMAT: batch:{batchId}:cleaning-log
 */

import { z } from 'zod';
import type { CleaningLogEntry } from '../matching/types';
import { errorMessage, logger } from '../utils';
import { BATCH_TTL_SECONDS } from './batchProgress';
import { safeRedisOperation, safeRedisWrite } from './client';

function getCacheKey(batchId: string): string {
  return `batch:${batchId}:cleaning-log`;
}

const cleaningLogEntrySchema = z.object({
  queryId: z.string(),
  rawText: z.string(),
  decision: z.enum(['auto-matched', 'ambiguous', 'unmatched', 'error']),
  chosen: z.string().optional(),
  chosenName: z.string().optional(),
  chosenScore: z.number().optional(),
  reason: z.string(),
  failure: z
    .enum(['INVALID_QUERY', 'UPSTREAM_TIMEOUT', 'UPSTREAM_UNAVAILABLE', 'UPSTREAM_REJECTED', 'INTERNAL'])
    .optional(),
});

const cleaningLogSchema = z.array(cleaningLogEntrySchema);

/**
 * Parses a stored log. Returns null when the payload is not a valid log.
 */
export function parseStoredCleaningLog(raw: string): CleaningLogEntry[] | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    logger.warn(`Stored cleaning log is not JSON: ${errorMessage(error)}`);
    return null;
  }

  const parsed = cleaningLogSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}

export async function getCachedCleaningLog(batchId: string): Promise<CleaningLogEntry[] | null> {
  const cacheKey = getCacheKey(batchId);

  return safeRedisOperation(
    async (client) => {
      const raw = await client.get(cacheKey);
      return raw === null ? null : parseStoredCleaningLog(raw);
    },
    null,
    `Cleaning log GET (${batchId})`
  );
}

export async function setCachedCleaningLog(
  batchId: string,
  entries: readonly CleaningLogEntry[]
): Promise<void> {
  const cacheKey = getCacheKey(batchId);

  await safeRedisWrite(async (client) => {
    await client.set(cacheKey, JSON.stringify(entries), 'EX', BATCH_TTL_SECONDS);
  }, `Cleaning log SET (${batchId})`);
}
