/**
 * Candidate Provider contract
 *
 * The external catalog is reached only through this interface. Records are
 * validated here, once, so the engine can rely on their fixed shape.
 */

import { z } from 'zod';
import { logger } from '../utils';
import type { CandidateRecord, NormalizedQuery } from '../matching/types';

export interface CandidateProvider {
  readonly name: string;

  /**
   * Returns at most `limit` candidates for the query. An empty list means
   * nothing matched and is not an error.
   *
   * @throws UpstreamTimeoutError | UpstreamUnavailableError | UpstreamRejectedError
   */
  fetch(query: NormalizedQuery, limit: number, signal?: AbortSignal): Promise<CandidateRecord[]>;
}

/**
 * Shape every record must have before it reaches the scorer.
 * Blank brands become undefined; attributes default to an empty map.
 */
export const candidateRecordSchema = z.object({
  catalogId: z.string().trim().min(1),
  displayName: z.string().trim().min(1),
  brand: z
    .string()
    .nullish()
    .transform((value) => (value && value.trim() ? value.trim() : undefined)),
  attributes: z.record(z.string()).default({}),
});

/**
 * Validates raw records, dropping (and logging) the ones that do not fit.
 */
export function parseCandidateRecords(raw: readonly unknown[], source: string): CandidateRecord[] {
  const records: CandidateRecord[] = [];
  let rejected = 0;

  for (const item of raw) {
    const parsed = candidateRecordSchema.safeParse(item);
    if (parsed.success) {
      records.push(Object.freeze(parsed.data));
    } else {
      rejected++;
    }
  }

  if (rejected > 0) {
    logger.debug(`[${source}] Dropped ${rejected} malformed candidate record(s)`);
  }

  return records;
}
