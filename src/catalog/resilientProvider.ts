/**
 * Timeout and retry policy around a Candidate Provider.
 *
 * - Every call gets its own deadline; on expiry the call is aborted and
 *   fails with UpstreamTimeoutError
 * - Only timeouts are retried, at most `retryCount` times, with exponential
 *   backoff: base, 2 × base, 4 × base, ...
 * - Unavailable and rejected errors propagate on the first occurrence
 * - The requested limit is capped and results are de-duplicated by catalogId
 */

import { MAX_CANDIDATE_FETCH_LIMIT, MAX_RETRY_COUNT } from '../matching/constants';
import type { CandidateRecord, NormalizedQuery } from '../matching/types';
import { logger } from '../utils';
import type { CandidateProvider } from './candidateProvider';
import { UpstreamTimeoutError } from './errors';

export interface RetryPolicy {
  timeoutMs: number;
  retryCount: number;
  backoffBaseMs: number;
  /** Replaceable so tests can observe backoff without waiting */
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Keeps the first record for each catalogId.
 */
export function dedupeCandidates(records: readonly CandidateRecord[]): CandidateRecord[] {
  const seen = new Set<string>();
  const unique: CandidateRecord[] = [];

  for (const record of records) {
    if (seen.has(record.catalogId)) continue;
    seen.add(record.catalogId);
    unique.push(record);
  }

  return unique;
}

export class ResilientCandidateProvider implements CandidateProvider {
  public readonly name: string;
  private readonly retryCount: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly inner: CandidateProvider,
    private readonly policy: RetryPolicy
  ) {
    this.name = inner.name;
    this.retryCount = Math.max(0, Math.min(MAX_RETRY_COUNT, Math.floor(policy.retryCount)));
    this.sleep = policy.sleep ?? defaultSleep;
  }

  async fetch(
    query: NormalizedQuery,
    limit: number,
    signal?: AbortSignal
  ): Promise<CandidateRecord[]> {
    const cappedLimit = Math.max(1, Math.min(MAX_CANDIDATE_FETCH_LIMIT, Math.floor(limit)));

    for (let attempt = 0; ; attempt++) {
      try {
        const records = await this.attempt(query, cappedLimit, signal);
        return dedupeCandidates(records).slice(0, cappedLimit);
      } catch (error) {
        if (!(error instanceof UpstreamTimeoutError) || attempt >= this.retryCount) {
          throw error;
        }

        const delay = this.policy.backoffBaseMs * 2 ** attempt;
        logger.warn(
          `[${this.name}] Query "${query.id}" timed out (attempt ${attempt + 1}/${this.retryCount + 1}), retrying in ${delay}ms`
        );
        await this.sleep(delay);
      }
    }
  }

  /**
   * One call under its own deadline.
   */
  private async attempt(
    query: NormalizedQuery,
    limit: number,
    signal?: AbortSignal
  ): Promise<CandidateRecord[]> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        // Settle first: the aborted call may reject with its own error
        reject(new UpstreamTimeoutError(`Catalog request exceeded ${this.policy.timeoutMs}ms`));
        controller.abort();
      }, this.policy.timeoutMs);
    });

    try {
      return await Promise.race([this.inner.fetch(query, limit, controller.signal), deadline]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

export default ResilientCandidateProvider;
