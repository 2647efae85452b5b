/**
 * Batch Orchestrator
 *
 * Runs one reconciliation pipeline per query under a concurrency bound.
 *
 * Guarantees:
 * - At most `concurrencyLimit` pipelines in flight at any instant
 * - A failing query becomes that query's failure outcome; siblings are
 *   neither cancelled nor delayed
 * - Exactly one outcome per input query, in input order
 */

import pLimit from 'p-limit';
import { classifyError } from '../matching/errors';
import type { BatchOutcome, Query, ReconciliationResult } from '../matching/types';
import { logger } from '../utils';
import type { CleaningLogRecorder } from './cleaningLog.service';

export type QueryPipeline = (query: Query) => Promise<ReconciliationResult>;

/**
 * Runs the pipeline for one query and captures any failure as a value.
 */
export async function runPipeline(query: Query, pipeline: QueryPipeline): Promise<BatchOutcome> {
  try {
    const result = await pipeline(query);
    return { queryId: query.id, ok: true, result };
  } catch (error) {
    const { kind, detail } = classifyError(error);
    logger.warn(`Query "${query.id}" failed (${kind}): ${detail}`);
    return { queryId: query.id, ok: false, failure: kind, detail };
  }
}

/**
 * Reconciles every query, at most `concurrencyLimit` at a time.
 * Outcomes are buffered by input position, so completion order does not
 * leak into the result.
 */
export async function reconcileBatch(
  queries: readonly Query[],
  concurrencyLimit: number,
  pipeline: QueryPipeline,
  recorder?: CleaningLogRecorder
): Promise<BatchOutcome[]> {
  const bound = Number.isFinite(concurrencyLimit) ? Math.max(1, Math.floor(concurrencyLimit)) : 1;
  const limit = pLimit(bound);
  const outcomes: BatchOutcome[] = new Array<BatchOutcome>(queries.length);

  const startTime = Date.now();

  await Promise.all(
    queries.map((query, index) =>
      limit(async () => {
        const outcome = await runPipeline(query, pipeline);
        outcomes[index] = outcome;
        recorder?.record(index, query, outcome);
      })
    )
  );

  const failed = outcomes.filter((outcome) => !outcome.ok).length;
  logger.info(
    `Batch of ${queries.length} quer${queries.length === 1 ? 'y' : 'ies'} reconciled in ${Date.now() - startTime}ms (${failed} failed, concurrency ${bound})`
  );

  return outcomes;
}

export default reconcileBatch;
