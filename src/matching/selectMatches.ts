/**
 * Match Selection for Product Reconciliation
 *
 * Turns scored candidates into the ranked result for one query:
 * 1. Drop candidates below the score threshold
 * 2. Sort by score descending, catalogId ascending on ties
 * 3. Keep the top N (N clamped to 5-30)
 * 4. Flag the top match as strong when it clears the auto-match
 *    threshold and no runner-up sits within epsilon of it
 */

import { PRODUCT_TYPE_TAG, TOP_N_MAX, TOP_N_MIN } from './constants';
import type { Match, ReconciliationResult, ScoredCandidate, SelectionOptions } from './types';

/**
 * Bounds a requested result size to the supported range.
 *
 * @example
 * clampTopN(2) // 5
 * clampTopN(50) // 30
 */
export function clampTopN(requested: number): number {
  if (!Number.isFinite(requested)) {
    return TOP_N_MIN;
  }
  return Math.min(TOP_N_MAX, Math.max(TOP_N_MIN, Math.floor(requested)));
}

function compareScored(a: ScoredCandidate, b: ScoredCandidate): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  if (a.candidate.catalogId < b.candidate.catalogId) return -1;
  if (a.candidate.catalogId > b.candidate.catalogId) return 1;
  return 0;
}

/**
 * Decides whether the best surviving candidate may be auto-accepted.
 */
export function isStrongMatch(
  ranked: readonly ScoredCandidate[],
  options: Pick<SelectionOptions, 'autoMatchThreshold' | 'ambiguityEpsilon'>
): boolean {
  const [top, runnerUp] = ranked;

  if (!top || top.score <= options.autoMatchThreshold) {
    return false;
  }

  return !runnerUp || top.score - runnerUp.score > options.ambiguityEpsilon;
}

/**
 * Builds the ranked result for one query. An empty result means "no match".
 */
export function selectMatches(
  queryId: string,
  scored: readonly ScoredCandidate[],
  options: SelectionOptions
): ReconciliationResult {
  const ranked = scored
    .filter((entry) => entry.score >= options.scoreThreshold)
    .sort(compareScored);

  const strong = isStrongMatch(ranked, options);

  const matches: Match[] = ranked.slice(0, clampTopN(options.topN)).map((entry, index) => ({
    catalogId: entry.candidate.catalogId,
    displayName: entry.candidate.displayName,
    score: entry.score,
    isStrongMatch: index === 0 && strong,
    typeTags: [PRODUCT_TYPE_TAG],
  }));

  return { queryId, matches };
}

export default selectMatches;
