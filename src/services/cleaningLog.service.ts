/**
 * Cleaning-Log Recorder
 *
 * Keeps one audit entry per processed row and exposes them in submission
 * order, whatever order the batch finished in.
 *
 * Decision mapping:
 * - Strong top match          → auto-matched
 * - Matches, none strong      → ambiguous (needs human review)
 * - No match                  → unmatched
 * - Pipeline failure          → error (safe to retry later)
 */

import { stringify } from 'csv-stringify/sync';
import type {
  BatchOutcome,
  CleaningDecision,
  CleaningLogEntry,
  Query,
} from '../matching/types';
import { AppError, logger } from '../utils';

export interface CleaningLogSummary {
  total: number;
  autoMatched: number;
  ambiguous: number;
  unmatched: number;
  error: number;
}

export const CLEANING_LOG_COLUMNS = [
  { key: 'queryId', header: 'query_id' },
  { key: 'rawText', header: 'raw_text' },
  { key: 'decision', header: 'decision' },
  { key: 'chosen', header: 'chosen' },
  { key: 'chosenName', header: 'chosen_name' },
  { key: 'chosenScore', header: 'chosen_score' },
  { key: 'reason', header: 'reason' },
] as const;

/**
 * Builds the entry for one query outcome.
 */
export function buildCleaningLogEntry(query: Query, outcome: BatchOutcome): CleaningLogEntry {
  const base = { queryId: query.id, rawText: query.rawText };

  if (!outcome.ok) {
    return {
      ...base,
      decision: 'error',
      reason: `${outcome.failure}: ${outcome.detail}`,
      failure: outcome.failure,
    };
  }

  const [top] = outcome.result.matches;
  if (!top) {
    return { ...base, decision: 'unmatched', reason: 'No candidate cleared the score threshold' };
  }

  const chosen = { chosen: top.catalogId, chosenName: top.displayName, chosenScore: top.score };

  if (top.isStrongMatch) {
    return { ...base, ...chosen, decision: 'auto-matched', reason: `Strong match (score ${top.score})` };
  }

  const count = outcome.result.matches.length;
  return {
    ...base,
    ...chosen,
    decision: 'ambiguous',
    reason:
      count === 1
        ? `Best match below auto-match threshold (score ${top.score})`
        : `${count} candidate(s) need review; best score ${top.score}`,
  };
}

export class CleaningLogRecorder {
  private readonly bySequence = new Map<number, CleaningLogEntry>();

  /**
   * Records the outcome of the query submitted at position `sequence`.
   * Each position can be recorded once.
   */
  record(sequence: number, query: Query, outcome: BatchOutcome): CleaningLogEntry {
    if (this.bySequence.has(sequence)) {
      throw AppError.internal(`Cleaning log already holds row ${sequence}`);
    }

    const entry = buildCleaningLogEntry(query, outcome);
    if (entry.decision === 'ambiguous') {
      logger.debug(`Ambiguous result for "${query.id}": ${entry.reason}`);
    }

    this.bySequence.set(sequence, entry);
    return entry;
  }

  get size(): number {
    return this.bySequence.size;
  }

  /**
   * Entries in submission order.
   */
  entries(): CleaningLogEntry[] {
    return [...this.bySequence.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, entry]) => entry);
  }

  summary(): CleaningLogSummary {
    return summarizeCleaningLog(this.entries());
  }
}

const DECISION_COUNTERS: Record<CleaningDecision, keyof Omit<CleaningLogSummary, 'total'>> = {
  'auto-matched': 'autoMatched',
  ambiguous: 'ambiguous',
  unmatched: 'unmatched',
  error: 'error',
};

export function summarizeCleaningLog(entries: readonly CleaningLogEntry[]): CleaningLogSummary {
  const summary: CleaningLogSummary = {
    total: entries.length,
    autoMatched: 0,
    ambiguous: 0,
    unmatched: 0,
    error: 0,
  };

  for (const entry of entries) {
    summary[DECISION_COUNTERS[entry.decision]]++;
  }

  return summary;
}

/**
 * Renders entries as CSV with a header row.
 */
export function toCsv(entries: readonly CleaningLogEntry[]): string {
  return stringify(
    entries.map((entry) => ({ ...entry })),
    {
      header: true,
      columns: CLEANING_LOG_COLUMNS.map((column) => ({ key: column.key, header: column.header })),
    }
  );
}
