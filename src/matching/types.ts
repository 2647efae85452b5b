/**
 * Type Definitions for the Product Reconciliation Engine
 *
 * These types define the input/output contracts for the engine.
 * Scoring and selection are pure; the only I/O happens behind
 * the CandidateProvider contract in `src/catalog`.
 */

// ============================================
// INPUT TYPES
// ============================================

/**
 * A free-text product name submitted for reconciliation.
 */
export interface Query {
  /** Caller-assigned correlation key (protocol key, CSV row id, ...) */
  readonly id: string;
  /** Text as the caller typed it */
  readonly rawText: string;
  /** Optional brand hint supplied next to the name */
  readonly brand?: string;
  /** Per-query top-N request, clamped to the configured bounds */
  readonly limit?: number;
}

/**
 * Canonical form of a Query. Frozen once created.
 */
export interface NormalizedQuery {
  readonly id: string;
  readonly canonicalText: string;
  readonly brandTokens: ReadonlySet<string>;
  /** Caller's brand as written, for providers that can filter by brand */
  readonly brandHint?: string;
}

/**
 * A product record as returned by the catalog.
 * Validated once at the provider boundary.
 */
export interface CandidateRecord {
  readonly catalogId: string;
  readonly displayName: string;
  readonly brand?: string;
  readonly attributes: Readonly<Record<string, string>>;
}

// ============================================
// OUTPUT TYPES
// ============================================

export interface Match {
  readonly catalogId: string;
  readonly displayName: string;
  /** Similarity in [0, 1] */
  readonly score: number;
  /** Confident enough to accept without human review */
  readonly isStrongMatch: boolean;
  readonly typeTags: readonly string[];
}

/**
 * Ranked matches for one query: descending score, ties by catalogId ascending.
 * An empty list means "no match".
 */
export interface ReconciliationResult {
  readonly queryId: string;
  readonly matches: readonly Match[];
}

export type ErrorKind =
  | 'INVALID_QUERY'
  | 'UPSTREAM_TIMEOUT'
  | 'UPSTREAM_UNAVAILABLE'
  | 'UPSTREAM_REJECTED'
  | 'INTERNAL';

export type BatchOutcome =
  | { readonly queryId: string; readonly ok: true; readonly result: ReconciliationResult }
  | {
      readonly queryId: string;
      readonly ok: false;
      readonly failure: ErrorKind;
      readonly detail: string;
    };

export type CleaningDecision = 'auto-matched' | 'ambiguous' | 'unmatched' | 'error';

/**
 * One audit row per processed query, consumed by the CSV export.
 */
export interface CleaningLogEntry {
  readonly queryId: string;
  readonly rawText: string;
  readonly chosen?: string;
  readonly chosenName?: string;
  readonly chosenScore?: number;
  readonly decision: CleaningDecision;
  readonly reason: string;
  readonly failure?: ErrorKind;
}

// ============================================
// SCORING TYPES
// ============================================

export interface ScoringWeights {
  /** Added when the candidate brand agrees with a query brand token */
  brandBonus: number;
  /** Subtracted when the candidate brand contradicts every query brand token */
  brandPenalty: number;
}

export type BrandAgreement = 'match' | 'contradiction' | 'neutral';

/**
 * Components of a candidate score, kept for explanations and debugging.
 */
export interface ScoreBreakdown {
  tokenSetSimilarity: number;
  jaroWinklerSimilarity: number;
  lexicalScore: number;
  brandAgreement: BrandAgreement;
  brandAdjustment: number;
  finalScore: number;
}

export interface ScoredCandidate {
  readonly candidate: CandidateRecord;
  readonly score: number;
}

export interface SelectionOptions {
  scoreThreshold: number;
  autoMatchThreshold: number;
  ambiguityEpsilon: number;
  topN: number;
}

// ============================================
// CONFIGURATION
// ============================================

/**
 * Immutable engine configuration, built and validated once at startup.
 */
export interface ReconcilerConfig {
  readonly scoreThreshold: number;
  readonly autoMatchThreshold: number;
  readonly ambiguityEpsilon: number;
  readonly topN: number;
  readonly concurrencyLimit: number;
  readonly candidateFetchLimit: number;
  readonly retryCount: number;
  readonly backoffBaseMs: number;
  readonly catalogTimeoutMs: number;
  readonly brandBonus: number;
  readonly brandPenalty: number;
  /** Characters replaced by a space during normalization */
  readonly punctuation: string;
  readonly brandVocabulary: readonly string[];
}
