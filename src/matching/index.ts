/**
 * Product Reconciliation Matching Engine
 *
 * Pure, deterministic functions for matching free-text product names to
 * catalog records based on:
 * - Token-set similarity (fuzzball)
 * - Jaro-Winkler similarity (natural)
 * - Brand agreement bonus / contradiction penalty
 *
 * Usage:
 * ```typescript
 * import { normalizeQuery, scoreCandidate, selectMatches } from './matching';
 *
 * const normalized = normalizeQuery({ id: 'q0', rawText: 'Whole Milk' });
 * const scored = candidates.map((candidate) => ({
 *   candidate,
 *   score: scoreCandidate(normalized, candidate, weights),
 * }));
 * const result = selectMatches('q0', scored, selection);
 * ```
 */

// Normalization
export {
  normalizeQuery,
  normalizeText,
  buildBrandVocabulary,
  extractBrandTokens,
  containsPhrase,
  type NormalizeOptions,
} from './normalizeQuery';

// Scoring
export {
  calculateJaroWinkler,
  calculateJaroWinklerOrderIndependent,
  calculateTokenSetSimilarity,
} from './nameSimilarity';
export { compareBrands, brandAdjustment, splitCandidateBrands } from './brandWeight';
export {
  scoreCandidate,
  scoreCandidateWithBreakdown,
  explainScore,
  type ScoringOptions,
} from './scoreCandidate';

// Selection
export { selectMatches, isStrongMatch, clampTopN } from './selectMatches';

// Errors
export { ReconciliationError, InvalidQueryError, classifyError } from './errors';

// Constants
export {
  DEFAULT_SCORE_THRESHOLD,
  DEFAULT_AUTO_MATCH_THRESHOLD,
  DEFAULT_AMBIGUITY_EPSILON,
  DEFAULT_TOP_N,
  TOP_N_MIN,
  TOP_N_MAX,
  DEFAULT_PUNCTUATION,
  PRODUCT_TYPE_TAG,
} from './constants';

// Types
export type {
  Query,
  NormalizedQuery,
  CandidateRecord,
  Match,
  ReconciliationResult,
  ErrorKind,
  BatchOutcome,
  CleaningDecision,
  CleaningLogEntry,
  ScoringWeights,
  BrandAgreement,
  ScoreBreakdown,
  ScoredCandidate,
  SelectionOptions,
  ReconcilerConfig,
} from './types';
