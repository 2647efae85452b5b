/**
 * Constants for the Product Reconciliation Engine
 *
 * Defaults for every tunable knob. Deployments override most of them
 * through environment variables (see src/config).
 */

// ============================================
// SELECTION THRESHOLDS
// ============================================

/**
 * Candidates scoring below this are dropped from the result.
 */
export const DEFAULT_SCORE_THRESHOLD = 0.5;

/**
 * The top candidate is flagged as a strong match only above this score.
 * Must stay above DEFAULT_SCORE_THRESHOLD.
 */
export const DEFAULT_AUTO_MATCH_THRESHOLD = 0.8;

/**
 * A runner-up within this distance of the top score makes the top match
 * ambiguous, whatever its absolute score.
 */
export const DEFAULT_AMBIGUITY_EPSILON = 0.05;

// ============================================
// RESULT SIZE
// ============================================

export const TOP_N_MIN = 5;
export const TOP_N_MAX = 30;
export const DEFAULT_TOP_N = 20;

// ============================================
// CANDIDATE RETRIEVAL
// ============================================

/** How many candidates to ask the catalog for per query */
export const DEFAULT_CANDIDATE_FETCH_LIMIT = 40;

/** Hard cap on any catalog request, whatever the configuration says */
export const MAX_CANDIDATE_FETCH_LIMIT = 100;

export const DEFAULT_CATALOG_TIMEOUT_MS = 10_000;
export const DEFAULT_RETRY_COUNT = 2;
export const MAX_RETRY_COUNT = 2;
export const DEFAULT_BACKOFF_BASE_MS = 250;

// ============================================
// BATCHING
// ============================================

export const DEFAULT_CONCURRENCY_LIMIT = 4;

// ============================================
// SCORING WEIGHTS
// ============================================

/**
 * Share of the lexical score taken by the token-set similarity.
 * The rest comes from word-order independent Jaro-Winkler.
 *
 * - "milk" vs "Whole Milk": token set ≈ 1.0 (all query tokens present)
 * - "mlk" vs "milk": token set is low, Jaro-Winkler keeps the typo close
 */
export const TOKEN_SET_WEIGHT = 0.7;

export const DEFAULT_BRAND_BONUS = 0.1;
export const DEFAULT_BRAND_PENALTY = 0.15;

/** Scores are rounded to this many decimals */
export const SCORE_PRECISION = 4;

// ============================================
// NORMALIZATION
// ============================================

/**
 * ASCII punctuation replaced by spaces during normalization.
 * "&", "-" and "'" are kept: they belong to names like
 * "Ben & Jerry's" or "Coca-Cola".
 */
export const DEFAULT_PUNCTUATION = '!"#$%()*+,./:;<=>?@[\\]^_`{|}~';

// ============================================
// PROTOCOL
// ============================================

export const PRODUCT_TYPE_TAG = 'product';
