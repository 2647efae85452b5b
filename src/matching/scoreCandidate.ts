/**
 * Candidate Scoring for Product Reconciliation
 *
 * Formula:
 *   lexical = 0.7 × tokenSet + 0.3 × jaroWinkler
 *   score   = clamp(lexical ± brand adjustment, 0, 1)
 *
 * Pure and deterministic: identical inputs always give the identical score.
 */

import {
  calculateJaroWinklerOrderIndependent,
  calculateTokenSetSimilarity,
} from './nameSimilarity';
import { brandAdjustment, compareBrands } from './brandWeight';
import { normalizeText } from './normalizeQuery';
import { SCORE_PRECISION, TOKEN_SET_WEIGHT } from './constants';
import type {
  CandidateRecord,
  NormalizedQuery,
  ScoreBreakdown,
  ScoringWeights,
} from './types';

export interface ScoringOptions extends ScoringWeights {
  punctuation?: string;
}

const SCALE = 10 ** SCORE_PRECISION;

function round(value: number): number {
  return Math.round(value * SCALE) / SCALE;
}

function clamp(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/**
 * Scores a candidate and returns every component of the calculation.
 */
export function scoreCandidateWithBreakdown(
  query: NormalizedQuery,
  candidate: CandidateRecord,
  options: ScoringOptions
): ScoreBreakdown {
  const candidateText = normalizeText(candidate.displayName, options.punctuation);

  const tokenSetSimilarity = calculateTokenSetSimilarity(query.canonicalText, candidateText);
  const jaroWinklerSimilarity = calculateJaroWinklerOrderIndependent(
    query.canonicalText,
    candidateText
  );
  const lexicalScore =
    TOKEN_SET_WEIGHT * tokenSetSimilarity + (1 - TOKEN_SET_WEIGHT) * jaroWinklerSimilarity;

  const brandAgreement = compareBrands(query.brandTokens, candidate.brand, options.punctuation);
  const adjustment = brandAdjustment(brandAgreement, options);

  return {
    tokenSetSimilarity: round(tokenSetSimilarity),
    jaroWinklerSimilarity: round(jaroWinklerSimilarity),
    lexicalScore: round(lexicalScore),
    brandAgreement,
    brandAdjustment: adjustment,
    finalScore: round(clamp(lexicalScore + adjustment)),
  };
}

/**
 * Similarity between a normalized query and a catalog candidate.
 *
 * @returns Score in [0, 1], rounded to 4 decimals
 *
 * @example
 * scoreCandidate(
 *   { id: 'q0', canonicalText: 'whole milk', brandTokens: new Set() },
 *   { catalogId: '12345', displayName: 'Whole Milk', attributes: {} },
 *   { brandBonus: 0.1, brandPenalty: 0.15 }
 * ) // Returns: 1
 */
export function scoreCandidate(
  query: NormalizedQuery,
  candidate: CandidateRecord,
  options: ScoringOptions
): number {
  return scoreCandidateWithBreakdown(query, candidate, options).finalScore;
}

/**
 * Human-readable explanation of a breakdown, used in cleaning-log reasons.
 */
export function explainScore(breakdown: ScoreBreakdown): string {
  const parts: string[] = [
    `Token set: ${breakdown.tokenSetSimilarity}`,
    `Jaro-Winkler: ${breakdown.jaroWinklerSimilarity}`,
  ];

  if (breakdown.brandAgreement === 'match') {
    parts.push(`Brand bonus: +${breakdown.brandAdjustment}`);
  } else if (breakdown.brandAgreement === 'contradiction') {
    parts.push(`Brand penalty: ${breakdown.brandAdjustment}`);
  }

  parts.push(`Final score: ${breakdown.finalScore}`);

  return parts.join('. ');
}

export default scoreCandidate;
