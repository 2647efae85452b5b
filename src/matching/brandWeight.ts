/**
 * Brand Weighting for Product Reconciliation
 *
 * A brand named in the query is strong evidence:
 * - Candidate brand agrees with a query brand token: bonus
 * - Query names a brand, candidate names only other brands: penalty
 * - Query names no brand, or the catalog has no brand for the candidate: neutral
 *
 * Catalog brand fields may list several brands ("Coca-Cola, Coke").
 */

import { containsPhrase, normalizeText } from './normalizeQuery';
import type { BrandAgreement, ScoringWeights } from './types';

/**
 * Splits a catalog brand field into normalized brand names.
 *
 * @example
 * splitCandidateBrands("Coca-Cola, Coke") // ["coca-cola", "coke"]
 */
export function splitCandidateBrands(brand: string | undefined, punctuation?: string): string[] {
  if (!brand) return [];

  return brand
    .split(',')
    .map((part) => normalizeText(part, punctuation))
    .filter(Boolean);
}

/**
 * Classifies how a candidate's brand relates to the query's brand tokens.
 * Two brands agree when one contains the other as whole words
 * ("coca-cola" agrees with "coca-cola company").
 */
export function compareBrands(
  brandTokens: ReadonlySet<string>,
  candidateBrand: string | undefined,
  punctuation?: string
): BrandAgreement {
  if (brandTokens.size === 0) {
    return 'neutral';
  }

  const candidateBrands = splitCandidateBrands(candidateBrand, punctuation);
  if (candidateBrands.length === 0) {
    return 'neutral';
  }

  for (const token of brandTokens) {
    for (const name of candidateBrands) {
      if (containsPhrase(name, token) || containsPhrase(token, name)) {
        return 'match';
      }
    }
  }

  return 'contradiction';
}

/**
 * Signed score adjustment for a brand agreement.
 *
 * @example
 * brandAdjustment('match', { brandBonus: 0.1, brandPenalty: 0.15 }) // 0.1
 * brandAdjustment('contradiction', { brandBonus: 0.1, brandPenalty: 0.15 }) // -0.15
 */
export function brandAdjustment(agreement: BrandAgreement, weights: ScoringWeights): number {
  switch (agreement) {
    case 'match':
      return weights.brandBonus;
    case 'contradiction':
      return -weights.brandPenalty;
    default:
      return 0;
  }
}
