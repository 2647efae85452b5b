/**
 * Lexical Similarity for Product Reconciliation
 *
 * Two complementary measures, both normalized to 0-1:
 *
 * - Token-set similarity (fuzzball): order-independent and tolerant of
 *   partial overlap, so "milk" scores high against "Whole Milk".
 * - Jaro-Winkler (natural): character-level, keeps short typos such as
 *   "mlk" → "milk" close where token comparison sees nothing in common.
 */

import natural from 'natural';
import * as fuzz from 'fuzzball';

/**
 * Jaro-Winkler similarity between two normalized strings.
 *
 * @returns Similarity from 0 to 1
 *
 * @example
 * calculateJaroWinkler("whole milk", "whole milk") // 1
 * calculateJaroWinkler("abc", "xyz") // 0
 */
export function calculateJaroWinkler(a: string, b: string): number {
  if (!a || !b) {
    return 0;
  }

  if (a === b) {
    return 1;
  }

  return natural.JaroWinklerDistance(a, b, {});
}

/**
 * Jaro-Winkler with word-order independence.
 * Helps match "milk whole" with "whole milk".
 *
 * Strategy:
 * 1. Compare the strings as given
 * 2. Sort words alphabetically and compare again
 * 3. Return the higher score
 */
export function calculateJaroWinklerOrderIndependent(a: string, b: string): number {
  if (!a || !b) {
    return 0;
  }

  const directSimilarity = calculateJaroWinkler(a, b);

  const wordsA = a.split(' ').sort().join(' ');
  const wordsB = b.split(' ').sort().join(' ');
  const sortedSimilarity = calculateJaroWinkler(wordsA, wordsB);

  return Math.max(directSimilarity, sortedSimilarity);
}

/**
 * Token-set similarity: compares the shared tokens against each side's
 * remainder, so extra words on the longer string cost little.
 *
 * @returns Similarity from 0 to 1
 *
 * @example
 * calculateTokenSetSimilarity("milk", "whole milk") // 1
 * calculateTokenSetSimilarity("milk", "zzz") // 0
 */
export function calculateTokenSetSimilarity(a: string, b: string): number {
  if (!a || !b) {
    return 0;
  }

  if (a === b) {
    return 1;
  }

  return fuzz.token_set_ratio(a, b) / 100;
}
