/**
 * Query Normalization for Product Reconciliation
 *
 * Product names arrive with arbitrary casing, punctuation and spacing.
 * This module canonicalizes them and flags the words that look like brands.
 *
 * Example transformations:
 * - "  Whole   MILK!! " → "whole milk"
 * - "Ben & Jerry's (Cookie Dough)" → "ben & jerry's cookie dough"
 * - "Coca-Cola Zero, 330ml" → "coca-cola zero 330ml" (brand token: "coca-cola")
 */

import { DEFAULT_PUNCTUATION } from './constants';
import { InvalidQueryError } from './errors';
import type { NormalizedQuery, Query } from './types';

export interface NormalizeOptions {
  /** Characters replaced by a space */
  punctuation?: string;
  /** Known brands, already normalized with the same punctuation set */
  brandVocabulary?: ReadonlySet<string>;
}

const patternCache = new Map<string, RegExp>();

function punctuationPattern(punctuation: string): RegExp | null {
  if (!punctuation) return null;

  let pattern = patternCache.get(punctuation);
  if (!pattern) {
    const escaped = [...new Set(punctuation)]
      .map((ch) => ch.replace(/[\\\]^-]/g, '\\$&'))
      .join('');
    pattern = new RegExp(`[${escaped}]`, 'g');
    patternCache.set(punctuation, pattern);
  }

  return pattern;
}

/**
 * Canonicalizes a string by:
 * 1. Lowercasing
 * 2. Replacing configured punctuation with spaces
 * 3. Collapsing whitespace and trimming
 *
 * @example
 * normalizeText("Whole   MILK!!") // Returns: "whole milk"
 */
export function normalizeText(input: string, punctuation: string = DEFAULT_PUNCTUATION): string {
  if (!input) {
    return '';
  }

  let normalized = input.toLowerCase();

  const pattern = punctuationPattern(punctuation);
  if (pattern) {
    normalized = normalized.replace(pattern, ' ');
  }

  return normalized.split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Normalizes every vocabulary entry once so lookups compare like with like.
 * Entries that normalize to nothing are dropped.
 */
export function buildBrandVocabulary(
  entries: readonly string[],
  punctuation: string = DEFAULT_PUNCTUATION
): ReadonlySet<string> {
  const vocabulary = new Set<string>();
  for (const entry of entries) {
    const normalized = normalizeText(entry, punctuation);
    if (normalized) vocabulary.add(normalized);
  }
  return vocabulary;
}

/**
 * True when `phrase` appears in `text` as a run of whole words.
 * Both strings must already be normalized.
 */
export function containsPhrase(text: string, phrase: string): boolean {
  if (!text || !phrase) return false;
  return ` ${text} `.includes(` ${phrase} `);
}

/**
 * Returns the vocabulary entries found in the canonical text.
 * Finding none is a valid outcome.
 */
export function extractBrandTokens(
  canonicalText: string,
  vocabulary: ReadonlySet<string>
): Set<string> {
  const tokens = new Set<string>();
  for (const brand of vocabulary) {
    if (containsPhrase(canonicalText, brand)) {
      tokens.add(brand);
    }
  }
  return tokens;
}

/**
 * Derives the NormalizedQuery for a Query.
 *
 * Fails only when the raw text is empty or whitespace-only. Text made of
 * punctuation alone normalizes to an empty canonical string and is left
 * for the pipeline to treat as "no match".
 *
 * @throws InvalidQueryError
 */
export function normalizeQuery(query: Query, options: NormalizeOptions = {}): NormalizedQuery {
  const punctuation = options.punctuation ?? DEFAULT_PUNCTUATION;
  const rawText = typeof query.rawText === 'string' ? query.rawText : '';

  if (rawText.trim() === '') {
    throw new InvalidQueryError(`Query "${query.id}" has no text`);
  }

  const canonicalText = normalizeText(rawText, punctuation);
  const brandTokens = extractBrandTokens(canonicalText, options.brandVocabulary ?? new Set());

  // An explicit brand hint counts even when it is not in the vocabulary
  const hint = normalizeText(query.brand ?? '', punctuation);
  if (hint) {
    brandTokens.add(hint);
  }

  return Object.freeze({
    id: query.id,
    canonicalText,
    brandTokens,
    brandHint: query.brand?.trim() || undefined,
  });
}

export default normalizeQuery;
