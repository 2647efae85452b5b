/**
 * Tests for Query Normalization
 */

import {
  buildBrandVocabulary,
  containsPhrase,
  extractBrandTokens,
  normalizeQuery,
  normalizeText,
} from '../../src/matching/normalizeQuery';
import { InvalidQueryError } from '../../src/matching/errors';

describe('normalizeText', () => {
  it('should lowercase and collapse whitespace', () => {
    expect(normalizeText('  Whole   MILK ')).toBe('whole milk');
  });

  it('should replace punctuation with spaces', () => {
    expect(normalizeText('Whole MILK!!')).toBe('whole milk');
    expect(normalizeText('Ketchup (500g)')).toBe('ketchup 500g');
    expect(normalizeText('milk,bread')).toBe('milk bread');
  });

  it("should keep hyphens, ampersands and apostrophes", () => {
    expect(normalizeText("Ben & Jerry's")).toBe("ben & jerry's");
    expect(normalizeText('Coca-Cola Zero')).toBe('coca-cola zero');
  });

  it('should honour a custom punctuation set', () => {
    expect(normalizeText('Coca-Cola', '-')).toBe('coca cola');
    expect(normalizeText('a]b^c\\d', ']^\\')).toBe('a b c d');
  });

  it('should return empty string for punctuation-only input', () => {
    expect(normalizeText('!!! ...')).toBe('');
  });

  it('should return empty string for empty input', () => {
    expect(normalizeText('')).toBe('');
  });
});

describe('containsPhrase', () => {
  it('should match whole words only', () => {
    expect(containsPhrase('heinz tomato ketchup', 'heinz')).toBe(true);
    expect(containsPhrase('heinz tomato ketchup', 'tomato ketchup')).toBe(true);
    expect(containsPhrase('heinzel soup', 'heinz')).toBe(false);
  });

  it('should return false for empty values', () => {
    expect(containsPhrase('', 'heinz')).toBe(false);
    expect(containsPhrase('heinz', '')).toBe(false);
  });
});

describe('extractBrandTokens', () => {
  const vocabulary = buildBrandVocabulary(['Heinz', "Ben & Jerry's", 'Coca-Cola', '!!!']);

  it('should normalize the vocabulary and drop empty entries', () => {
    expect([...vocabulary]).toEqual(['heinz', "ben & jerry's", 'coca-cola']);
  });

  it('should find every known brand in the text', () => {
    const tokens = extractBrandTokens("heinz and ben & jerry's", vocabulary);
    expect([...tokens].sort()).toEqual(["ben & jerry's", 'heinz']);
  });

  it('should return an empty set when no brand is present', () => {
    expect(extractBrandTokens('whole milk', vocabulary).size).toBe(0);
  });
});

describe('normalizeQuery', () => {
  const brandVocabulary = buildBrandVocabulary(['Coca-Cola', 'Heinz']);

  it('should produce the canonical text and brand tokens', () => {
    const normalized = normalizeQuery(
      { id: 'q0', rawText: 'Coca-Cola Zero, 330ml' },
      { brandVocabulary }
    );

    expect(normalized.id).toBe('q0');
    expect(normalized.canonicalText).toBe('coca-cola zero 330ml');
    expect([...normalized.brandTokens]).toEqual(['coca-cola']);
  });

  it('should add the explicit brand hint', () => {
    const normalized = normalizeQuery({ id: 'q1', rawText: 'Tomato Ketchup', brand: 'Hellmann’s' });
    expect([...normalized.brandTokens]).toEqual(['hellmann’s']);
  });

  it('should keep the trimmed brand hint as written', () => {
    expect(normalizeQuery({ id: 'q1', rawText: 'Ketchup', brand: '  Heinz ' }).brandHint).toBe('Heinz');
    expect(normalizeQuery({ id: 'q2', rawText: 'Ketchup', brand: '   ' }).brandHint).toBeUndefined();
    expect(normalizeQuery({ id: 'q3', rawText: 'Ketchup' }).brandHint).toBeUndefined();
  });

  it('should return a frozen object', () => {
    const normalized = normalizeQuery({ id: 'q2', rawText: 'milk' });
    expect(Object.isFrozen(normalized)).toBe(true);
  });

  it('should give an empty canonical text for punctuation-only input', () => {
    const normalized = normalizeQuery({ id: 'q3', rawText: '?!' });
    expect(normalized.canonicalText).toBe('');
    expect(normalized.brandTokens.size).toBe(0);
  });

  it('should reject empty text', () => {
    expect(() => normalizeQuery({ id: 'q4', rawText: '' })).toThrow(InvalidQueryError);
  });

  it('should reject whitespace-only text', () => {
    expect(() => normalizeQuery({ id: 'q5', rawText: ' \t ' })).toThrow('Query "q5" has no text');
  });

  it('should be idempotent on its canonical text', () => {
    const once = normalizeQuery({ id: 'q6', rawText: '  Peanut  BUTTER (crunchy) ' });
    const twice = normalizeQuery({ id: 'q6', rawText: once.canonicalText });
    expect(twice.canonicalText).toBe(once.canonicalText);
  });
});
