/**
 * Tests for Match Selection
 */

import { clampTopN, isStrongMatch, selectMatches } from '../../src/matching/selectMatches';
import type { ScoredCandidate, SelectionOptions } from '../../src/matching/types';

const options: SelectionOptions = {
  scoreThreshold: 0.5,
  autoMatchThreshold: 0.8,
  ambiguityEpsilon: 0.05,
  topN: 20,
};

function scored(catalogId: string, score: number): ScoredCandidate {
  return { candidate: { catalogId, displayName: `Product ${catalogId}`, attributes: {} }, score };
}

describe('clampTopN', () => {
  it('should raise small values to 5', () => {
    expect(clampTopN(2)).toBe(5);
    expect(clampTopN(0)).toBe(5);
  });

  it('should cap large values at 30', () => {
    expect(clampTopN(50)).toBe(30);
  });

  it('should keep values in range', () => {
    expect(clampTopN(12)).toBe(12);
  });

  it('should fall back to 5 for non-finite values', () => {
    expect(clampTopN(Number.NaN)).toBe(5);
  });
});

describe('isStrongMatch', () => {
  it('should accept a lone candidate above the auto-match threshold', () => {
    expect(isStrongMatch([scored('a', 0.95)], options)).toBe(true);
  });

  it('should reject a score equal to the threshold', () => {
    expect(isStrongMatch([scored('a', 0.8)], options)).toBe(false);
  });

  it('should reject when the runner-up is within epsilon', () => {
    expect(isStrongMatch([scored('a', 0.95), scored('b', 0.92)], options)).toBe(false);
  });

  it('should accept when the runner-up is clearly behind', () => {
    expect(isStrongMatch([scored('a', 0.95), scored('b', 0.6)], options)).toBe(true);
  });

  it('should reject an empty list', () => {
    expect(isStrongMatch([], options)).toBe(false);
  });
});

describe('selectMatches', () => {
  it('should return an empty result when nothing clears the threshold', () => {
    const result = selectMatches('q0', [scored('a', 0.2), scored('b', 0.49)], options);
    expect(result).toEqual({ queryId: 'q0', matches: [] });
  });

  it('should keep a score equal to the threshold', () => {
    const result = selectMatches('q0', [scored('a', 0.5)], options);
    expect(result.matches.map((match) => match.catalogId)).toEqual(['a']);
  });

  it('should sort by score descending', () => {
    const result = selectMatches(
      'q0',
      [scored('a', 0.6), scored('b', 0.9), scored('c', 0.75)],
      options
    );
    expect(result.matches.map((match) => match.score)).toEqual([0.9, 0.75, 0.6]);
  });

  it('should break ties by catalogId ascending', () => {
    const result = selectMatches('q0', [scored('b', 0.7), scored('a', 0.7)], options);
    expect(result.matches.map((match) => match.catalogId)).toEqual(['a', 'b']);
  });

  it('should truncate to the clamped top N', () => {
    const many = Array.from({ length: 40 }, (_, index) =>
      scored(`id-${String(index).padStart(2, '0')}`, 0.6)
    );

    expect(selectMatches('q0', many, { ...options, topN: 3 }).matches).toHaveLength(5);
    expect(selectMatches('q0', many, { ...options, topN: 100 }).matches).toHaveLength(30);
  });

  it('should flag only the top match as strong', () => {
    const result = selectMatches('q0', [scored('a', 0.95), scored('b', 0.6)], options);

    expect(result.matches.map((match) => match.isStrongMatch)).toEqual([true, false]);
  });

  it('should flag nothing when the top two are within epsilon', () => {
    const result = selectMatches('q0', [scored('a', 0.95), scored('b', 0.93)], options);

    expect(result.matches.every((match) => !match.isStrongMatch)).toBe(true);
  });

  it('should compare the top match with its runner-up', () => {
    const result = selectMatches(
      'q0',
      [scored('a', 0.95), scored('b', 0.94), scored('c', 0.6)],
      options
    );
    expect(result.matches[0]).toMatchObject({ catalogId: 'a', isStrongMatch: false });
  });

  it('should tag every match as a product', () => {
    const result = selectMatches('q0', [scored('a', 0.7)], options);
    expect(result.matches[0]).toEqual({
      catalogId: 'a',
      displayName: 'Product a',
      score: 0.7,
      isStrongMatch: false,
      typeTags: ['product'],
    });
  });

  it('should not modify its input', () => {
    const input = [scored('b', 0.6), scored('a', 0.9)];
    selectMatches('q0', input, options);
    expect(input.map((entry) => entry.candidate.catalogId)).toEqual(['b', 'a']);
  });
});
