/**
 * Tests for Brand Weighting
 */

import {
  brandAdjustment,
  compareBrands,
  splitCandidateBrands,
} from '../../src/matching/brandWeight';

const weights = { brandBonus: 0.1, brandPenalty: 0.15 };

describe('splitCandidateBrands', () => {
  it('should split and normalize a comma-separated field', () => {
    expect(splitCandidateBrands('Coca-Cola, Coke ')).toEqual(['coca-cola', 'coke']);
  });

  it('should drop empty parts', () => {
    expect(splitCandidateBrands('Heinz,, ')).toEqual(['heinz']);
  });

  it('should return an empty list for a missing brand', () => {
    expect(splitCandidateBrands(undefined)).toEqual([]);
    expect(splitCandidateBrands('')).toEqual([]);
  });
});

describe('compareBrands', () => {
  it('should be neutral when the query names no brand', () => {
    expect(compareBrands(new Set(), 'Heinz')).toBe('neutral');
  });

  it('should be neutral when the candidate has no brand', () => {
    expect(compareBrands(new Set(['heinz']), undefined)).toBe('neutral');
  });

  it('should match on any listed brand', () => {
    expect(compareBrands(new Set(['coke']), 'Coca-Cola, Coke')).toBe('match');
  });

  it('should match when one brand contains the other as whole words', () => {
    expect(compareBrands(new Set(['coca-cola']), 'Coca-Cola Company')).toBe('match');
    expect(compareBrands(new Set(['heinz tomato']), 'Heinz')).toBe('match');
  });

  it('should not match on a partial word', () => {
    expect(compareBrands(new Set(['heinz']), 'Heinzel')).toBe('contradiction');
  });

  it('should report a contradiction for a different brand', () => {
    expect(compareBrands(new Set(['heinz']), "Hunt's")).toBe('contradiction');
  });
});

describe('brandAdjustment', () => {
  it('should add the bonus on a match', () => {
    expect(brandAdjustment('match', weights)).toBe(0.1);
  });

  it('should subtract the penalty on a contradiction', () => {
    expect(brandAdjustment('contradiction', weights)).toBe(-0.15);
  });

  it('should leave neutral scores unchanged', () => {
    expect(brandAdjustment('neutral', weights)).toBe(0);
  });
});
