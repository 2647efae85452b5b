/**
 * Tests for Candidate Scoring
 */

import {
  explainScore,
  scoreCandidate,
  scoreCandidateWithBreakdown,
} from '../../src/matching/scoreCandidate';
import { normalizeQuery } from '../../src/matching/normalizeQuery';
import type { CandidateRecord } from '../../src/matching/types';

const options = { brandBonus: 0.1, brandPenalty: 0.15 };

function candidate(displayName: string, brand?: string): CandidateRecord {
  return { catalogId: '3017620422003', displayName, brand, attributes: {} };
}

describe('scoreCandidate', () => {
  describe('exact matches', () => {
    it('should return 1 for the same name in different case', () => {
      const query = normalizeQuery({ id: 'q0', rawText: 'whole milk' });
      expect(scoreCandidate(query, candidate('Whole Milk'), options)).toBe(1);
    });

    it('should cap a brand bonus at 1', () => {
      const query = normalizeQuery({ id: 'q0', rawText: 'tomato ketchup', brand: 'Heinz' });
      expect(scoreCandidate(query, candidate('Tomato Ketchup', 'Heinz'), options)).toBe(1);
    });
  });

  describe('partial matches', () => {
    it('should score a contained name highly', () => {
      const query = normalizeQuery({ id: 'q0', rawText: 'milk' });
      const score = scoreCandidate(query, candidate('Whole Milk'), options);

      expect(score).toBeGreaterThan(0.9);
      expect(score).toBeLessThan(1);
    });

    it('should keep a typo above the score threshold', () => {
      const query = normalizeQuery({ id: 'q0', rawText: 'mlk' });
      expect(scoreCandidate(query, candidate('Milk'), options)).toBeGreaterThan(0.7);
    });
  });

  describe('brand weighting', () => {
    it('should subtract the penalty for a contradicting brand', () => {
      const query = normalizeQuery({ id: 'q0', rawText: 'tomato ketchup', brand: 'Heinz' });
      expect(scoreCandidate(query, candidate('Tomato Ketchup', "Hunt's"), options)).toBe(0.85);
    });

    it('should ignore a candidate without a brand', () => {
      const query = normalizeQuery({ id: 'q0', rawText: 'tomato ketchup', brand: 'Heinz' });
      expect(scoreCandidate(query, candidate('Tomato Ketchup'), options)).toBe(1);
    });

    it('should rank the agreeing brand above the contradicting one', () => {
      const query = normalizeQuery({ id: 'q0', rawText: 'ketchup', brand: 'Heinz' });
      const agreeing = scoreCandidate(query, candidate('Tomato Ketchup', 'Heinz'), options);
      const contradicting = scoreCandidate(query, candidate('Tomato Ketchup', "Hunt's"), options);

      expect(agreeing).toBeGreaterThan(contradicting);
    });
  });

  describe('edge cases', () => {
    it('should return 0 for unrelated names', () => {
      const query = normalizeQuery({ id: 'q0', rawText: 'milk' });
      expect(scoreCandidate(query, candidate('zzz'), options)).toBe(0);
    });

    it('should never go below 0', () => {
      const query = normalizeQuery({ id: 'q0', rawText: 'milk', brand: 'Heinz' });
      expect(scoreCandidate(query, candidate('zzz', "Hunt's"), options)).toBe(0);
    });

    it('should round to 4 decimal places', () => {
      const query = normalizeQuery({ id: 'q0', rawText: 'peanut butter' });
      const score = scoreCandidate(query, candidate('Butter Cookies'), options);

      expect(Math.round(score * 10000) / 10000).toBe(score);
    });

    it('should be deterministic', () => {
      const query = normalizeQuery({ id: 'q0', rawText: 'choco cereal' });
      const first = scoreCandidate(query, candidate('Chocolate Cereal'), options);
      const second = scoreCandidate(query, candidate('Chocolate Cereal'), options);

      expect(second).toBe(first);
    });
  });
});

describe('scoreCandidateWithBreakdown', () => {
  it('should expose every component', () => {
    const query = normalizeQuery({ id: 'q0', rawText: 'tomato ketchup', brand: 'Heinz' });
    const breakdown = scoreCandidateWithBreakdown(query, candidate('Tomato Ketchup', "Hunt's"), options);

    expect(breakdown).toEqual({
      tokenSetSimilarity: 1,
      jaroWinklerSimilarity: 1,
      lexicalScore: 1,
      brandAgreement: 'contradiction',
      brandAdjustment: -0.15,
      finalScore: 0.85,
    });
  });
});

describe('explainScore', () => {
  it('should describe a brand penalty', () => {
    expect(
      explainScore({
        tokenSetSimilarity: 1,
        jaroWinklerSimilarity: 1,
        lexicalScore: 1,
        brandAgreement: 'contradiction',
        brandAdjustment: -0.15,
        finalScore: 0.85,
      })
    ).toBe('Token set: 1. Jaro-Winkler: 1. Brand penalty: -0.15. Final score: 0.85');
  });

  it('should describe a brand bonus', () => {
    expect(
      explainScore({
        tokenSetSimilarity: 0.9,
        jaroWinklerSimilarity: 0.8,
        lexicalScore: 0.87,
        brandAgreement: 'match',
        brandAdjustment: 0.1,
        finalScore: 0.97,
      })
    ).toBe('Token set: 0.9. Jaro-Winkler: 0.8. Brand bonus: +0.1. Final score: 0.97');
  });

  it('should omit the brand for neutral scores', () => {
    expect(
      explainScore({
        tokenSetSimilarity: 0.5,
        jaroWinklerSimilarity: 0.6,
        lexicalScore: 0.53,
        brandAgreement: 'neutral',
        brandAdjustment: 0,
        finalScore: 0.53,
      })
    ).toBe('Token set: 0.5. Jaro-Winkler: 0.6. Final score: 0.53');
  });
});
