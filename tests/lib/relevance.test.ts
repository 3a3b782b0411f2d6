/**
 * Tests for position + engagement relevance
 */

import { describe, it, expect } from 'vitest';
import {
  clamp01,
  computeRelevance,
  engagementScore,
  positionScore,
  type RelevanceProfile,
} from '../../src/lib/relevance';

const PROFILE: RelevanceProfile = {
  positionWeight: 0.6,
  positionFloor: 0.3,
  terms: [
    { signal: 'score', weight: 0.55 },
    { signal: 'numComments', weight: 0.4 },
    { signal: 'upvoteRatio', weight: 0.05, cap: 1 },
  ],
  engagementScale: 7,
};

describe('Relevance', () => {
  describe('clamp01', () => {
    it('should clamp into [0, 1] and map NaN to 0', () => {
      expect(clamp01(1.5)).toBe(1);
      expect(clamp01(-0.2)).toBe(0);
      expect(clamp01(0.42)).toBe(0.42);
      expect(clamp01(Number.NaN)).toBe(0);
    });
  });

  describe('positionScore', () => {
    it('should score a single result 1.0', () => {
      expect(positionScore(0, 1, 0.3)).toBe(1);
    });

    it('should decay linearly from 1.0 to the floor', () => {
      expect(positionScore(0, 5, 0.3)).toBe(1);
      expect(positionScore(2, 5, 0.3)).toBeCloseTo(0.65);
      expect(positionScore(4, 5, 0.3)).toBeCloseTo(0.3);
    });
  });

  describe('engagementScore', () => {
    it('should be 0 without signals', () => {
      expect(engagementScore({}, PROFILE.terms, 7)).toBe(0);
    });

    it('should log-scale uncapped terms', () => {
      const terms = [{ signal: 'score' as const, weight: 1 }];
      expect(engagementScore({ score: Math.E - 1 }, terms, 2)).toBeCloseTo(0.5);
    });

    it('should scale capped terms linearly and stop at the cap', () => {
      const terms = [{ signal: 'readTime' as const, weight: 1, cap: 20 }];
      expect(engagementScore({ readTime: 10 }, terms, 1)).toBe(0.5);
      expect(engagementScore({ readTime: 40 }, terms, 1)).toBe(1);
    });

    it('should never exceed 1', () => {
      expect(engagementScore({ score: 1e12, numComments: 1e12, upvoteRatio: 1 }, PROFILE.terms, 7)).toBe(1);
    });
  });

  describe('computeRelevance', () => {
    it('should weight position against engagement', () => {
      expect(computeRelevance(0, 1, {}, PROFILE)).toBeCloseTo(0.6);
    });

    it('should never rank a later position above an earlier one with equal engagement', () => {
      const signals = { score: 50, numComments: 10 };
      const scores = [0, 1, 2, 3, 4].map(position => computeRelevance(position, 5, signals, PROFILE));
      for (let i = 1; i < scores.length; i++) {
        expect(scores[i - 1]).toBeGreaterThanOrEqual(scores[i]);
      }
    });
  });
});
