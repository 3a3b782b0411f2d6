/**
 * Tests for per-source scoring and sorting
 */

import { describe, it, expect } from 'vitest';
import {
  scoreDailyDevItems,
  scoreRedditItems,
  scoreXItems,
  scoreYouTubeItems,
  sortItems,
} from '../../src/ranking/scorer';
import { createSources } from '../../src/feeds/sources';
import { createDailyDevItem, createRedditItem, createXItem, createYouTubeItem } from '../factories';

const sources = createSources();

describe('Scorer', () => {
  describe('single-item lists', () => {
    // Position score is 1.0, so without engagement the result is the position weight
    it('should give full position score for every source', () => {
      expect(scoreXItems(sources, [createXItem()])[0].relevance).toBeCloseTo(0.6);
      expect(scoreDailyDevItems(sources, [createDailyDevItem()])[0].relevance).toBeCloseTo(0.5);
      expect(scoreYouTubeItems(sources, [createYouTubeItem()])[0].relevance).toBeCloseTo(0.4);
    });

    it('should blend the model estimate into discussion scores', () => {
      const [item] = scoreRedditItems(sources, [createRedditItem({ relevance: 0.9 })]);
      expect(item.relevance).toBeCloseTo(0.75);
    });
  });

  it('should score earlier positions at least as high for equal engagement', () => {
    const engagement = { likes: 20, reposts: 2, replies: 3, quotes: 0 };
    const items = [1, 2, 3, 4].map(n => createXItem({ id: `X${n}`, url: `https://x.com/a/status/${n}`, engagement }));

    const scores = scoreXItems(sources, items).map(i => i.relevance);

    for (let i = 1; i < scores.length; i++) {
      expect(scores[i - 1]).toBeGreaterThanOrEqual(scores[i]);
    }
  });

  it('should keep every score within [0, 1]', () => {
    const loud = { views: 1e12, likes: 1e12, numComments: 1e12 };
    const items = [createYouTubeItem({ engagement: loud }), createYouTubeItem({ id: 'YT2' })];

    for (const item of scoreYouTubeItems(sources, items)) {
      expect(item.relevance).toBeGreaterThanOrEqual(0);
      expect(item.relevance).toBeLessThanOrEqual(1);
    }
  });

  it('should let engagement lift a later item', () => {
    const quiet = createDailyDevItem({ id: 'DD1' });
    const popular = createDailyDevItem({ id: 'DD2', engagement: { score: 5000, numComments: 800 }, readTime: 20 });

    const [first, second] = scoreDailyDevItems(sources, [quiet, popular]);

    // 0.5 * 1.0 + 0.5 * 0 vs 0.5 * 0.1 + 0.5 * 1.0
    expect(first.relevance).toBeCloseTo(0.5);
    expect(second.relevance).toBeCloseTo(0.55);
  });

  it('sortItems should order by relevance and keep ties stable', () => {
    const items = [
      createXItem({ id: 'X1', relevance: 0.4 }),
      createXItem({ id: 'X2', relevance: 0.9 }),
      createXItem({ id: 'X3', relevance: 0.4 }),
      createXItem({ id: 'X4', relevance: 0.7 }),
    ];

    expect(sortItems(items).map(i => i.id)).toEqual(['X2', 'X4', 'X1', 'X3']);
  });
});
