/**
 * Canonical item builders shared by the pipeline-stage tests
 */

import type { DailyDevItem, RedditItem, XItem, YouTubeItem } from '../src/types';

export const createRedditItem = (overrides: Partial<RedditItem> = {}): RedditItem => ({
  source: 'reddit',
  id: 'R1',
  title: 'Bun 1.2 is out',
  url: 'https://www.reddit.com/r/bun/comments/1/bun_12/',
  subreddit: 'bun',
  date: '2026-01-20',
  dateConfidence: 'verified',
  engagement: null,
  topComments: [],
  commentInsights: [],
  relevance: 0.5,
  whyRelevant: '',
  ...overrides,
});

export const createXItem = (overrides: Partial<XItem> = {}): XItem => ({
  source: 'x',
  id: 'X1',
  text: 'Bun test runner is fast',
  url: 'https://x.com/dev/status/1',
  authorHandle: 'dev',
  date: '2026-01-20',
  dateConfidence: 'verified',
  engagement: null,
  relevance: 0.5,
  whyRelevant: '',
  ...overrides,
});

export const createDailyDevItem = (overrides: Partial<DailyDevItem> = {}): DailyDevItem => ({
  source: 'dailydev',
  id: 'DD1',
  title: 'What is new in Bun',
  url: 'https://app.daily.dev/posts/bun',
  sourceName: 'Example Blog',
  authorName: 'Ada Example',
  authorUsername: 'adaexample',
  summary: '',
  tags: [],
  readTime: null,
  date: '2026-01-20',
  dateConfidence: 'verified',
  engagement: null,
  relevance: 0.5,
  whyRelevant: '',
  ...overrides,
});

export const createYouTubeItem = (overrides: Partial<YouTubeItem> = {}): YouTubeItem => ({
  source: 'youtube',
  id: 'YT1',
  title: 'Bun in 10 minutes',
  url: 'https://www.youtube.com/watch?v=vid1',
  channelName: 'Example Channel',
  channelId: 'UC1',
  duration: null,
  thumbnail: '',
  date: '2026-01-20',
  dateConfidence: 'verified',
  engagement: null,
  relevance: 0.5,
  whyRelevant: '',
  ...overrides,
});
