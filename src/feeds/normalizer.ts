/**
 * Pulse30 — Item Normalizer
 *
 * Converts parsed adapter items into canonical research items:
 * date confidence against the window, clamped relevance, clean engagement.
 * Pure; never drops an item (filtering is a separate stage).
 */

import type {
  Comment,
  DailyDevItem,
  DateWindow,
  Engagement,
  ParsedItem,
  RedditItem,
  XItem,
  YouTubeItem,
} from '../types';
import { getDateConfidence } from '../lib/dates';
import { clamp01 } from '../lib/relevance';

export const DEFAULT_RELEVANCE = 0.5;

const COUNTER_KEYS = ['score', 'numComments', 'likes', 'reposts', 'replies', 'quotes', 'views'] as const;

// ============================================================
// FIELD HELPERS
// ============================================================

function normalizeCount(value: number | null | undefined): number | null {
  if (value == null || !Number.isFinite(value)) return null;
  return Math.max(0, Math.trunc(value));
}

function normalizeRatio(value: number | null | undefined): number | null {
  if (value == null || !Number.isFinite(value)) return null;
  return clamp01(value);
}

/**
 * Counters become non-negative integers or null; an engagement record that
 * reports nothing becomes null.
 */
export function normalizeEngagement(engagement: Engagement | null | undefined): Engagement | null {
  if (!engagement) return null;

  const result: Engagement = {};
  let reported = false;

  for (const key of COUNTER_KEYS) {
    if (!(key in engagement)) continue;
    const value = normalizeCount(engagement[key]);
    result[key] = value;
    if (value !== null) reported = true;
  }

  if ('upvoteRatio' in engagement) {
    result.upvoteRatio = normalizeRatio(engagement.upvoteRatio);
    if (result.upvoteRatio !== null) reported = true;
  }

  return reported ? result : null;
}

export function normalizeRelevance(value: number | undefined): number {
  return clamp01(value ?? DEFAULT_RELEVANCE);
}

function normalizeComment(comment: Comment): Comment {
  return {
    score: Number.isFinite(comment.score) ? Math.trunc(comment.score) : 0,
    date: comment.date,
    author: comment.author.trim(),
    excerpt: comment.excerpt.trim(),
    url: comment.url.trim(),
  };
}

// ============================================================
// SOURCE-SPECIFIC NORMALIZERS
// ============================================================

export function normalizeRedditItems(items: ParsedItem<RedditItem>[], window: DateWindow): RedditItem[] {
  return items.map(item => ({
    ...item,
    title: item.title.trim(),
    subreddit: item.subreddit.trim(),
    dateConfidence: getDateConfidence(item.date, window.from, window.to),
    engagement: normalizeEngagement(item.engagement),
    topComments: item.topComments.map(normalizeComment),
    commentInsights: [...item.commentInsights],
    relevance: normalizeRelevance(item.relevance),
    whyRelevant: item.whyRelevant.trim(),
  }));
}

export function normalizeXItems(items: ParsedItem<XItem>[], window: DateWindow): XItem[] {
  return items.map(item => ({
    ...item,
    text: item.text.trim(),
    authorHandle: item.authorHandle.trim().replace(/^@+/, ''),
    dateConfidence: getDateConfidence(item.date, window.from, window.to),
    engagement: normalizeEngagement(item.engagement),
    relevance: normalizeRelevance(item.relevance),
    whyRelevant: item.whyRelevant.trim(),
  }));
}

export function normalizeDailyDevItems(items: ParsedItem<DailyDevItem>[], window: DateWindow): DailyDevItem[] {
  return items.map(item => ({
    ...item,
    title: item.title.trim(),
    tags: [...new Set(item.tags.map(tag => tag.trim()).filter(Boolean))],
    readTime: normalizeCount(item.readTime),
    dateConfidence: getDateConfidence(item.date, window.from, window.to),
    engagement: normalizeEngagement(item.engagement),
    relevance: normalizeRelevance(item.relevance),
    whyRelevant: item.whyRelevant.trim(),
  }));
}

export function normalizeYouTubeItems(items: ParsedItem<YouTubeItem>[], window: DateWindow): YouTubeItem[] {
  return items.map(item => ({
    ...item,
    title: item.title.trim(),
    duration: normalizeCount(item.duration),
    dateConfidence: getDateConfidence(item.date, window.from, window.to),
    engagement: normalizeEngagement(item.engagement),
    relevance: normalizeRelevance(item.relevance),
    whyRelevant: item.whyRelevant.trim(),
  }));
}
