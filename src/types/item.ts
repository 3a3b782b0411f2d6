/**
 * Pulse30 — Research Item Types
 *
 * Canonical items from all sources.
 * Every adapter's output is normalized to one of these variants before scoring.
 */

// ============================================================
// SOURCE CONFIGURATION
// ============================================================

export type SourceKey =
  | 'reddit'     // Discussion threads discovered through OpenAI web search
  | 'x'          // Posts from twitterapi.io advanced search
  | 'dailydev'   // Developer articles from daily.dev
  | 'youtube';   // Videos from TubeLab outlier search

/** Fixed collection order for fan-out results and report fields. */
export const SOURCE_ORDER: readonly SourceKey[] = ['reddit', 'x', 'dailydev', 'youtube'];

export type Depth = 'quick' | 'default' | 'deep';

export type DateConfidence = 'verified' | 'unverified' | 'unknown';

/**
 * Inclusive query window, both bounds formatted YYYY-MM-DD.
 */
export interface DateWindow {
  from: string;
  to: string;
}

// ============================================================
// ENGAGEMENT
// ============================================================

/**
 * Source-reported interaction counters.
 * Counters are non-negative integers; null means the source did not report it.
 */
export interface Engagement {
  // Reddit / daily.dev
  score?: number | null;
  numComments?: number | null;
  upvoteRatio?: number | null;

  // X
  likes?: number | null;
  reposts?: number | null;
  replies?: number | null;
  quotes?: number | null;

  // YouTube
  views?: number | null;
}

export interface Comment {
  score: number;
  date: string | null;
  author: string;
  excerpt: string;
  url: string;
}

// ============================================================
// RESEARCH ITEMS
// ============================================================

interface BaseItem {
  /** Source prefix + 1-based ordinal, e.g. "R1", "X3" */
  id: string;
  url: string;
  /** YYYY-MM-DD, never a full timestamp */
  date: string | null;
  dateConfidence: DateConfidence;
  engagement: Engagement | null;
  /** 0-1, refined by the scorer */
  relevance: number;
  whyRelevant: string;
}

export interface RedditItem extends BaseItem {
  source: 'reddit';
  title: string;
  subreddit: string;
  topComments: Comment[];
  commentInsights: string[];
}

export interface XItem extends BaseItem {
  source: 'x';
  text: string;
  authorHandle: string;
}

export interface DailyDevItem extends BaseItem {
  source: 'dailydev';
  title: string;
  sourceName: string;
  authorName: string;
  authorUsername: string;
  summary: string;
  tags: string[];
  /** Minutes */
  readTime: number | null;
}

export interface YouTubeItem extends BaseItem {
  source: 'youtube';
  title: string;
  channelName: string;
  channelId: string;
  /** Seconds */
  duration: number | null;
  thumbnail: string;
}

export type ResearchItem = RedditItem | XItem | DailyDevItem | YouTubeItem;

/**
 * Item as returned by an adapter's parse step, before normalization.
 */
export type ParsedItem<T extends ResearchItem> = Omit<T, 'dateConfidence' | 'relevance'> & {
  relevance?: number;
};

/**
 * Primary human-readable content of an item.
 */
export function itemText(item: ResearchItem): string {
  return item.source === 'x' ? item.text : item.title;
}

/**
 * Sub-forum, author handle, publication or channel of an item.
 */
export function itemSourceIdentity(item: ResearchItem): string {
  switch (item.source) {
    case 'reddit':
      return item.subreddit ? `r/${item.subreddit}` : '';
    case 'x':
      return item.authorHandle ? `@${item.authorHandle}` : '';
    case 'dailydev':
      return item.sourceName || item.authorName;
    case 'youtube':
      return item.channelName;
  }
}

// ============================================================
// ADAPTER OUTCOMES
// ============================================================

/**
 * Tagged result of one source task. Never thrown, always returned.
 */
export interface SourceOutcome<T extends ResearchItem> {
  source: SourceKey;
  items: ParsedItem<T>[];
  /** Unmodified backend response, kept for audit output */
  raw: unknown;
  error: string | null;
  durationMs: number;
}
