/**
 * Pulse30 — Scorer
 *
 * Final relevance per item from its position in the filtered list and its
 * engagement, using each source's own formula. Position is the item's index
 * in discovery order, which already encodes the backend's notion of relevance.
 */

import type {
  DailyDevItem,
  RedditItem,
  ResearchItem,
  XItem,
  YouTubeItem,
} from '../types';
import type { FeedSource } from '../feeds/base';
import type { SourceSet } from '../feeds/sources';
import { clamp01 } from '../lib/relevance';

function scoreWith<T extends ResearchItem>(source: FeedSource<T>, items: T[]): T[] {
  const total = items.length;
  return items.map((item, position) => ({
    ...item,
    relevance: clamp01(source.computeRelevance(position, total, item)),
  }));
}

export function scoreRedditItems(sources: Pick<SourceSet, 'reddit'>, items: RedditItem[]): RedditItem[] {
  return scoreWith(sources.reddit, items);
}

export function scoreXItems(sources: Pick<SourceSet, 'x'>, items: XItem[]): XItem[] {
  return scoreWith(sources.x, items);
}

export function scoreDailyDevItems(sources: Pick<SourceSet, 'dailydev'>, items: DailyDevItem[]): DailyDevItem[] {
  return scoreWith(sources.dailydev, items);
}

export function scoreYouTubeItems(sources: Pick<SourceSet, 'youtube'>, items: YouTubeItem[]): YouTubeItem[] {
  return scoreWith(sources.youtube, items);
}

/**
 * Descending by relevance. Equal scores keep discovery order.
 */
export function sortItems<T extends ResearchItem>(items: T[]): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => b.item.relevance - a.item.relevance || a.index - b.index)
    .map(entry => entry.item);
}
