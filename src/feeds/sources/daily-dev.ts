/**
 * Pulse30 — daily.dev Articles Source
 *
 * Searches daily.dev for developer articles with real engagement.
 * Requires a daily.dev Plus API key (bearer token).
 */

import { z } from 'zod';
import { FeedSource, type SearchContext } from '../base';
import type { DailyDevItem, Depth, ParsedItem } from '../../types';
import { isoDatePrefix } from '../../lib/dates';
import { arrayField, count, identifier, stringList, text } from '../../lib/payload';
import type { EngagementSignals, RelevanceProfile } from '../../lib/relevance';

export const DAILYDEV_SEARCH_URL = 'https://api.daily.dev/public/v1/search/posts';

export const DEPTH_CONFIG: Record<Depth, number> = {
  quick: 10,
  default: 20,
  deep: 50,
};

const PostSchema = z.object({
  id: identifier,
  title: text,
  url: text,
  summary: text,
  createdAt: z.unknown(),
  author: z.object({ name: text, username: text }).catch({ name: '', username: '' }),
  source: z.object({ name: text }).catch({ name: '' }),
  tags: stringList,
  readTime: count,
  upvotes: count,
  comments: count,
});

export class DailyDevSource extends FeedSource<DailyDevItem> {
  readonly name = 'dailydev' as const;
  readonly label = 'daily.dev';
  readonly idPrefix = 'DD';
  readonly profile: RelevanceProfile = {
    positionWeight: 0.5,
    positionFloor: 0.1,
    terms: [
      { signal: 'score', weight: 0.55 },
      { signal: 'numComments', weight: 0.4 },
      { signal: 'readTime', weight: 0.05, cap: 20 },
    ],
    engagementScale: 7,
  };

  async search(context: SearchContext): Promise<unknown> {
    if (context.mockResponse !== undefined) {
      return context.mockResponse;
    }

    const params = new URLSearchParams({
      q: context.topic,
      time: 'month',
      limit: String(DEPTH_CONFIG[context.depth]),
    });

    return this.http({
      url: `${DAILYDEV_SEARCH_URL}?${params.toString()}`,
      headers: { Authorization: `Bearer ${context.apiKey}` },
      timeoutMs: 30_000,
    });
  }

  parse(response: unknown): ParsedItem<DailyDevItem>[] {
    const posts = arrayField(response, 'posts');
    const total = posts.length;
    const items: ParsedItem<DailyDevItem>[] = [];

    posts.forEach((entry, position) => {
      const parsed = PostSchema.safeParse(entry);
      if (!parsed.success) return;

      const post = parsed.data;
      if (!post.title || !post.url) return;

      const hasEngagement = post.upvotes !== null || post.comments !== null;

      const item: ParsedItem<DailyDevItem> = {
        source: 'dailydev',
        id: `${this.idPrefix}${items.length + 1}`,
        title: post.title,
        url: post.url,
        sourceName: post.source.name,
        authorName: post.author.name,
        authorUsername: post.author.username,
        date: isoDatePrefix(post.createdAt),
        summary: post.summary,
        tags: post.tags,
        readTime: post.readTime,
        engagement: hasEngagement ? { score: post.upvotes, numComments: post.comments } : null,
        whyRelevant: '',
      };

      items.push({ ...item, relevance: this.computeRelevance(position, total, item) });
    });

    return items;
  }

  protected signals(item: ParsedItem<DailyDevItem>): EngagementSignals {
    return { ...item.engagement, readTime: item.readTime };
  }
}
