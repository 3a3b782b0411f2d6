/**
 * Pulse30 — X Posts Source
 *
 * Searches X through twitterapi.io advanced search ("Top" ordering), paging
 * with a cursor up to a depth-dependent page cap.
 */

import { z } from 'zod';
import { FeedSource, type SearchContext } from '../base';
import type { Depth, ParsedItem, XItem } from '../../types';
import { errorMessage } from '../../lib/logger';
import { arrayField, countOrZero, identifier, isRecord, text } from '../../lib/payload';
import type { EngagementSignals, RelevanceProfile } from '../../lib/relevance';

export const TWITTERAPI_SEARCH_URL = 'https://api.twitterapi.io/twitter/tweet/advanced_search';

/** Minimum likes and page cap per depth. */
export const DEPTH_CONFIG: Record<Depth, { minFaves: number; maxPages: number }> = {
  quick: { minFaves: 5, maxPages: 1 },
  default: { minFaves: 3, maxPages: 2 },
  deep: { minFaves: 2, maxPages: 3 },
};

const MAX_TEXT_LENGTH = 500;

const MONTHS: Record<string, string> = {
  Jan: '01', Feb: '02', Mar: '03', Apr: '04', May: '05', Jun: '06',
  Jul: '07', Aug: '08', Sep: '09', Oct: '10', Nov: '11', Dec: '12',
};

// "Wed Jan 15 14:30:00 +0000 2026"
const TWITTER_DATE = /^[A-Z][a-z]{2} ([A-Z][a-z]{2}) (\d{2}) \d{2}:\d{2}:\d{2} [+-]\d{4} (\d{4})$/;
const ISO_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

/**
 * Advanced search query for a topic and window.
 */
export function buildQuery(topic: string, from: string, to: string, depth: Depth = 'default'): string {
  const { minFaves } = DEPTH_CONFIG[depth];
  return `${topic} since:${from} until:${to} lang:en -filter:retweets min_faves:${minFaves}`;
}

/**
 * Calendar day of a post timestamp, ISO or Twitter format. Null otherwise.
 * Twitter timestamps keep the day as written in their own offset.
 */
export function parseCreatedAt(createdAt: unknown): string | null {
  if (typeof createdAt !== 'string' || !createdAt.trim()) return null;
  const value = createdAt.trim();

  const iso = ISO_PREFIX.exec(value);
  if (iso) return `${iso[1]}-${iso[2]}-${iso[3]}`;

  const twitter = TWITTER_DATE.exec(value);
  if (twitter) {
    const month = MONTHS[twitter[1]];
    if (month) return `${twitter[3]}-${month}-${twitter[2]}`;
  }

  return null;
}

const TweetSchema = z.object({
  id: identifier,
  text: text,
  url: text,
  author: z.object({ userName: text }).catch({ userName: '' }),
  createdAt: z.unknown(),
  likeCount: countOrZero,
  retweetCount: countOrZero,
  replyCount: countOrZero,
  quoteCount: countOrZero,
});

export class XPostsSource extends FeedSource<XItem> {
  readonly name = 'x' as const;
  readonly label = 'X';
  readonly idPrefix = 'X';
  readonly profile: RelevanceProfile = {
    positionWeight: 0.6,
    positionFloor: 0.5,
    terms: [
      { signal: 'likes', weight: 0.55 },
      { signal: 'reposts', weight: 0.25 },
      { signal: 'replies', weight: 0.15 },
      { signal: 'quotes', weight: 0.05 },
    ],
    engagementScale: 7,
  };

  /**
   * Fetch up to the depth's page cap and combine pages into { tweets }.
   *
   * @throws TransportError when the first page fails; later page failures keep what was fetched
   */
  async search(context: SearchContext): Promise<unknown> {
    if (context.mockResponse !== undefined) {
      return context.mockResponse;
    }

    const { maxPages } = DEPTH_CONFIG[context.depth];
    const query = buildQuery(context.topic, context.window.from, context.window.to, context.depth);
    const tweets: unknown[] = [];
    let cursor: string | null = null;

    for (let page = 0; page < maxPages; page++) {
      const params = new URLSearchParams({ query, queryType: 'Top' });
      if (cursor) params.set('cursor', cursor);

      let response: unknown;
      try {
        response = await this.http({
          url: `${TWITTERAPI_SEARCH_URL}?${params.toString()}`,
          headers: { 'X-API-Key': context.apiKey },
          timeoutMs: 30_000,
        });
      } catch (error) {
        if (page === 0) throw error;
        this.logger.warn('Page fetch failed, keeping partial results', {
          page: page + 1,
          error: errorMessage(error),
        });
        break;
      }

      const pageTweets = arrayField(response, 'tweets');
      if (pageTweets.length === 0) break;
      tweets.push(...pageTweets);

      if (!isRecord(response) || !response.has_next_page) break;
      cursor = typeof response.next_cursor === 'string' && response.next_cursor ? response.next_cursor : null;
      if (!cursor) break;
    }

    return { tweets };
  }

  parse(response: unknown): ParsedItem<XItem>[] {
    const tweets = arrayField(response, 'tweets');
    const total = tweets.length;
    const items: ParsedItem<XItem>[] = [];

    tweets.forEach((entry, position) => {
      const parsed = TweetSchema.safeParse(entry);
      if (!parsed.success) return;

      const tweet = parsed.data;
      const authorHandle = tweet.author.userName.replace(/^@+/, '');

      let url = tweet.url;
      if (!url) {
        if (!authorHandle || !tweet.id) return;
        url = `https://x.com/${authorHandle}/status/${tweet.id}`;
      }

      const content = tweet.text.slice(0, MAX_TEXT_LENGTH);
      if (!content) return;

      const item: ParsedItem<XItem> = {
        source: 'x',
        id: `${this.idPrefix}${items.length + 1}`,
        text: content,
        url,
        authorHandle,
        date: parseCreatedAt(tweet.createdAt),
        engagement: {
          likes: tweet.likeCount,
          reposts: tweet.retweetCount,
          replies: tweet.replyCount,
          quotes: tweet.quoteCount,
        },
        whyRelevant: '',
      };

      items.push({ ...item, relevance: this.computeRelevance(position, total, item) });
    });

    return items;
  }

  protected signals(item: ParsedItem<XItem>): EngagementSignals {
    return { ...item.engagement };
  }
}
