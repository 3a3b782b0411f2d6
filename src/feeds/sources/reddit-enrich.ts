/**
 * Pulse30 — Reddit Thread Enrichment
 *
 * Replaces the model's guesswork with real thread data from Reddit's public
 * JSON endpoint: score, comment count, upvote ratio, post date, top comments.
 */

import { z } from 'zod';
import type { Comment, ParsedItem, RedditItem } from '../../types';
import { dateFromUnixSeconds } from '../../lib/dates';
import { ItemEnrichmentError, ParseError } from '../../lib/errors';
import { fetchJson, type HttpClient } from '../../lib/http';
import { count, decimal, isRecord, text } from '../../lib/payload';

const MAX_TOP_COMMENTS = 10;
const MAX_INSIGHTS = 5;
const MAX_EXCERPT_LENGTH = 300;
const MAX_INSIGHT_LENGTH = 150;
const MIN_INSIGHT_LENGTH = 30;

const SKIPPED_AUTHORS = new Set(['[deleted]', 'AutoModerator']);
const SKIPPED_BODIES = new Set(['', '[deleted]', '[removed]']);

const PostSchema = z.object({
  score: count,
  num_comments: count,
  upvote_ratio: decimal,
  created_utc: z.number().nullable().catch(null),
});

const CommentSchema = z.object({
  score: z.number().finite().catch(0),
  created_utc: z.number().nullable().catch(null),
  author: text,
  body: text,
  permalink: text,
});

export interface ThreadData {
  score: number | null;
  numComments: number | null;
  upvoteRatio: number | null;
  date: string | null;
  comments: Comment[];
}

export interface EnrichOptions {
  http?: HttpClient;
  /** Canned thread payload for mock runs */
  mockThread?: unknown;
}

/**
 * Public JSON endpoint of a thread URL.
 */
export function threadJsonUrl(threadUrl: string): string {
  const parsed = new URL(threadUrl);
  const path = parsed.pathname.replace(/\/+$/, '');
  return `https://www.reddit.com${path}.json`;
}

function listingChildren(listing: unknown): Array<{ kind: string; data: unknown }> {
  if (!isRecord(listing) || !isRecord(listing.data) || !Array.isArray(listing.data.children)) {
    return [];
  }

  return listing.data.children.filter(isRecord).map(child => ({
    kind: typeof child.kind === 'string' ? child.kind : '',
    data: child.data,
  }));
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max - 3).trimEnd()}...` : value;
}

/**
 * Read post metadata and ranked comments from a thread payload
 * ([postListing, commentListing]).
 *
 * @throws ParseError when the payload has no post
 */
export function parseThread(payload: unknown): ThreadData {
  const listings = Array.isArray(payload) ? payload : [];
  const postChild = listingChildren(listings[0])[0];
  if (!postChild) {
    throw new ParseError('Thread payload has no post listing');
  }

  const post = PostSchema.parse(isRecord(postChild.data) ? postChild.data : {});

  const comments: Comment[] = [];
  for (const child of listingChildren(listings[1])) {
    if (child.kind !== 't1') continue;

    const parsed = CommentSchema.safeParse(child.data);
    if (!parsed.success) continue;

    const c = parsed.data;
    if (SKIPPED_AUTHORS.has(c.author) || SKIPPED_BODIES.has(c.body)) continue;

    comments.push({
      score: c.score,
      date: dateFromUnixSeconds(c.created_utc),
      author: c.author,
      excerpt: truncate(collapseWhitespace(c.body), MAX_EXCERPT_LENGTH),
      url: c.permalink ? `https://www.reddit.com${c.permalink}` : '',
    });
  }

  const topComments = [...comments]
    .sort((a, b) => b.score - a.score)
    .slice(0, MAX_TOP_COMMENTS);

  return {
    score: post.score,
    numComments: post.num_comments,
    upvoteRatio: post.upvote_ratio,
    date: dateFromUnixSeconds(post.created_utc),
    comments: topComments,
  };
}

/**
 * First sentence of the highest-ranked substantive comments.
 */
export function extractInsights(comments: Comment[]): string[] {
  const insights: string[] = [];

  for (const comment of comments) {
    if (insights.length >= MAX_INSIGHTS) break;

    const firstSentence = comment.excerpt.split(/(?<=[.!?])\s+/)[0] ?? '';
    if (firstSentence.length < MIN_INSIGHT_LENGTH) continue;

    insights.push(truncate(firstSentence, MAX_INSIGHT_LENGTH));
  }

  return insights;
}

/**
 * Return a new item carrying real thread data. The post date from Reddit
 * replaces the model-reported one when present.
 *
 * @throws ItemEnrichmentError when the thread cannot be fetched or read
 */
export async function enrichRedditItem(
  item: ParsedItem<RedditItem>,
  options: EnrichOptions = {}
): Promise<ParsedItem<RedditItem>> {
  let thread: ThreadData;

  try {
    const payload = options.mockThread !== undefined
      ? options.mockThread
      : await (options.http ?? fetchJson)({ url: threadJsonUrl(item.url), timeoutMs: 30_000 });
    thread = parseThread(payload);
  } catch (error) {
    throw new ItemEnrichmentError(item.id, item.url, error);
  }

  return {
    ...item,
    date: thread.date ?? item.date,
    engagement: {
      score: thread.score,
      numComments: thread.numComments,
      upvoteRatio: thread.upvoteRatio,
    },
    topComments: thread.comments,
    commentInsights: extractInsights(thread.comments),
  };
}
