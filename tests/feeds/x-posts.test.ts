/**
 * Tests for the X posts source
 */

import { describe, it, expect, vi } from 'vitest';
import { buildQuery, parseCreatedAt, XPostsSource } from '../../src/feeds/sources/x-posts';
import type { SearchContext } from '../../src/feeds/base';
import { TransportError } from '../../src/lib/errors';
import { loadFixture } from '../../src/lib/fixtures';
import type { HttpClient, HttpRequest } from '../../src/lib/http';

const CONTEXT: SearchContext = {
  apiKey: 'test-secret',
  topic: 'Claude Code',
  window: { from: '2026-01-01', to: '2026-01-31' },
  depth: 'default',
};

const tweet = (id: string, handle: string, text = `post ${id}`) => ({
  id,
  text,
  createdAt: '2026-01-10T10:00:00.000Z',
  likeCount: 10,
  retweetCount: 1,
  replyCount: 1,
  quoteCount: 0,
  author: { userName: handle },
});

function queryOf(request: HttpRequest): URLSearchParams {
  return new URL(request.url).searchParams;
}

describe('XPostsSource', () => {
  describe('buildQuery', () => {
    it('should build the advanced search query for the default depth', () => {
      expect(buildQuery('Claude Code', '2026-01-01', '2026-01-31')).toBe(
        'Claude Code since:2026-01-01 until:2026-01-31 lang:en -filter:retweets min_faves:3'
      );
    });

    it('should raise the like threshold for quick searches', () => {
      expect(buildQuery('Bun', '2026-01-01', '2026-01-31', 'quick')).toBe(
        'Bun since:2026-01-01 until:2026-01-31 lang:en -filter:retweets min_faves:5'
      );
    });
  });

  describe('parseCreatedAt', () => {
    it('should read Twitter timestamps', () => {
      expect(parseCreatedAt('Wed Jan 15 14:30:00 +0000 2026')).toBe('2026-01-15');
    });

    it('should read ISO timestamps', () => {
      expect(parseCreatedAt('2026-01-18T09:12:00.000Z')).toBe('2026-01-18');
    });

    it('should return null for anything else', () => {
      expect(parseCreatedAt('last tuesday')).toBeNull();
      expect(parseCreatedAt(1768910400)).toBeNull();
      expect(parseCreatedAt(undefined)).toBeNull();
    });
  });

  describe('parse', () => {
    it('should map the sample response', () => {
      const source = new XPostsSource();
      const items = source.parse(loadFixture('x'));

      expect(items.map(i => i.id)).toEqual(['X1', 'X2', 'X3']);
      expect(items[0]).toMatchObject({
        source: 'x',
        url: 'https://x.com/devnotes/status/1880000000000000001',
        authorHandle: 'devnotes',
        date: '2026-01-21',
        engagement: { likes: 412, reposts: 58, replies: 37, quotes: 9 },
        whyRelevant: '',
      });
      expect(items[1].url).toBe('https://x.com/shipfast_sam/status/1880000000000000002');
      expect(items[1].date).toBe('2026-01-18');
      expect(items[2].date).toBe('2026-01-09');
    });

    it('should skip posts without text or a way to link them', () => {
      const source = new XPostsSource();
      const items = source.parse({
        tweets: [
          { id: '1', text: '', author: { userName: 'alice' } },
          { id: '2', text: 'no author', author: {} },
          { id: '3', text: 'kept', author: { userName: '@bob' } },
        ],
      });

      expect(items).toHaveLength(1);
      expect(items[0]).toMatchObject({
        id: 'X1',
        text: 'kept',
        authorHandle: 'bob',
        url: 'https://x.com/bob/status/3',
        date: null,
        engagement: { likes: 0, reposts: 0, replies: 0, quotes: 0 },
      });
    });

    it('should cap post text at 500 characters', () => {
      const source = new XPostsSource();
      const [item] = source.parse({ tweets: [tweet('1', 'alice', 'a'.repeat(800))] });

      expect(item.text).toHaveLength(500);
    });

    it('should score a single post at full position weight', () => {
      const source = new XPostsSource();
      const [item] = source.parse({ tweets: [{ id: '1', text: 'solo', author: { userName: 'alice' } }] });

      expect(item.relevance).toBeCloseTo(0.6);
    });
  });

  describe('search', () => {
    it('should page with the cursor up to the depth cap', async () => {
      const http = vi.fn<HttpClient>()
        .mockResolvedValueOnce({ tweets: [tweet('1', 'a')], has_next_page: true, next_cursor: 'c2' })
        .mockResolvedValueOnce({ tweets: [tweet('2', 'b')], has_next_page: true, next_cursor: 'c3' });
      const source = new XPostsSource({ http });

      const result = await source.search(CONTEXT);

      expect(http).toHaveBeenCalledTimes(2);
      const first = http.mock.calls[0][0];
      expect(first.headers).toEqual({ 'X-API-Key': 'test-secret' });
      expect(queryOf(first).get('query')).toBe(buildQuery('Claude Code', '2026-01-01', '2026-01-31'));
      expect(queryOf(first).get('queryType')).toBe('Top');
      expect(queryOf(first).get('cursor')).toBeNull();
      expect(queryOf(http.mock.calls[1][0]).get('cursor')).toBe('c2');
      expect(result).toEqual({ tweets: [tweet('1', 'a'), tweet('2', 'b')] });
    });

    it('should stop when there is no next page', async () => {
      const http = vi.fn<HttpClient>().mockResolvedValue({ tweets: [tweet('1', 'a')], has_next_page: false });
      const source = new XPostsSource({ http });

      await source.search({ ...CONTEXT, depth: 'deep' });

      expect(http).toHaveBeenCalledTimes(1);
    });

    it('should stop on an empty page even when more pages are announced', async () => {
      const http = vi.fn<HttpClient>().mockResolvedValue({ tweets: [], has_next_page: true, next_cursor: 'c2' });
      const source = new XPostsSource({ http });

      const result = await source.search({ ...CONTEXT, depth: 'deep' });

      expect(http).toHaveBeenCalledTimes(1);
      expect(result).toEqual({ tweets: [] });
    });

    it('should stop when the next cursor is missing', async () => {
      const http = vi.fn<HttpClient>().mockResolvedValue({ tweets: [tweet('1', 'a')], has_next_page: true });
      const source = new XPostsSource({ http });

      const result = await source.search({ ...CONTEXT, depth: 'deep' });

      expect(http).toHaveBeenCalledTimes(1);
      expect(result).toEqual({ tweets: [tweet('1', 'a')] });
    });

    it('should keep earlier pages when a later page fails', async () => {
      const http = vi.fn<HttpClient>()
        .mockResolvedValueOnce({ tweets: [tweet('1', 'a')], has_next_page: true, next_cursor: 'c2' })
        .mockRejectedValueOnce(new TransportError('HTTP 429', 'https://api.twitterapi.io', 429));
      const source = new XPostsSource({ http });

      const outcome = await source.run(CONTEXT);

      expect(outcome.error).toBeNull();
      expect(outcome.items.map(i => i.authorHandle)).toEqual(['a']);
    });

    it('should fail the source when the first page fails', async () => {
      const http = vi.fn<HttpClient>().mockRejectedValue(
        new TransportError('HTTP 403: forbidden', 'https://api.twitterapi.io', 403)
      );
      const source = new XPostsSource({ http });

      const outcome = await source.run(CONTEXT);

      expect(outcome.items).toEqual([]);
      expect(outcome.error).toBe('API error: HTTP 403: forbidden');
    });
  });
});
