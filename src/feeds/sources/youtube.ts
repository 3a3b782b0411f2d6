/**
 * Pulse30 — YouTube Source
 *
 * Searches YouTube through TubeLab's outlier search.
 * Each search costs TubeLab credits, so the source is opt-in.
 */

import { z } from 'zod';
import { FeedSource, type SearchContext } from '../base';
import type { Depth, ParsedItem, YouTubeItem } from '../../types';
import { isoDatePrefix } from '../../lib/dates';
import { arrayField, count, identifier, text } from '../../lib/payload';
import type { EngagementSignals, RelevanceProfile } from '../../lib/relevance';

export const TUBELAB_SEARCH_URL = 'https://api.tubelab.net/search/outliers';

export const DEPTH_CONFIG: Record<Depth, number> = {
  quick: 10,
  default: 20,
  deep: 50,
};

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}`;
}

const VideoSchema = z.object({
  id: identifier,
  title: text,
  publishedAt: z.unknown(),
  channelName: text,
  channelId: text,
  duration: count,
  thumbnail: text,
  views: count,
  likes: count,
  comments: count,
});

export class YouTubeSource extends FeedSource<YouTubeItem> {
  readonly name = 'youtube' as const;
  readonly label = 'YouTube';
  readonly idPrefix = 'YT';
  readonly profile: RelevanceProfile = {
    positionWeight: 0.4,
    positionFloor: 0.1,
    terms: [
      { signal: 'views', weight: 0.5 },
      { signal: 'likes', weight: 0.3 },
      { signal: 'numComments', weight: 0.2 },
    ],
    engagementScale: 14,
  };

  async search(context: SearchContext): Promise<unknown> {
    if (context.mockResponse !== undefined) {
      return context.mockResponse;
    }

    const params = new URLSearchParams({
      q: context.topic,
      limit: String(DEPTH_CONFIG[context.depth]),
    });

    return this.http({
      url: `${TUBELAB_SEARCH_URL}?${params.toString()}`,
      headers: { 'Api-Key': context.apiKey },
      timeoutMs: 30_000,
    });
  }

  parse(response: unknown): ParsedItem<YouTubeItem>[] {
    const videos = arrayField(response, 'videos');
    const total = videos.length;
    const items: ParsedItem<YouTubeItem>[] = [];

    videos.forEach((entry, position) => {
      const parsed = VideoSchema.safeParse(entry);
      if (!parsed.success) return;

      const video = parsed.data;
      if (!video.title || !video.id) return;

      const hasEngagement = video.views !== null || video.likes !== null || video.comments !== null;

      const item: ParsedItem<YouTubeItem> = {
        source: 'youtube',
        id: `${this.idPrefix}${items.length + 1}`,
        title: video.title,
        url: watchUrl(video.id),
        channelName: video.channelName,
        channelId: video.channelId,
        date: isoDatePrefix(video.publishedAt),
        duration: video.duration,
        thumbnail: video.thumbnail,
        engagement: hasEngagement
          ? { views: video.views, likes: video.likes, numComments: video.comments }
          : null,
        whyRelevant: '',
      };

      items.push({ ...item, relevance: this.computeRelevance(position, total, item) });
    });

    return items;
  }

  protected signals(item: ParsedItem<YouTubeItem>): EngagementSignals {
    return { ...item.engagement };
  }
}
