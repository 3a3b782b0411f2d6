/**
 * Pulse30 — Feed Sources Index
 *
 * Builds the fixed set of adapters for one run.
 */

import type { HttpClient } from '../../lib/http';
import type { CoreSubjectStrategy } from './core-subject';
import { DailyDevSource } from './daily-dev';
import { RedditSource } from './reddit';
import { XPostsSource } from './x-posts';
import { YouTubeSource } from './youtube';

export interface SourceSet {
  reddit: RedditSource;
  x: XPostsSource;
  dailydev: DailyDevSource;
  youtube: YouTubeSource;
}

export interface SourceSetOptions {
  http?: HttpClient;
  coreSubject?: CoreSubjectStrategy;
}

export function createSources(options: SourceSetOptions = {}): SourceSet {
  return {
    reddit: new RedditSource({ http: options.http, coreSubject: options.coreSubject }),
    x: new XPostsSource({ http: options.http }),
    dailydev: new DailyDevSource({ http: options.http }),
    youtube: new YouTubeSource({ http: options.http }),
  };
}

export { RedditSource, buildSearchPrompt, extractOutputText, extractEmbeddedItems } from './reddit';
export { XPostsSource, buildQuery, parseCreatedAt } from './x-posts';
export { DailyDevSource } from './daily-dev';
export { YouTubeSource, watchUrl } from './youtube';
export { enrichRedditItem, parseThread, extractInsights, threadJsonUrl } from './reddit-enrich';
export { extractCoreSubject, type CoreSubjectStrategy } from './core-subject';
