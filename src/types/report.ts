/**
 * Pulse30 — Report Types
 */

import type {
  DailyDevItem,
  DateWindow,
  ParsedItem,
  RedditItem,
  SourceKey,
  XItem,
  YouTubeItem,
} from './item';

export interface ReportModels {
  /** Model used for discussion discovery, null when reddit did not run */
  openai: string | null;
}

/**
 * One run's aggregated result.
 */
export interface Report {
  topic: string;
  range: DateWindow;
  generatedAt: string;
  mode: string;
  models: ReportModels;
  reddit: RedditItem[];
  x: XItem[];
  dailydev: DailyDevItem[];
  youtube: YouTubeItem[];
  errors: Record<SourceKey, string | null>;
  /** Short-form markdown digest */
  contextSnippet: string;
}

/**
 * Orchestrator output: the report plus audit material.
 */
export interface ResearchRun {
  report: Report;
  raw: Record<SourceKey, unknown>;
  /** Discussion items after the enrichment pass, in discovery order */
  redditEnriched: ParsedItem<RedditItem>[];
  enrichmentErrors: string[];
}
