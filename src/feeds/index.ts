/**
 * Pulse30 — Feeds Module
 *
 * Source adapters and the per-source processing stages.
 */

export { FeedSource, type SearchContext, type FeedSourceOptions } from './base';

export * from './sources';

export {
  normalizeEngagement,
  normalizeRelevance,
  normalizeRedditItems,
  normalizeXItems,
  normalizeDailyDevItems,
  normalizeYouTubeItems,
  DEFAULT_RELEVANCE,
} from './normalizer';

export { filterByDateRange } from './date-filter';

export { dedupeItems, normalizeUrl, normalizeTitle } from './dedup';

export {
  runResearch,
  buildReport,
  DEFAULT_DAYS,
  type MockResponses,
  type ResearchOptions,
  type ReportInput,
} from './aggregator';
