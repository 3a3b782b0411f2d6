/**
 * Pulse30 — Type Exports
 *
 * Re-exports all types from the types module.
 */

// Research items
export type {
  SourceKey,
  Depth,
  DateConfidence,
  DateWindow,
  Engagement,
  Comment,
  RedditItem,
  XItem,
  DailyDevItem,
  YouTubeItem,
  ResearchItem,
  ParsedItem,
  SourceOutcome,
} from './item';
export { SOURCE_ORDER, itemText, itemSourceIdentity } from './item';

// Report
export type { Report, ReportModels, ResearchRun } from './report';
