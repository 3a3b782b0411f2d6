/**
 * Pulse30 — Research Aggregator
 *
 * Orchestrates one research run:
 * 1. Fan out every selected source concurrently
 * 2. Join results in fixed order (reddit, x, dailydev, youtube)
 * 3. Enrich discussion threads, one at a time
 * 4. Normalize, date-filter, score, sort, dedupe each list
 * 5. Assemble the report
 */

import type {
  Depth,
  ParsedItem,
  RedditItem,
  Report,
  ReportModels,
  ResearchItem,
  ResearchRun,
  SourceKey,
  SourceOutcome,
} from '../types';
import { SOURCE_ORDER } from '../types';
import type { FeedSource, SearchContext } from './base';
import { createSources, enrichRedditItem, type SourceSet } from './sources';
import {
  normalizeDailyDevItems,
  normalizeRedditItems,
  normalizeXItems,
  normalizeYouTubeItems,
} from './normalizer';
import { filterByDateRange } from './date-filter';
import { dedupeItems } from './dedup';
import {
  scoreDailyDevItems,
  scoreRedditItems,
  scoreXItems,
  scoreYouTubeItems,
  sortItems,
} from '../ranking/scorer';
import { renderContextSnippet } from '../delivery/render';
import { computeWindow } from '../lib/dates';
import { ConfigError, ItemEnrichmentError } from '../lib/errors';
import type { HttpClient } from '../lib/http';
import { errorMessage, logger } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

/** Canned backend responses; a source with one never touches the network. */
export interface MockResponses {
  reddit?: unknown;
  x?: unknown;
  dailydev?: unknown;
  youtube?: unknown;
  /** Thread payload used for every enrichment call */
  redditThread?: unknown;
}

export interface ResearchOptions {
  topic: string;
  /** Sources to query; order is irrelevant */
  selection: SourceKey[];
  /** API key per source */
  credentials: Partial<Record<SourceKey, string>>;
  depth?: Depth;
  /** Window length in days */
  days?: number;
  /** Clock for the window (tests) */
  now?: Date;
  /** Mode label for the report */
  mode?: string;
  models?: ReportModels;
  mock?: MockResponses;
  /** Skip the thread enrichment pass */
  skipEnrichment?: boolean;
  http?: HttpClient;
  sources?: SourceSet;
}

export const DEFAULT_DAYS = 30;

// ============================================================
// FAN-OUT
// ============================================================

function emptyOutcome<T extends ResearchItem>(source: SourceKey): SourceOutcome<T> {
  return { source, items: [], raw: null, error: null, durationMs: 0 };
}

/**
 * Await one task; an unexpected rejection becomes that source's error.
 */
async function settle<T extends ResearchItem>(
  source: SourceKey,
  task: Promise<SourceOutcome<T>> | null
): Promise<SourceOutcome<T>> {
  if (!task) return emptyOutcome(source);

  try {
    return await task;
  } catch (error) {
    logger.error('Source task rejected', { source, error: errorMessage(error) });
    return { ...emptyOutcome<T>(source), error: `${error instanceof Error ? error.name : 'Error'}: ${errorMessage(error)}` };
  }
}

// ============================================================
// ENRICHMENT
// ============================================================

/**
 * Sequential, per-item enrichment. A failed item keeps its original value.
 */
async function enrichThreads(
  items: ParsedItem<RedditItem>[],
  options: { http?: HttpClient; mockThread?: unknown }
): Promise<{ items: ParsedItem<RedditItem>[]; errors: string[] }> {
  const enriched = [...items];
  const errors: string[] = [];

  logger.info('Enriching threads', { count: enriched.length });

  for (let i = 0; i < enriched.length; i++) {
    const item = enriched[i];
    try {
      enriched[i] = await enrichRedditItem(item, options);
    } catch (error) {
      const message = error instanceof ItemEnrichmentError
        ? error.message
        : `Enrich failed for ${item.url}: ${errorMessage(error)}`;
      errors.push(message);
      logger.warn('Thread enrichment failed, keeping original', { id: item.id, url: item.url, error: message });
    }
  }

  return { items: enriched, errors };
}

// ============================================================
// MAIN AGGREGATOR
// ============================================================

/**
 * Run the complete research pipeline. Always resolves to a report once at
 * least one source is selected; source failures become error strings.
 *
 * @throws ConfigError when no source is selected
 */
export async function runResearch(options: ResearchOptions): Promise<ResearchRun> {
  const startTime = Date.now();
  const selected = new Set(options.selection);

  if (selected.size === 0) {
    throw new ConfigError('No sources selected. Configure at least one API key.');
  }

  const depth = options.depth ?? 'default';
  const window = computeWindow(options.days ?? DEFAULT_DAYS, options.now);
  const sources = options.sources ?? createSources({ http: options.http });
  const mock = options.mock ?? {};

  logger.info('Starting research', {
    topic: options.topic,
    sources: SOURCE_ORDER.filter(s => selected.has(s)),
    depth,
    window,
  });

  const contextFor = (source: SourceKey): SearchContext => ({
    apiKey: options.credentials[source] ?? '',
    topic: options.topic,
    window: { ...window },
    depth,
    mockResponse: mock[source],
    model: source === 'reddit' ? options.models?.openai ?? undefined : undefined,
  });

  const start = <T extends ResearchItem>(source: FeedSource<T>): Promise<SourceOutcome<T>> | null =>
    selected.has(source.name) ? source.run(contextFor(source.name)) : null;

  // All selected sources in flight at once; joined below in fixed order.
  const redditTask = start(sources.reddit);
  const xTask = start(sources.x);
  const dailydevTask = start(sources.dailydev);
  const youtubeTask = start(sources.youtube);

  const reddit = await settle('reddit', redditTask);
  const x = await settle('x', xTask);
  const dailydev = await settle('dailydev', dailydevTask);
  const youtube = await settle('youtube', youtubeTask);

  let redditItems = reddit.items;
  let enrichmentErrors: string[] = [];

  if (redditItems.length > 0 && !options.skipEnrichment) {
    const result = await enrichThreads(redditItems, {
      http: options.http,
      mockThread: mock.redditThread,
    });
    redditItems = result.items;
    enrichmentErrors = result.errors;
  }

  const report = buildReport({
    topic: options.topic,
    window,
    mode: options.mode ?? SOURCE_ORDER.filter(s => selected.has(s)).join('+'),
    models: options.models ?? { openai: null },
    reddit: dedupeItems(sortItems(scoreRedditItems(sources, filterByDateRange(normalizeRedditItems(redditItems, window), window)))),
    x: dedupeItems(sortItems(scoreXItems(sources, filterByDateRange(normalizeXItems(x.items, window), window)))),
    dailydev: dedupeItems(sortItems(scoreDailyDevItems(sources, filterByDateRange(normalizeDailyDevItems(dailydev.items, window), window)))),
    youtube: dedupeItems(sortItems(scoreYouTubeItems(sources, filterByDateRange(normalizeYouTubeItems(youtube.items, window), window)))),
    errors: {
      reddit: reddit.error,
      x: x.error,
      dailydev: dailydev.error,
      youtube: youtube.error,
    },
  });

  logger.info('Research completed', {
    reddit: report.reddit.length,
    x: report.x.length,
    dailydev: report.dailydev.length,
    youtube: report.youtube.length,
    errors: SOURCE_ORDER.filter(s => report.errors[s] !== null).length,
    durationMs: Date.now() - startTime,
  });

  return {
    report,
    raw: {
      reddit: reddit.raw,
      x: x.raw,
      dailydev: dailydev.raw,
      youtube: youtube.raw,
    },
    redditEnriched: redditItems,
    enrichmentErrors,
  };
}

// ============================================================
// REPORT ASSEMBLY
// ============================================================

export type ReportInput = Omit<Report, 'range' | 'generatedAt' | 'contextSnippet'> & {
  window: Report['range'];
  generatedAt?: string;
};

/**
 * Merge the per-source lists and metadata into one report.
 */
export function buildReport(input: ReportInput): Report {
  const report: Report = {
    topic: input.topic,
    range: { from: input.window.from, to: input.window.to },
    generatedAt: input.generatedAt ?? new Date().toISOString(),
    mode: input.mode,
    models: { ...input.models },
    reddit: input.reddit,
    x: input.x,
    dailydev: input.dailydev,
    youtube: input.youtube,
    errors: { ...input.errors },
    contextSnippet: '',
  };

  return { ...report, contextSnippet: renderContextSnippet(report) };
}
