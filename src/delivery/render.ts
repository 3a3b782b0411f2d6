/**
 * Pulse30 — Report Rendering
 *
 * Terminal summary, full markdown report, context digest and the
 * machine-readable JSON form of a Report.
 */

import type {
  DailyDevItem,
  Engagement,
  RedditItem,
  Report,
  ResearchItem,
  SourceKey,
  XItem,
  YouTubeItem,
} from '../types';
import { SOURCE_ORDER, itemSourceIdentity, itemText } from '../types';

export const SOURCE_TITLES: Record<SourceKey, string> = {
  reddit: 'Reddit',
  x: 'X',
  dailydev: 'daily.dev',
  youtube: 'YouTube',
};

const SNIPPET_TITLES: Record<SourceKey, string> = {
  reddit: 'Discussions',
  x: 'Posts',
  dailydev: 'Articles',
  youtube: 'Videos',
};

const SNIPPET_ITEMS_PER_SOURCE = 5;
const SNIPPET_TEXT_LENGTH = 200;

// ============================================================
// FIELD FORMATTING
// ============================================================

function itemsOf(report: Report, source: SourceKey): ResearchItem[] {
  switch (source) {
    case 'reddit':
      return report.reddit;
    case 'x':
      return report.x;
    case 'dailydev':
      return report.dailydev;
    case 'youtube':
      return report.youtube;
  }
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

function oneLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function counter(value: number | null | undefined, unit: string): string | null {
  return value == null ? null : `${value}${unit}`;
}

function engagementParts(item: ResearchItem, e: Engagement): (string | null)[] {
  switch (item.source) {
    case 'reddit':
      return [counter(e.score, 'pts'), counter(e.numComments, 'cmt')];
    case 'x':
      return [counter(e.likes, 'likes'), counter(e.reposts, 'rt'), counter(e.replies, 're')];
    case 'dailydev':
      return [counter(e.score, 'upvotes'), counter(e.numComments, 'cmt')];
    case 'youtube':
      return [counter(e.views, ' views'), counter(e.likes, ' likes')];
  }
}

/**
 * Compact engagement label, e.g. "42pts, 7cmt". Null when nothing was reported.
 */
export function formatEngagement(item: ResearchItem): string | null {
  if (!item.engagement) return null;
  const label = engagementParts(item, item.engagement)
    .filter((part): part is string => part !== null)
    .join(', ');
  return label || null;
}

/**
 * "2026-01-15", "2026-01-15 (unverified)" or "date unknown".
 */
export function formatItemDate(item: ResearchItem): string {
  if (!item.date) return 'date unknown';
  return item.dateConfidence === 'unverified' ? `${item.date} (unverified)` : item.date;
}

/** Seconds as m:ss, or h:mm:ss past an hour. */
export function formatDuration(seconds: number): string {
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;
  const pad = (n: number) => String(n).padStart(2, '0');
  return h > 0 ? `${h}:${pad(m)}:${pad(s)}` : `${m}:${pad(s)}`;
}

function headline(item: ResearchItem): string {
  const identity = itemSourceIdentity(item);
  const engagement = formatEngagement(item);
  return [
    `**${item.id}** (${item.relevance.toFixed(2)})`,
    identity || null,
    formatItemDate(item),
    engagement ? `[${engagement}]` : null,
  ]
    .filter((part): part is string => part !== null)
    .join(' · ');
}

// ============================================================
// COMPACT (TERMINAL)
// ============================================================

/**
 * Terminal summary: one block per item with id, score, identity, date,
 * engagement, text and URL.
 */
export function renderCompact(report: Report): string {
  const lines: string[] = [];

  lines.push(`# Research: ${report.topic}`);
  lines.push('');
  lines.push(`Window: ${report.range.from} to ${report.range.to} | Mode: ${report.mode}`);
  if (report.models.openai) {
    lines.push(`Model: ${report.models.openai}`);
  }
  lines.push('');

  let total = 0;
  for (const source of SOURCE_ORDER) {
    const items = itemsOf(report, source);
    const error = report.errors[source];
    if (items.length === 0 && !error) continue;

    total += items.length;
    lines.push(`## ${SOURCE_TITLES[source]} (${items.length})`);
    lines.push('');
    if (error) {
      lines.push(`_Error: ${error}_`);
      lines.push('');
    }

    for (const item of items) {
      lines.push(headline(item));
      lines.push(`  ${truncate(oneLine(itemText(item)), SNIPPET_TEXT_LENGTH)}`);
      lines.push(`  ${item.url}`);
      if (item.whyRelevant) {
        lines.push(`  Why: ${item.whyRelevant}`);
      }
      if (item.source === 'reddit' && item.commentInsights.length > 0) {
        lines.push(`  Insight: ${item.commentInsights[0]}`);
      }
      lines.push('');
    }
  }

  if (total === 0) {
    lines.push('No results found.');
    lines.push('');
  }

  return lines.join('\n');
}

// ============================================================
// FULL REPORT (MARKDOWN)
// ============================================================

function renderRedditDetails(item: RedditItem, lines: string[]): void {
  if (item.commentInsights.length > 0) {
    lines.push('**Insights:**');
    for (const insight of item.commentInsights) {
      lines.push(`- ${insight}`);
    }
    lines.push('');
  }

  if (item.topComments.length > 0) {
    lines.push('**Top comments:**');
    for (const comment of item.topComments) {
      lines.push(`- (${comment.score}) u/${comment.author}: ${comment.excerpt}`);
    }
    lines.push('');
  }
}

function renderXDetails(item: XItem, lines: string[]): void {
  lines.push(`> ${oneLine(item.text)}`);
  lines.push('');
}

function renderDailyDevDetails(item: DailyDevItem, lines: string[]): void {
  if (item.summary) {
    lines.push(item.summary);
    lines.push('');
  }
  const meta = [
    item.authorName ? `Author: ${item.authorName}` : null,
    item.readTime !== null ? `Read time: ${item.readTime} min` : null,
    item.tags.length > 0 ? `Tags: ${item.tags.join(', ')}` : null,
  ].filter((part): part is string => part !== null);
  if (meta.length > 0) {
    lines.push(meta.join(' | '));
    lines.push('');
  }
}

function renderYouTubeDetails(item: YouTubeItem, lines: string[]): void {
  if (item.duration !== null) {
    lines.push(`Duration: ${formatDuration(item.duration)}`);
    lines.push('');
  }
}

/**
 * Complete markdown report: every item with its details, then source errors.
 */
export function renderFullReport(report: Report): string {
  const lines: string[] = [];

  lines.push(`# ${report.topic}: ${report.range.from} to ${report.range.to}`);
  lines.push('');
  lines.push(`*Generated ${report.generatedAt} | Mode: ${report.mode}${report.models.openai ? ` | Model: ${report.models.openai}` : ''}*`);
  lines.push('');

  lines.push('| Source | Items |');
  lines.push('|--------|-------|');
  for (const source of SOURCE_ORDER) {
    lines.push(`| ${SOURCE_TITLES[source]} | ${itemsOf(report, source).length} |`);
  }
  lines.push('');

  for (const source of SOURCE_ORDER) {
    const items = itemsOf(report, source);
    if (items.length === 0) continue;

    lines.push(`## ${SOURCE_TITLES[source]}`);
    lines.push('');

    for (const item of items) {
      lines.push(`### ${item.id}: ${item.source === 'x' ? truncate(oneLine(item.text), 80) : item.title}`);
      lines.push('');
      lines.push(headline(item));
      lines.push('');
      lines.push(item.url);
      lines.push('');
      if (item.whyRelevant) {
        lines.push(`*${item.whyRelevant}*`);
        lines.push('');
      }

      switch (item.source) {
        case 'reddit':
          renderRedditDetails(item, lines);
          break;
        case 'x':
          renderXDetails(item, lines);
          break;
        case 'dailydev':
          renderDailyDevDetails(item, lines);
          break;
        case 'youtube':
          renderYouTubeDetails(item, lines);
          break;
      }
    }
  }

  const errors = SOURCE_ORDER.filter(source => report.errors[source] !== null);
  if (errors.length > 0) {
    lines.push('## Errors');
    lines.push('');
    for (const source of errors) {
      lines.push(`- **${SOURCE_TITLES[source]}:** ${report.errors[source]}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

// ============================================================
// CONTEXT SNIPPET
// ============================================================

/**
 * Short digest of the top items per source, for pasting into another prompt.
 */
export function renderContextSnippet(report: Report): string {
  const lines: string[] = [];

  lines.push(`# ${report.topic} (${report.range.from} to ${report.range.to})`);
  lines.push('');

  let total = 0;
  for (const source of SOURCE_ORDER) {
    const items = itemsOf(report, source).slice(0, SNIPPET_ITEMS_PER_SOURCE);
    if (items.length === 0) continue;

    total += items.length;
    lines.push(`## ${SNIPPET_TITLES[source]}`);
    for (const item of items) {
      const identity = itemSourceIdentity(item);
      const text = truncate(oneLine(itemText(item)), SNIPPET_TEXT_LENGTH);
      lines.push(`- ${identity ? `${identity}: ` : ''}${text} (${item.url})`);
    }
    lines.push('');
  }

  if (total === 0) {
    lines.push('No recent sources found.');
    lines.push('');
  }

  return lines.join('\n');
}

// ============================================================
// JSON
// ============================================================

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[key] = sortKeys(entry);
    }
    return sorted;
  }
  return value;
}

/**
 * Lossless, key-ordered JSON. Parsing the result yields a value deep-equal
 * to the report.
 */
export function reportToJson(report: Report): string {
  return JSON.stringify(sortKeys(report), null, 2);
}
