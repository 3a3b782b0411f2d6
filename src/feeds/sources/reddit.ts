/**
 * Pulse30 — Reddit Discussion Source
 *
 * Discovers Reddit threads through the OpenAI Responses API with the
 * web_search tool restricted to reddit.com. The model answers in prose with
 * an embedded JSON object; parse() digs the object out.
 *
 * Engagement is not requested here; the enrichment pass fetches real numbers.
 */

import { z } from 'zod';
import { FeedSource, type FeedSourceOptions, type SearchContext } from '../base';
import type { Depth, ParsedItem, RedditItem } from '../../types';
import { DEFAULT_OPENAI_MODEL } from '../../lib/models';
import { errorMessage } from '../../lib/logger';
import { isRecord, text } from '../../lib/payload';
import { clamp01, type EngagementSignals, type RelevanceProfile } from '../../lib/relevance';
import { extractCoreSubject, type CoreSubjectStrategy } from './core-subject';

export const OPENAI_RESPONSES_URL = 'https://api.openai.com/v1/responses';
export const REDDIT_DOMAIN = 'reddit.com';

/** Thread count range requested from the model per depth. */
export const DEPTH_CONFIG: Record<Depth, { min: number; max: number }> = {
  quick: { min: 8, max: 12 },
  default: { min: 20, max: 30 },
  deep: { min: 50, max: 70 },
};

/** Below this many threads the recall retry kicks in. */
export const MIN_ITEMS_BEFORE_RETRY = 5;

const DEFAULT_RELEVANCE = 0.5;
const ISO_DATE_SHAPE = /^\d{4}-\d{2}-\d{2}$/;
const EMBEDDED_ITEMS_JSON = /\{[\s\S]*"items"[\s\S]*\}/;

/**
 * Share of the final score kept from the model's own relevance estimate.
 */
const MODEL_RELEVANCE_WEIGHT = 0.5;

export function buildSearchPrompt(topic: string, from: string, to: string, depth: Depth): string {
  const { min, max } = DEPTH_CONFIG[depth];

  return `Search Reddit for discussions about: ${topic}

Focus on threads posted between ${from} and ${to}. Find ${min}-${max} high-quality, relevant threads.

IMPORTANT: Return ONLY valid JSON in this exact format, no other text:
{
  "items": [
    {
      "title": "Thread title",
      "url": "https://www.reddit.com/r/.../comments/...",
      "subreddit": "subreddit_name",
      "date": "YYYY-MM-DD or null if unknown",
      "why_relevant": "Brief explanation of relevance",
      "relevance": 0.85
    }
  ]
}

Rules:
- relevance is 0.0 to 1.0 (1.0 = highly relevant)
- date must be YYYY-MM-DD format or null
- Include diverse subreddits if applicable
- Prefer threads with substantive discussions
- Do NOT include engagement metrics (upvotes, comments) - those will be fetched separately`;
}

const ThreadEntrySchema = z.object({
  title: text,
  url: text,
  subreddit: text,
  date: z.string().trim().nullable().catch(null),
  why_relevant: text,
  // Models sometimes quote the number
  relevance: z
    .union([z.number(), z.string().trim().min(1).transform(Number)])
    .pipe(z.number().finite())
    .catch(DEFAULT_RELEVANCE),
});

// ============================================================
// OUTPUT TEXT EXTRACTION
// ============================================================

function outputEntryText(entry: unknown): string {
  if (typeof entry === 'string') return entry;
  if (!isRecord(entry)) return '';

  if (entry.type === 'message') {
    const content = Array.isArray(entry.content) ? entry.content : [];
    for (const part of content) {
      if (isRecord(part) && part.type === 'output_text') {
        return typeof part.text === 'string' ? part.text : '';
      }
    }
    return '';
  }

  return typeof entry.text === 'string' ? entry.text : '';
}

/**
 * Model output text from a Responses API payload, or the legacy
 * chat-completions `choices` shape.
 */
export function extractOutputText(response: unknown): string {
  if (!isRecord(response)) return '';

  const output = response.output;
  if (typeof output === 'string') return output;

  if (Array.isArray(output)) {
    for (const entry of output) {
      const found = outputEntryText(entry);
      if (found) return found;
    }
  }

  if (Array.isArray(response.choices)) {
    for (const choice of response.choices) {
      if (isRecord(choice) && isRecord(choice.message)) {
        const content = choice.message.content;
        return typeof content === 'string' ? content : '';
      }
    }
  }

  return '';
}

/**
 * Greedy match of the first {...} block mentioning "items", parsed as JSON.
 */
export function extractEmbeddedItems(outputText: string): unknown[] {
  const match = EMBEDDED_ITEMS_JSON.exec(outputText);
  if (!match) return [];

  let data: unknown;
  try {
    data = JSON.parse(match[0]);
  } catch {
    return [];
  }

  return isRecord(data) && Array.isArray(data.items) ? data.items : [];
}

// ============================================================
// SOURCE
// ============================================================

export interface RedditSourceOptions extends FeedSourceOptions {
  coreSubject?: CoreSubjectStrategy;
}

export class RedditSource extends FeedSource<RedditItem> {
  readonly name = 'reddit' as const;
  readonly label = 'Reddit';
  readonly idPrefix = 'R';
  readonly profile: RelevanceProfile = {
    positionWeight: 0.6,
    positionFloor: 0.3,
    terms: [
      { signal: 'score', weight: 0.55 },
      { signal: 'numComments', weight: 0.4 },
      { signal: 'upvoteRatio', weight: 0.05, cap: 1 },
    ],
    engagementScale: 7,
  };

  private readonly coreSubject: CoreSubjectStrategy;

  constructor(options: RedditSourceOptions = {}) {
    super(options);
    this.coreSubject = options.coreSubject ?? extractCoreSubject;
  }

  async search(context: SearchContext): Promise<unknown> {
    if (context.mockResponse !== undefined) {
      return context.mockResponse;
    }

    return this.http({
      url: OPENAI_RESPONSES_URL,
      method: 'POST',
      headers: { Authorization: `Bearer ${context.apiKey}` },
      body: {
        model: context.model ?? DEFAULT_OPENAI_MODEL,
        tools: [
          {
            type: 'web_search',
            filters: { allowed_domains: [REDDIT_DOMAIN] },
          },
        ],
        include: ['web_search_call.action.sources'],
        input: buildSearchPrompt(context.topic, context.window.from, context.window.to, context.depth),
      },
      timeoutMs: 60_000,
    });
  }

  parse(response: unknown): ParsedItem<RedditItem>[] {
    const entries = extractEmbeddedItems(extractOutputText(response));
    const items: ParsedItem<RedditItem>[] = [];

    for (const entry of entries) {
      const parsed = ThreadEntrySchema.safeParse(entry);
      if (!parsed.success) continue;

      const data = parsed.data;
      if (!data.url || !data.url.includes(REDDIT_DOMAIN) || !data.title) continue;

      items.push({
        source: 'reddit',
        id: `${this.idPrefix}${items.length + 1}`,
        title: data.title,
        url: data.url,
        subreddit: data.subreddit.replace(/^\/?r\//i, ''),
        date: data.date && ISO_DATE_SHAPE.test(data.date) ? data.date : null,
        engagement: null,
        topComments: [],
        commentInsights: [],
        whyRelevant: data.why_relevant,
        relevance: clamp01(data.relevance),
      });
    }

    return items;
  }

  protected signals(item: ParsedItem<RedditItem>): EngagementSignals {
    return { ...item.engagement };
  }

  /**
   * Position + engagement formula averaged with the model's own estimate.
   */
  computeRelevance(position: number, total: number, item: ParsedItem<RedditItem>): number {
    const formula = super.computeRelevance(position, total, item);
    const prior = item.relevance ?? DEFAULT_RELEVANCE;
    return clamp01(MODEL_RELEVANCE_WEIGHT * prior + (1 - MODEL_RELEVANCE_WEIGHT) * formula);
  }

  /**
   * Recall retry: one extra query on the core subject when results are sparse.
   * Only threads with unseen URLs are added.
   */
  protected async supplement(
    items: ParsedItem<RedditItem>[],
    context: SearchContext
  ): Promise<ParsedItem<RedditItem>[]> {
    if (items.length >= MIN_ITEMS_BEFORE_RETRY) return items;

    try {
      const core = this.coreSubject(context.topic).trim();
      if (!core || core.toLowerCase() === context.topic.trim().toLowerCase()) return items;

      this.logger.info('Sparse results, retrying with core subject', { found: items.length, core });

      const retryRaw = await this.search({ ...context, topic: core });
      const merged = [...items];
      const seen = new Set(items.map(item => item.url));

      for (const item of this.parse(retryRaw)) {
        if (seen.has(item.url)) continue;
        seen.add(item.url);
        merged.push({ ...item, id: `${this.idPrefix}${merged.length + 1}` });
      }

      this.logger.info('Recall retry merged', { added: merged.length - items.length });
      return merged;
    } catch (error) {
      this.logger.warn('Recall retry failed, keeping first pass', { error: errorMessage(error) });
      return items;
    }
  }
}
