/**
 * Pulse30 — Feed Source Base
 *
 * Abstract base class for all research sources.
 * Each source implements search (backend call), parse (pure, defensive)
 * and the engagement signals its relevance formula reads.
 */

import type {
  DateWindow,
  Depth,
  ParsedItem,
  ResearchItem,
  SourceOutcome,
} from '../types';
import { ParseError, TransportError } from '../lib/errors';
import { fetchJson, type HttpClient } from '../lib/http';
import { errorMessage, logger, type Logger } from '../lib/logger';
import {
  computeRelevance,
  type EngagementSignals,
  type RelevanceProfile,
} from '../lib/relevance';

/**
 * Everything one search call needs. Credentials are passed in, never looked up.
 */
export interface SearchContext {
  apiKey: string;
  topic: string;
  window: DateWindow;
  depth: Depth;
  /** Canned backend response; bypasses the transport entirely */
  mockResponse?: unknown;
  /** Model identifier, for sources that search through a model */
  model?: string;
}

export interface FeedSourceOptions {
  http?: HttpClient;
}

/**
 * Abstract base class for feed sources.
 */
export abstract class FeedSource<T extends ResearchItem> {
  abstract readonly name: T['source'];
  abstract readonly label: string;
  abstract readonly idPrefix: string;
  abstract readonly profile: RelevanceProfile;

  protected readonly http: HttpClient;
  protected logger: Logger = logger.child({ source: this.constructor.name });

  constructor(options: FeedSourceOptions = {}) {
    this.http = options.http ?? fetchJson;
  }

  /**
   * Query the backend and return its unmodified response.
   * Transport failures throw TransportError.
   */
  abstract search(context: SearchContext): Promise<unknown>;

  /**
   * Map a raw response to parsed items. Pure; malformed input yields [].
   */
  abstract parse(response: unknown): ParsedItem<T>[];

  /**
   * Signals the relevance formula reads from an item.
   */
  protected abstract signals(item: ParsedItem<T>): EngagementSignals;

  /**
   * Position + engagement relevance of the item at `position` of `total`.
   */
  computeRelevance(position: number, total: number, item: ParsedItem<T>): number {
    return computeRelevance(position, total, this.signals(item), this.profile);
  }

  /**
   * Post-parse hook for live runs. Must not throw.
   */
  protected async supplement(
    items: ParsedItem<T>[],
    _context: SearchContext
  ): Promise<ParsedItem<T>[]> {
    return items;
  }

  /**
   * Execute search + parse with error capture. Never rejects.
   */
  async run(context: SearchContext): Promise<SourceOutcome<T>> {
    const startTime = Date.now();
    this.logger.info('Starting search', { depth: context.depth, mock: context.mockResponse !== undefined });

    let raw: unknown = null;
    let error: string | null = null;

    try {
      raw = await this.search(context);
    } catch (err) {
      const message = errorMessage(err);
      raw = { error: message };

      if (err instanceof ParseError) {
        this.logger.warn('Malformed response, treating as empty', { error: message });
      } else {
        error = err instanceof TransportError ? `API error: ${message}` : `${errorName(err)}: ${message}`;
        this.logger.error('Search failed', { error: message });
      }
    }

    let items = this.safeParse(raw);

    if (error === null && context.mockResponse === undefined) {
      items = await this.supplement(items, context);
    }

    const durationMs = Date.now() - startTime;
    this.logger.info('Search completed', { items: items.length, durationMs });

    return {
      source: this.name,
      items,
      raw,
      error,
      durationMs,
    };
  }

  private safeParse(raw: unknown): ParsedItem<T>[] {
    try {
      return this.parse(raw);
    } catch (err) {
      this.logger.warn('Parse failed, treating as empty', { error: errorMessage(err) });
      return [];
    }
  }
}

function errorName(error: unknown): string {
  return error instanceof Error ? error.name : 'Error';
}
