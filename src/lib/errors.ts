/**
 * Pulse30 — Error Types
 *
 * TransportError   network failure or non-2xx; becomes a per-source error string
 * ParseError       malformed payload; swallowed, yields an empty item list
 * ItemEnrichmentError  one discussion item failed to enrich; recorded, item kept
 * ConfigError      nothing selectable or conflicting options; aborts before any request
 */

export class TransportError extends Error {
  readonly status: number | null;
  readonly url: string;

  constructor(message: string, url: string, status: number | null = null) {
    super(message);
    this.name = 'TransportError';
    this.url = url;
    this.status = status;
  }
}

export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

export class ItemEnrichmentError extends Error {
  readonly itemId: string;
  readonly url: string;

  constructor(itemId: string, url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Enrich failed for ${url}: ${reason}`);
    this.name = 'ItemEnrichmentError';
    this.itemId = itemId;
    this.url = url;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
