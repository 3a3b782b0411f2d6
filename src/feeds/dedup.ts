/**
 * Pulse30 — Item Deduplication
 *
 * Collapses near-duplicates within one source list. Items sharing a
 * normalized URL or a normalized title (transitively) form a group; the
 * group keeps its highest-relevance item, the earliest on ties. Survivors
 * keep their input order.
 */

import type { ResearchItem } from '../types';
import { itemText } from '../types';
import { logger } from '../lib/logger';

const TRACKING_PARAMS = new Set([
  'ref',
  'ref_src',
  'ref_url',
  's',
  't',
  'si',
  'feature',
  'fbclid',
  'gclid',
  'context',
]);

/**
 * URL key: no scheme, no www., no tracking params, no trailing slash, lower-case.
 */
export function normalizeUrl(url: string): string {
  const trimmed = url.trim();

  try {
    const parsed = new URL(trimmed);
    const params = [...parsed.searchParams.entries()]
      .filter(([key]) => !key.toLowerCase().startsWith('utm_') && !TRACKING_PARAMS.has(key.toLowerCase()));
    const query = new URLSearchParams(params).toString();

    const host = parsed.hostname.replace(/^www\./, '');
    const path = parsed.pathname.replace(/\/+$/, '');
    return `${host}${path}${query ? `?${query}` : ''}`.toLowerCase();
  } catch {
    return trimmed
      .replace(/^[a-z]+:\/\//i, '')
      .replace(/^www\./i, '')
      .replace(/\/+$/, '')
      .toLowerCase();
  }
}

/**
 * Title key: lower-case, punctuation stripped, whitespace collapsed.
 */
export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function dedupKeys(item: ResearchItem): string[] {
  const keys: string[] = [];
  const urlKey = item.url ? normalizeUrl(item.url) : '';
  if (urlKey) keys.push(`url:${urlKey}`);

  const titleKey = normalizeTitle(itemText(item));
  if (titleKey) keys.push(`title:${titleKey}`);

  return keys;
}

/**
 * Deduplicate one source list. Idempotent.
 */
export function dedupeItems<T extends ResearchItem>(items: T[]): T[] {
  const parent = items.map((_, i) => i);

  const find = (i: number): number => {
    let root = i;
    while (parent[root] !== root) root = parent[root];
    while (parent[i] !== root) {
      const next = parent[i];
      parent[i] = root;
      i = next;
    }
    return root;
  };

  const owner = new Map<string, number>();
  items.forEach((item, index) => {
    for (const key of dedupKeys(item)) {
      const seen = owner.get(key);
      if (seen === undefined) {
        owner.set(key, index);
        continue;
      }
      const a = find(seen);
      const b = find(index);
      if (a !== b) parent[Math.max(a, b)] = Math.min(a, b);
    }
  });

  const winner = new Map<number, number>();
  items.forEach((item, index) => {
    const group = find(index);
    const current = winner.get(group);
    if (current === undefined || item.relevance > items[current].relevance) {
      winner.set(group, index);
    }
  });

  const survivors = new Set(winner.values());
  const result = items.filter((_, index) => survivors.has(index));

  if (result.length < items.length) {
    logger.debug('Duplicates collapsed', {
      source: items[0]?.source,
      before: items.length,
      after: result.length,
    });
  }

  return result;
}
