/**
 * Pulse30 — Date Window
 *
 * All dates are calendar days in UTC, formatted YYYY-MM-DD.
 */

import type { DateConfidence, DateWindow } from '../types';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Format a Date as its UTC calendar day.
 */
export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Parse a strict YYYY-MM-DD string into a UTC midnight Date.
 * Returns null for anything that is not a real calendar day (e.g. 2026-13-99).
 */
export function parseIsoDate(value: unknown): Date | null {
  if (typeof value !== 'string') return null;

  const match = ISO_DATE.exec(value.trim());
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return date;
}

/**
 * Window of `days` days ending today (UTC), both bounds inclusive.
 */
export function computeWindow(days: number, now: Date = new Date()): DateWindow {
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  return {
    from: formatIsoDate(new Date(today - days * DAY_MS)),
    to: formatIsoDate(new Date(today)),
  };
}

/**
 * Classify how far a candidate date can be trusted relative to the window.
 */
export function getDateConfidence(
  candidate: string | null | undefined,
  from: string,
  to: string
): DateConfidence {
  if (candidate == null) return 'unknown';

  const parsed = parseIsoDate(candidate);
  if (!parsed) return 'unknown';

  const day = formatIsoDate(parsed);
  return day >= from && day <= to ? 'verified' : 'unverified';
}

/**
 * True when the date is a real calendar day strictly outside the window.
 */
export function isOutsideWindow(candidate: string | null, window: DateWindow): boolean {
  const parsed = parseIsoDate(candidate);
  if (!parsed) return false;

  const day = formatIsoDate(parsed);
  return day < window.from || day > window.to;
}

/**
 * First ten characters of an ISO timestamp ("2026-01-20T10:00:00Z" -> "2026-01-20").
 * Returns null when the prefix is not a YYYY-MM-DD shape.
 */
export function isoDatePrefix(value: unknown): string | null {
  if (typeof value !== 'string' || value.length < 10) return null;
  const prefix = value.slice(0, 10);
  return ISO_DATE.test(prefix) ? prefix : null;
}

/**
 * Calendar day of a unix timestamp in seconds.
 */
export function dateFromUnixSeconds(seconds: unknown): string | null {
  if (typeof seconds !== 'number' || !Number.isFinite(seconds) || seconds <= 0) {
    return null;
  }
  return formatIsoDate(new Date(seconds * 1000));
}

/**
 * Whole days between a date and today, or null when the date does not parse.
 */
export function daysAgo(candidate: string | null, now: Date = new Date()): number | null {
  const parsed = parseIsoDate(candidate);
  if (!parsed) return null;

  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  return Math.round((today - parsed.getTime()) / DAY_MS);
}
