/**
 * Pulse30 — Payload Field Schemas
 *
 * Lenient zod building blocks for backend payloads. Every field falls back to
 * a default through .catch(), so a malformed field never fails its item.
 */

import { z } from 'zod';

/** Trimmed string, '' when absent or not a string. */
export const text = z.string().trim().catch('');

/** String or number id as a string, '' otherwise. */
export const identifier = z
  .union([z.string(), z.number()])
  .transform(value => String(value).trim())
  .catch('');

function toCount(value: number): number {
  return Math.max(0, Math.trunc(value));
}

/** Non-negative integer, 0 when absent or not numeric. "12" is accepted. */
export const countOrZero = z.coerce.number().finite().catch(0).transform(toCount);

/** Non-negative integer, or null when absent or not numeric. */
export const count = z
  .union([z.number(), z.string().regex(/^\s*\d+(\.\d+)?\s*$/)])
  .transform(value => Number(value))
  .pipe(z.number().finite().transform(toCount))
  .nullable()
  .catch(null);

/** Finite number or null. */
export const decimal = z.number().finite().nullable().catch(null);

/** Array of strings, non-strings dropped. */
export const stringList = z
  .array(z.unknown())
  .catch([])
  .transform(values => values.filter((v): v is string => typeof v === 'string'));

/** Plain object test used before field-level parsing. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read an array field from an untyped response; [] when absent or not an array.
 */
export function arrayField(response: unknown, key: string): unknown[] {
  if (!isRecord(response)) return [];
  const value = response[key];
  return Array.isArray(value) ? value : [];
}
