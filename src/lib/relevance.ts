/**
 * Pulse30 — Relevance Scoring Helpers
 *
 * relevance = positionWeight × position + (1 - positionWeight) × engagement
 *
 * Position comes from the source's own result ordering; engagement is a
 * log-scaled weighted sum of interaction counters. Both are in [0, 1].
 */

import type { Engagement } from '../types';

// ============================================================
// TYPES
// ============================================================

export type SignalName = keyof Engagement | 'readTime';

/** Flat numeric view of the signals one item offers for scoring. */
export type EngagementSignals = Partial<Record<SignalName, number | null>>;

export interface EngagementTerm {
  signal: SignalName;
  weight: number;
  /**
   * Linear term: min(value, cap) / cap.
   * Without a cap the term is log1p(value).
   */
  cap?: number;
}

export interface RelevanceProfile {
  /** Share of the final score taken by position, 0-1 */
  positionWeight: number;
  /** Position score of the last result */
  positionFloor: number;
  /** Weights sum to 1.0 */
  terms: EngagementTerm[];
  /** Raw engagement that maps to 1.0 */
  engagementScale: number;
}

// ============================================================
// SCORING
// ============================================================

/**
 * Clamp a score into [0, 1]. NaN becomes 0.
 */
export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Linear decay from 1.0 (first) to `floor` (last). A single result scores 1.0.
 */
export function positionScore(position: number, total: number, floor: number): number {
  if (total <= 1) return 1;
  const ratio = Math.min(1, Math.max(0, position / (total - 1)));
  return Math.max(floor, 1 - ratio * (1 - floor));
}

function termValue(term: EngagementTerm, raw: number | null | undefined): number {
  const value = Math.max(0, raw ?? 0);
  if (term.cap !== undefined) {
    return Math.min(value, term.cap) / term.cap;
  }
  return Math.log1p(value);
}

/**
 * Weighted engagement normalized to [0, 1].
 */
export function engagementScore(
  signals: EngagementSignals,
  terms: EngagementTerm[],
  scale: number
): number {
  let raw = 0;
  for (const term of terms) {
    raw += term.weight * termValue(term, signals[term.signal]);
  }
  return clamp01(raw / scale);
}

/**
 * Combined position + engagement relevance for one result.
 */
export function computeRelevance(
  position: number,
  total: number,
  signals: EngagementSignals,
  profile: RelevanceProfile
): number {
  const pos = positionScore(position, total, profile.positionFloor);
  const eng = engagementScore(signals, profile.terms, profile.engagementScale);
  return clamp01(profile.positionWeight * pos + (1 - profile.positionWeight) * eng);
}
