/**
 * Pulse30 — Date Filter
 *
 * Hard date filter applied after normalization. Backends are asked for the
 * window already; this catches what slips through. An item is removed only
 * when its date is a real calendar day outside [from, to]; missing or
 * unreadable dates are kept.
 */

import type { DateWindow, ResearchItem } from '../types';
import { isOutsideWindow } from '../lib/dates';
import { logger } from '../lib/logger';

export function filterByDateRange<T extends ResearchItem>(items: T[], window: DateWindow): T[] {
  const kept = items.filter(item => !isOutsideWindow(item.date, window));

  if (kept.length < items.length) {
    logger.debug('Date filter removed items', {
      source: items[0]?.source,
      removed: items.length - kept.length,
      window,
    });
  }

  return kept;
}
