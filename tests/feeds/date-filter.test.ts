/**
 * Tests for the hard date filter
 */

import { describe, it, expect } from 'vitest';
import { filterByDateRange } from '../../src/feeds/date-filter';
import { normalizeXItems } from '../../src/feeds/normalizer';
import { createXItem } from '../factories';

const WINDOW = { from: '2026-01-01', to: '2026-01-31' };

describe('filterByDateRange', () => {
  it('should remove only real dates outside the window', () => {
    const items = [
      createXItem({ id: 'X1', date: '2026-01-01' }),
      createXItem({ id: 'X2', date: '2025-12-31' }),
      createXItem({ id: 'X3', date: null }),
      createXItem({ id: 'X4', date: '2026-02-01' }),
      createXItem({ id: 'X5', date: '2026-01-31' }),
    ];

    expect(filterByDateRange(items, WINDOW).map(i => i.id)).toEqual(['X1', 'X3', 'X5']);
  });

  it('should retain a malformed date as unknown', () => {
    const normalized = normalizeXItems([createXItem({ date: '2026-13-99' })], WINDOW);
    const kept = filterByDateRange(normalized, WINDOW);

    expect(kept).toHaveLength(1);
    expect(kept[0].dateConfidence).toBe('unknown');
  });

  it('should leave every survivor with a verified or unknown date', () => {
    const normalized = normalizeXItems(
      ['2026-01-10', '2025-06-01', null, 'soon', '2026-03-01'].map((date, i) =>
        createXItem({ id: `X${i + 1}`, date })
      ),
      WINDOW
    );

    for (const item of filterByDateRange(normalized, WINDOW)) {
      expect(item.dateConfidence).not.toBe('unverified');
    }
  });
});
