import { describe, it, expect } from 'vitest';
import { groupByRows } from '@ledgerscan/pdf-extract';
import type { TextItem } from '@ledgerscan/pdf-extract';

function item(str: string, x: number, y: number, page = 1): TextItem {
  return { str, x, y, width: 10, height: 10, page };
}

describe('groupByRows', () => {
  it('should return no rows for no items', () => {
    expect(groupByRows([])).toEqual([]);
  });

  it('should group items by y proximity, top of page first', () => {
    const rows = groupByRows([item('b', 50, 100), item('low', 0, 50), item('a', 0, 101)]);

    expect(rows.map((r) => r.items.map((i) => i.str))).toEqual([['a', 'b'], ['low']]);
    expect(rows[0]?.y).toBe(100.5);
  });

  it('should honour a custom tolerance', () => {
    const rows = groupByRows([item('a', 0, 100), item('b', 20, 95)], 6);
    expect(rows).toHaveLength(1);
  });

  it('should never join items from different pages', () => {
    const rows = groupByRows([item('p1', 0, 100, 1), item('p2', 0, 100, 2)]);
    expect(rows.map((r) => [r.page, r.items.length])).toEqual([
      [1, 1],
      [2, 1],
    ]);
  });
});
