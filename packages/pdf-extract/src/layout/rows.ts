/**
 * Row clustering for layout-aware rendering.
 */
import type { TextItem } from '../layout-pdfjs.js';

export interface Row {
  /** Mean Y of the items in the row */
  y: number;
  page: number;
  /** Left to right */
  items: TextItem[];
}

function toRow(page: number, items: TextItem[]): Row {
  return {
    y: items.reduce((sum, item) => sum + item.y, 0) / items.length,
    page,
    items: [...items].sort((a, b) => a.x - b.x),
  };
}

/**
 * Cluster text items into rows, page by page and top of page first.
 * An item joins the open row when its Y is within `yTolerance` of the
 * row's first (highest) item; PDF Y grows upwards.
 */
export function groupByRows(items: readonly TextItem[], yTolerance = 3.0): Row[] {
  const ordered = [...items].sort((a, b) => a.page - b.page || b.y - a.y);
  const rows: Row[] = [];
  let open: { page: number; anchorY: number; items: TextItem[] } | undefined;

  for (const item of ordered) {
    if (open !== undefined && open.page === item.page && Math.abs(item.y - open.anchorY) <= yTolerance) {
      open.items.push(item);
      continue;
    }
    if (open !== undefined) {
      rows.push(toRow(open.page, open.items));
    }
    open = { page: item.page, anchorY: item.y, items: [item] };
  }
  if (open !== undefined) {
    rows.push(toRow(open.page, open.items));
  }

  return rows;
}
