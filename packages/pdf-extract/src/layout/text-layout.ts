/**
 * Fixed-width page rendering.
 *
 * Every text item is placed at the character column its X position maps to
 * (`x / xDensity`), so statement tables keep their columns aligned and can
 * be sliced with fixed character ranges.
 */
import type { LayoutOptions } from '@ledgerscan/types';
import type { TextItem, PageGeometry } from '../layout-pdfjs.js';
import { groupByRows } from './rows.js';

/** PDF units per character column when the caller gives none */
export const DEFAULT_X_DENSITY = 7.25;

const ROW_Y_TOLERANCE = 3.0;

/**
 * Horizontal window in PDF units selected by a crop region.
 */
export function cropWindow(geometry: PageGeometry, options: LayoutOptions): { left: number; right: number } {
  const from = options.crop?.left ?? 0;
  const to = options.crop?.right ?? 1;
  if (from < 0 || to > 1 || from >= to) {
    throw new Error(`Invalid crop region: ${from}..${to}`);
  }
  return {
    left: geometry.left + geometry.width * from,
    right: geometry.left + geometry.width * to,
  };
}

function renderRow(items: readonly TextItem[], originX: number, xDensity: number, xTolerance: number): string {
  let out = '';
  let prevEnd: number | undefined;

  for (const item of items) {
    let column = Math.max(0, Math.round((item.x - originX) / xDensity));
    if (prevEnd !== undefined) {
      const gap = item.x - prevEnd;
      // Never overwrite the previous item; keep a space between separate words
      const minColumn = out.length + (gap > xTolerance ? 1 : 0);
      column = Math.max(column, minColumn);
    }
    out = out.padEnd(column, ' ') + item.str;
    prevEnd = item.x + item.width;
  }

  return out.trimEnd();
}

/**
 * Render one page's items as layout-preserving text, one line per row.
 */
export function renderLayoutText(items: readonly TextItem[], geometry: PageGeometry, options: LayoutOptions): string {
  const xDensity = options.xDensity ?? DEFAULT_X_DENSITY;
  if (xDensity <= 0) {
    throw new Error(`xDensity must be positive, got ${xDensity}`);
  }

  const window = cropWindow(geometry, options);
  const visible = items.filter(
    (item) => item.page === geometry.page && item.x >= window.left && item.x < window.right
  );

  return groupByRows(visible, ROW_Y_TOLERANCE)
    .map((row) => renderRow(row.items, window.left, xDensity, options.xTolerance))
    .join('\n');
}
