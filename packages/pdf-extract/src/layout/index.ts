/**
 * Layout utilities: row clustering and fixed-width rendering.
 */

export { groupByRows } from './rows.js';
export type { Row } from './rows.js';

export { renderLayoutText, cropWindow, DEFAULT_X_DENSITY } from './text-layout.js';
