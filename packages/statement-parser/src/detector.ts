import { hasAllMarkers } from './line-classifier.js';
import type { StatementVariant } from './types.js';
import { VARIANTS_BY_PRIORITY } from './variants/index.js';

/**
 * Pick the layout for a document from its first page text.
 * First match in priority order wins.
 */
export function detectVariant(
  firstPageText: string,
  variants: readonly StatementVariant[] = VARIANTS_BY_PRIORITY,
): StatementVariant | undefined {
  return variants.find((variant) => hasAllMarkers(firstPageText, variant.markers));
}
