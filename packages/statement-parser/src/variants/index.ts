import type { VariantId } from '@ledgerscan/types';
import type { StatementVariant } from '../types.js';
import { bmoChequing } from './bmo-chequing.js';
import { bmoMastercard } from './bmo-mastercard.js';
import { bmoMastercardLegacy } from './bmo-mastercard-legacy.js';
import { rbcChequing } from './rbc-chequing.js';
import { rbcVisa } from './rbc-visa.js';

export { bmoChequing, bmoMastercard, bmoMastercardLegacy, rbcChequing, rbcVisa };

/**
 * Detection order. The legacy BMO card layout must be tried before the
 * current one: both carry "BMO", and only the capitalisation of
 * "Statement Date" tells them apart.
 */
export const VARIANTS_BY_PRIORITY: readonly StatementVariant[] = [
  bmoMastercardLegacy,
  bmoMastercard,
  rbcVisa,
  rbcChequing,
  bmoChequing,
];

export function getVariant(id: VariantId): StatementVariant {
  const variant = VARIANTS_BY_PRIORITY.find((candidate) => candidate.id === id);
  if (variant === undefined) {
    throw new Error(`No statement layout registered for ${id}`);
  }
  return variant;
}
