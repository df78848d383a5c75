import { describe, it, expect } from 'vitest';
import { VARIANTS_BY_PRIORITY, detectVariant } from '@ledgerscan/statement-parser';
import {
  bmoChequingPages,
  bmoMastercardLegacyPages,
  bmoMastercardPages,
  rbcChequingPages,
  rbcVisaPages,
} from '../helpers/statements.js';

const firstPage = (pages: string[]): string => pages[0] ?? '';

describe('detectVariant', () => {
  it('should detect each supported layout', () => {
    expect(detectVariant(firstPage(bmoChequingPages()))?.id).toBe('bmo-chequing');
    expect(detectVariant(firstPage(bmoMastercardPages()))?.id).toBe('bmo-mastercard');
    expect(detectVariant(firstPage(bmoMastercardLegacyPages()))?.id).toBe('bmo-mastercard-legacy');
    expect(detectVariant(firstPage(rbcChequingPages()))?.id).toBe('rbc-chequing');
    expect(detectVariant(firstPage(rbcVisaPages()))?.id).toBe('rbc-visa');
  });

  it('should prefer the legacy card layout when both date labels appear', () => {
    const text = ['BMO Mastercard', '   Statement Date   Mar. 10, 2023', '   Statement date   Mar. 10, 2023'].join('\n');
    expect(detectVariant(text)?.id).toBe('bmo-mastercard-legacy');
  });

  it('should use the newer card layout when only its marker is present', () => {
    expect(detectVariant('BMO Mastercard\n   Statement date   Mar. 10, 2023')?.id).toBe('bmo-mastercard');
  });

  it('should require every marker', () => {
    expect(detectVariant('RBC Royal Bank Visa')).toBeUndefined();
    expect(detectVariant('Statement date without an issuer')).toBeUndefined();
  });

  it('should return undefined for unknown documents', () => {
    expect(detectVariant('ACME Credit Union\nMonthly statement')).toBeUndefined();
  });

  it('should try the legacy card layout first', () => {
    expect(VARIANTS_BY_PRIORITY.map((v) => v.id)).toEqual([
      'bmo-mastercard-legacy',
      'bmo-mastercard',
      'rbc-visa',
      'rbc-chequing',
      'bmo-chequing',
    ]);
  });
});
