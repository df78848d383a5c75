import { FieldFormatError } from '../errors.js';

/**
 * An amount column after sanitizing, with the markers some statement
 * formats print around the digits.
 */
export interface SanitizedAmount {
  /** Absolute value in minor units (cents) */
  minorUnits: number;
  /** A `CR` suffix was present */
  creditMarker: boolean;
  /** A leading minus sign or parentheses were present */
  negative: boolean;
}

const AMOUNT_BODY = /^(\d+)\.(\d{2})$/;

/**
 * Sanitize a raw amount field into minor units.
 *
 * Thousands separators, currency symbols and whitespace are stripped and the
 * decimal point dropped, so `"1,234.56"` becomes `123456`. A field with no
 * digits at all (blank column) is absent, never zero.
 */
export function sanitizeAmount(raw: string): SanitizedAmount | undefined {
  let text = raw.trim();
  if (text === '') {
    return undefined;
  }

  let creditMarker = false;
  if (/CR$/.test(text)) {
    creditMarker = true;
    text = text.slice(0, -2).trim();
  }

  let negative = false;
  if (text.startsWith('(') && text.endsWith(')')) {
    negative = true;
    text = text.slice(1, -1);
  }
  if (text.startsWith('-')) {
    negative = true;
    text = text.slice(1);
  } else if (text.endsWith('-')) {
    negative = true;
    text = text.slice(0, -1);
  }

  const cleaned = text.replace(/[$,\s]/g, '');
  const match = AMOUNT_BODY.exec(cleaned);
  if (match?.[1] === undefined || match[2] === undefined) {
    throw new FieldFormatError(`Unable to parse amount: ${raw.trim()}`, raw);
  }

  const minorUnits = parseInt(match[1] + match[2], 10);
  if (!Number.isSafeInteger(minorUnits)) {
    throw new FieldFormatError(`Amount out of range: ${raw.trim()}`, raw);
  }

  return { minorUnits, creditMarker, negative };
}

/**
 * Parse an unsigned amount column. Blank means absent.
 */
export function parseMinorUnits(raw: string): number | undefined {
  const amount = sanitizeAmount(raw);
  if (amount === undefined) {
    return undefined;
  }
  if (amount.negative || amount.creditMarker) {
    throw new FieldFormatError(`Unexpected sign on amount: ${raw.trim()}`, raw);
  }
  return amount.minorUnits;
}

/**
 * Parse a balance where either a `CR` suffix or a minus sign means the
 * account is in credit, returned as a negative amount. Blank means absent.
 */
export function parseSignedMinorUnits(raw: string): number | undefined {
  const amount = sanitizeAmount(raw);
  if (amount === undefined) {
    return undefined;
  }
  return amount.creditMarker || amount.negative ? -amount.minorUnits : amount.minorUnits;
}

/**
 * Same as parseSignedMinorUnits, for declared balances that must be present.
 */
export function parseSignedBalance(raw: string): number {
  const amount = parseSignedMinorUnits(raw);
  if (amount === undefined) {
    throw new FieldFormatError('Balance field is empty', raw);
  }
  return amount;
}

export function sumMinorUnits(amounts: readonly number[]): number {
  return amounts.reduce((sum, amt) => sum + amt, 0);
}

export function formatMinorUnits(minorUnits: number): string {
  const sign = minorUnits < 0 ? '-' : '';
  const abs = Math.abs(minorUnits);
  const whole = Math.floor(abs / 100).toLocaleString('en-US');
  const cents = (abs % 100).toString().padStart(2, '0');
  return `${sign}${whole}.${cents}`;
}
