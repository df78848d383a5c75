import {
  FieldFormatError,
  MissingMetadataError,
  monthNumber,
  resolveStatementDate,
  yearForMonth,
  type SanitizedAmount,
} from '@ledgerscan/types';
import type { AmountConvention, LineResult, StatementState } from '../types.js';

export function ignored(reason: string): LineResult {
  return { kind: 'ignored', reason };
}

/** First capture of the first line matching `pattern`. */
export function findFirst(lines: readonly string[], pattern: RegExp): RegExpExecArray | undefined {
  for (const line of lines) {
    const match = pattern.exec(line);
    if (match !== null) {
      return match;
    }
  }
  return undefined;
}

export function requireFiscalYear(state: StatementState): number {
  if (state.fiscalYear === undefined) {
    throw new MissingMetadataError('fiscalYear');
  }
  return state.fiscalYear;
}

/**
 * ISO date for a row's month/day tokens. Rows dated after the month the
 * statement period closes in fall in the previous year.
 */
export function resolveRowDate(state: StatementState, monthToken: string, dayToken: string): string {
  const fiscalYear = requireFiscalYear(state);
  const month = monthNumber(monthToken);
  if (month === undefined) {
    throw new FieldFormatError(`Unknown month name: ${monthToken}`, monthToken);
  }
  return resolveStatementDate(yearForMonth(fiscalYear, month, state.periodEndMonth), monthToken, dayToken);
}

/**
 * Route a single signed amount column to credit or debit.
 */
export function routeAmount(
  amount: SanitizedAmount,
  convention: Exclude<AmountConvention, 'by-column'>,
  raw: string,
): { credit: number | undefined; debit: number | undefined } {
  switch (convention) {
    case 'cr-marks-debit':
      if (amount.negative) {
        throw new FieldFormatError(`Unexpected minus sign on card amount: ${raw.trim()}`, raw);
      }
      return amount.creditMarker
        ? { credit: undefined, debit: amount.minorUnits }
        : { credit: amount.minorUnits, debit: undefined };
    case 'negative-marks-credit':
      return amount.negative || amount.creditMarker
        ? { credit: amount.minorUnits, debit: undefined }
        : { credit: undefined, debit: amount.minorUnits };
  }
}

/** Non-empty capture group, or a FieldFormatError naming the line. */
export function group(match: RegExpExecArray, index: number, line: string): string {
  const value = match[index];
  if (value === undefined) {
    throw new FieldFormatError(`Row is missing field ${index}`, line);
  }
  return value;
}
