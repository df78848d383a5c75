import { FieldFormatError } from '../errors.js';

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'] as const;

const FULL_MONTH_NAMES = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

/**
 * Map a month token to 1..12 by its first three letters, ignoring case and a
 * trailing period (`Jan`, `JAN`, `Jan.`, `January`). Returns undefined for
 * anything else.
 */
export function monthNumber(token: string): number | undefined {
  const key = token.trim().replace(/\.$/, '').toLowerCase();
  if (key.length < 3) {
    return undefined;
  }
  const prefix = key.slice(0, 3);
  const index = MONTHS.findIndex((m) => m === prefix);
  if (index === -1) {
    return undefined;
  }
  // "Janxyz" is not a month; full names must spell out correctly
  if (key.length > 3 && !FULL_MONTH_NAMES[index]?.startsWith(key)) {
    return undefined;
  }
  return index + 1;
}

export function toISODate(year: number, month: number, day: number): string {
  return `${year}-${month.toString().padStart(2, '0')}-${day.toString().padStart(2, '0')}`;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Build an ISO date from a statement year and the month/day tokens of a row.
 * Unknown months and impossible days raise FieldFormatError.
 */
export function resolveStatementDate(year: number, monthToken: string, dayToken: string): string {
  const month = monthNumber(monthToken);
  if (month === undefined) {
    throw new FieldFormatError(`Unknown month name: ${monthToken}`, monthToken);
  }
  const day = parseInt(dayToken, 10);
  if (isNaN(day) || day < 1 || day > daysInMonth(year, month)) {
    throw new FieldFormatError(`Invalid day ${dayToken} for ${monthToken} ${year}`, dayToken);
  }
  return toISODate(year, month, day);
}

/**
 * Year for a row month on a statement whose period closes in
 * `periodEndMonth` of `fiscalYear`. Rows dated after the closing month
 * belong to the previous year (December rows on a January statement).
 */
export function yearForMonth(fiscalYear: number, month: number, periodEndMonth?: number): number {
  if (periodEndMonth !== undefined && month > periodEndMonth) {
    return fiscalYear - 1;
  }
  return fiscalYear;
}
