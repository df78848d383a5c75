import { collapseWhitespace, createTransaction, monthNumber, parseSignedBalance, sliceColumn } from '@ledgerscan/types';
import { isWrappedDescription, lineContains, lineMatches } from '../line-classifier.js';
import type { StatementState, StatementVariant } from '../types.js';
import { readCardRow } from './card-rows.js';
import { findFirst, ignored } from './shared.js';

const COLUMNS = {
  description: { start: 0, end: 78 },
  amount: { start: 78, end: 95 },
} as const;

const ROW = /^\s+([A-Z][a-z]{2})\.\s+(\d{1,2})\s+([A-Z][a-z]{2})\.\s+(\d{1,2})\s+(.+)$/;

const STATEMENT_DATE = /^.*\s+Statement\s+date\s+([A-Z][a-z]+)\.?\s+\d{1,2},\s+(\d{4})/;
const PREVIOUS_BALANCE =
  /^\s+Previous\s+(?:total\s+)?balance,\s+[A-Z][a-z]{2}\.\s+\d{1,2},\s+\d{4}\s+(\$[\d,]+\.\d{2}(?:\s*CR)?)/;
const TOTAL_BALANCE = /^\s+Total\s+balance\s+(\$[\d,]+\.\d{2}(?:\s*CR)?)/;

/**
 * Statement date and balances as printed in the summary box. `year` captures
 * the statement month then year; CR marks a credit balance.
 */
export function readBalanceSummary(
  lines: readonly string[],
  state: StatementState,
  patterns: { year: RegExp; opening: RegExp; closing: RegExp },
): void {
  const date = findFirst(lines, patterns.year);
  if (date?.[1] !== undefined && date[2] !== undefined) {
    state.fiscalYear = parseInt(date[2], 10);
    state.periodEndMonth = monthNumber(date[1]);
  }
  const opening = findFirst(lines, patterns.opening);
  if (opening?.[1] !== undefined) {
    state.openingBalance = parseSignedBalance(opening[1]);
  }
  const closing = findFirst(lines, patterns.closing);
  if (closing?.[1] !== undefined) {
    state.closingBalance = parseSignedBalance(closing[1]);
  }
}

export const bmoMastercard: StatementVariant = {
  id: 'bmo-mastercard',
  institution: 'BMO',
  accountKind: 'credit-card',
  markers: ['BMO', 'Statement date'],
  layout: { xDensity: 4.5, xTolerance: 1 },
  headerPattern: /^\s+DATE\s+DATE\s+DESCRIPTION\s+AMOUNT.*$/,
  rowPattern: ROW,
  columns: COLUMNS,
  amountConvention: 'cr-marks-debit',
  reconciliation: { kind: 'balance-delta', sign: 'credit-increases' },
  requiredMetadata: ['fiscalYear', 'openingBalance', 'closingBalance'],
  malformedLines: 'fail',
  continuesAcrossPages: false,
  isPageEnd: lineContains('(continued on next page)'),
  isDocumentEnd: lineMatches(/^\s+Total\s+for\s+card\s+number\s+XXXX\s+XXXX\s+XXXX\s+\d{4}\s+\$[\d,]+\.\d{2}/),

  readFirstPage(lines, state) {
    readBalanceSummary(lines, state, { year: STATEMENT_DATE, opening: PREVIOUS_BALANCE, closing: TOTAL_BALANCE });
  },

  readLine({ line, next }, state) {
    const row = readCardRow(line, state, {
      rowPattern: ROW,
      description: COLUMNS.description,
      amount: COLUMNS.amount,
      convention: 'cr-marks-debit',
    });
    if (row === undefined) {
      return ignored('no date prefix');
    }

    let payee = row.payee;
    if (next !== undefined && isWrappedDescription(next, COLUMNS.description, [COLUMNS.amount], ROW)) {
      payee = collapseWhitespace(`${payee} ${sliceColumn(next, COLUMNS.description)}`);
    }

    return { kind: 'transaction', transaction: createTransaction({ ...row, payee, note: payee }) };
  },
};
