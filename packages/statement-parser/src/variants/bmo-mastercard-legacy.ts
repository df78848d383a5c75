import { collapseWhitespace, createTransaction, sliceColumn } from '@ledgerscan/types';
import { lineContains, lineMatches } from '../line-classifier.js';
import type { StatementVariant } from '../types.js';
import { readBalanceSummary } from './bmo-mastercard.js';
import { readCardRow } from './card-rows.js';
import { ignored } from './shared.js';

// Older BMO card layout: a reference number column, balances labelled with dates.
const COLUMNS = {
  description: { start: 0, end: 85 },
  reference: { start: 88, end: 115 },
  amount: { start: 118, end: 135 },
} as const;

const ROW = /^\s+([A-Z][a-z]{2})\.\s+(\d{1,2})\s+([A-Z][a-z]{2})\.\s+(\d{1,2})\s+(.+)$/;

const STATEMENT_DATE = /\s+Statement\s+Date\s+([A-Z][a-z]+)\.?\s+\d{1,2},\s+(\d{4})/;
const PREVIOUS_BALANCE = /\s+Previous\s+Balance,\s+[A-Z][a-z]{2}\.\s+\d{1,2},\s+\d{4}\s+(\$[\d,]+\.\d{2}(?:\s*CR)?)/;
const NEW_BALANCE = /\s+New\s+Balance,\s+[A-Z][a-z]{2}\.\s+\d{1,2},\s+\d{4}\s+(\$[\d,]+\.\d{2}(?:\s*CR)?)/;

export const bmoMastercardLegacy: StatementVariant = {
  id: 'bmo-mastercard-legacy',
  institution: 'BMO',
  accountKind: 'credit-card',
  markers: ['BMO', 'Statement Date'],
  layout: { xDensity: 4.5, xTolerance: 1 },
  headerPattern: /^\s+DATE\s+DATE\s+DESCRIPTION\s+REFERENCE\s+NO\.\s+AMOUNT.*$/,
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
    readBalanceSummary(lines, state, { year: STATEMENT_DATE, opening: PREVIOUS_BALANCE, closing: NEW_BALANCE });
  },

  readLine({ line }, state) {
    const row = readCardRow(line, state, {
      rowPattern: ROW,
      description: COLUMNS.description,
      amount: COLUMNS.amount,
      convention: 'cr-marks-debit',
    });
    if (row === undefined) {
      return ignored('no date prefix');
    }

    const reference = collapseWhitespace(sliceColumn(line, COLUMNS.reference));
    const note = reference === '' ? row.payee : `${row.payee} ${reference}`;
    return { kind: 'transaction', transaction: createTransaction({ ...row, note }) };
  },
};
