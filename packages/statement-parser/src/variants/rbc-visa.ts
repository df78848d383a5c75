import { MissingFollowUpError, createTransaction, monthNumber, parseSignedBalance, sliceColumn } from '@ledgerscan/types';
import { lineMatches } from '../line-classifier.js';
import type { StatementVariant } from '../types.js';
import { readCardRow } from './card-rows.js';
import { findFirst, ignored } from './shared.js';

const COLUMNS = {
  description: { start: 0, end: 58 },
  amount: { start: 58, end: 74 },
} as const;

const ROW = /^\s+([A-Z]{3})\s+(\d{1,2})\s+([A-Z]{3})\s+(\d{1,2})\s+(\S.*)$/;
// Each purchase is followed by its reference number on a line of its own
const REFERENCE = /^\s+(\d{12,})\s*$/;

const PERIOD = /STATEMENT\s+FROM\s+[A-Z]{3}\s+\d{1,2},?\s+\d{4}\s+TO\s+([A-Z]{3})\s+\d{1,2},?\s+(\d{4})/;
const PREVIOUS_BALANCE = /PREVIOUS\s+STATEMENT\s+BALANCE\s+(-?\$[\d,]+\.\d{2})/;
const NEW_BALANCE = /NEW\s+BALANCE\s+(-?\$[\d,]+\.\d{2})/;

/**
 * RBC Visa. Only the left 60% of the page is rendered, which drops the
 * rewards sidebar. The transaction table carries on across pages without a
 * repeated header, and payments print as negative amounts.
 */
export const rbcVisa: StatementVariant = {
  id: 'rbc-visa',
  institution: 'RBC',
  accountKind: 'credit-card',
  markers: ['RBC', 'Visa', 'STATEMENT FROM'],
  layout: { xDensity: 5.5, xTolerance: 1.5, crop: { left: 0, right: 0.6 } },
  headerPattern: /^\s*TRANSACTION\s+POSTING\s+ACTIVITY\s+DESCRIPTION\s+AMOUNT\s+\(\$\)/,
  rowPattern: ROW,
  columns: COLUMNS,
  amountConvention: 'negative-marks-credit',
  reconciliation: { kind: 'balance-delta', sign: 'credit-decreases' },
  requiredMetadata: ['fiscalYear', 'openingBalance', 'closingBalance'],
  malformedLines: 'fail',
  continuesAcrossPages: true,
  isPageEnd: lineMatches(/^\s*CONTINUED\s*$/),
  isDocumentEnd: lineMatches(/^\s*TOTAL\s+ACCOUNT\s+BALANCE\b/),

  readFirstPage(lines, state) {
    const period = findFirst(lines, PERIOD);
    if (period?.[1] !== undefined && period[2] !== undefined) {
      state.fiscalYear = parseInt(period[2], 10);
      state.periodEndMonth = monthNumber(period[1]);
    }
    const opening = findFirst(lines, PREVIOUS_BALANCE);
    if (opening?.[1] !== undefined) {
      state.openingBalance = parseSignedBalance(opening[1]);
    }
    const closing = findFirst(lines, NEW_BALANCE);
    if (closing?.[1] !== undefined) {
      state.closingBalance = parseSignedBalance(closing[1]);
    }
  },

  readLine({ line, next }, state) {
    const row = readCardRow(line, state, {
      rowPattern: ROW,
      description: COLUMNS.description,
      amount: COLUMNS.amount,
      convention: 'negative-marks-credit',
    });
    if (row === undefined) {
      return ignored('no date prefix');
    }

    const reference = next === undefined ? undefined : REFERENCE.exec(sliceColumn(next, COLUMNS.description))?.[1];
    if (reference === undefined) {
      throw new MissingFollowUpError('a reference number line', line);
    }

    return {
      kind: 'transaction',
      transaction: createTransaction({ ...row, note: `${row.payee} ${reference}` }),
    };
  },
};
