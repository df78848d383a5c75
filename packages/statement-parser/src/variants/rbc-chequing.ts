import {
  FieldFormatError,
  PendingTransactionError,
  collapseWhitespace,
  createTransaction,
  isBlank,
  monthNumber,
  parseMinorUnits,
  parseSignedMinorUnits,
  sliceColumn,
} from '@ledgerscan/types';
import { isBoilerplate, lineContains, lineEquals } from '../line-classifier.js';
import type { LineContext, LineResult, PendingTransaction, StatementState, StatementVariant } from '../types.js';
import { findFirst, group, ignored, resolveRowDate } from './shared.js';

const COLUMNS = {
  description: { start: 0, end: 60 },
  withdrawals: { start: 60, end: 78 },
  deposits: { start: 78, end: 96 },
  balance: { start: 96, end: 114 },
} as const;

// Day before month ("5 Jan"); only the first row of a day carries the date
const ROW = /^\s{1,6}(\d{1,2}) ([A-Z][a-z]{2})\s+(\S.*)$/;

const PERIOD = /From\s+[A-Z][a-z]+\s+\d{1,2},\s+\d{4}\s+to\s+([A-Z][a-z]+)\s+\d{1,2},\s+(\d{4})/;
const TOTAL_DEPOSITS = /Total\s+deposits\s+into\s+your\s+account\s+\+?\s*(\$[\d,]+\.\d{2})/;
const TOTAL_WITHDRAWALS = /Total\s+withdrawals\s+from\s+your\s+account\s+-?\s*(\$[\d,]+\.\d{2})/;

const BOILERPLATE = ['Opening Balance', 'No activity for this period'];

function startDate(context: LineContext, state: StatementState, dated: string | undefined): string {
  const date = dated ?? state.lastTransactionDate;
  if (date === undefined) {
    throw new FieldFormatError('Row has no date and no earlier row supplies one', context.line);
  }
  return date;
}

/**
 * Descriptions may run over several lines before the line carrying the
 * amount, so text-only lines open or extend a pending transaction.
 */
function readRow(context: LineContext, state: StatementState): LineResult {
  const { line, pending } = context;
  const descriptionColumn = sliceColumn(line, COLUMNS.description);
  const withdrawals = sliceColumn(line, COLUMNS.withdrawals);
  const deposits = sliceColumn(line, COLUMNS.deposits);

  if (isBlank(line)) {
    return ignored('blank line');
  }

  let dated: string | undefined;
  let text = descriptionColumn;
  const row = ROW.exec(descriptionColumn);
  if (row !== null) {
    if (pending !== undefined) {
      throw new PendingTransactionError(
        `Dated row on page ${context.page} line ${context.lineNumber} while "${pending.descriptionParts.join(' ')}" ` +
          `from line ${pending.line} still has no amount`,
      );
    }
    dated = resolveRowDate(state, group(row, 2, line), group(row, 1, line));
    text = group(row, 3, line);
  }

  const description = collapseWhitespace(text);
  if (isBoilerplate(description, BOILERPLATE)) {
    return ignored(`boilerplate: ${description}`);
  }

  const debit = parseMinorUnits(withdrawals);
  const credit = parseMinorUnits(deposits);

  if (debit === undefined && credit === undefined) {
    if (description === '') {
      return ignored('balance only');
    }
    if (pending !== undefined) {
      return { kind: 'pending', pending: { ...pending, descriptionParts: [...pending.descriptionParts, description] } };
    }
    const transactionDate = startDate(context, state, dated);
    state.lastTransactionDate = transactionDate;
    const opened: PendingTransaction = {
      transactionDate,
      postDate: transactionDate,
      descriptionParts: [description],
      page: context.page,
      line: context.lineNumber,
    };
    return { kind: 'pending', pending: opened };
  }

  const transactionDate = pending?.transactionDate ?? startDate(context, state, dated);
  const parts = [...(pending?.descriptionParts ?? []), description].filter((part) => part !== '');
  return {
    kind: 'transaction',
    transaction: createTransaction({
      transactionDate,
      payee: parts.join(' '),
      credit,
      debit,
      balance: parseSignedMinorUnits(sliceColumn(line, COLUMNS.balance)),
    }),
  };
}

export const rbcChequing: StatementVariant = {
  id: 'rbc-chequing',
  institution: 'RBC',
  accountKind: 'chequing',
  markers: ['Royal Bank', 'Total deposits into your account'],
  layout: { xDensity: 5, xTolerance: 1.5 },
  headerPattern: /^\s*Date\s+Description\s+Withdrawals\s+\(\$\)\s+Deposits\s+\(\$\)\s+Balance\s+\(\$\)/,
  rowPattern: ROW,
  columns: COLUMNS,
  amountConvention: 'by-column',
  reconciliation: { kind: 'running-balance' },
  requiredMetadata: ['fiscalYear', 'declaredCredits', 'declaredDebits'],
  malformedLines: 'skip',
  continuesAcrossPages: false,
  isPageEnd: lineEquals('Please see next page'),
  isDocumentEnd: lineContains('Closing Balance'),

  readFirstPage(lines, state) {
    const period = findFirst(lines, PERIOD);
    if (period?.[1] !== undefined && period[2] !== undefined) {
      state.fiscalYear = parseInt(period[2], 10);
      state.periodEndMonth = monthNumber(period[1]);
    }
    const deposits = findFirst(lines, TOTAL_DEPOSITS);
    if (deposits?.[1] !== undefined) {
      state.declaredCredits = parseMinorUnits(deposits[1]);
    }
    const withdrawals = findFirst(lines, TOTAL_WITHDRAWALS);
    if (withdrawals?.[1] !== undefined) {
      state.declaredDebits = parseMinorUnits(withdrawals[1]);
    }
  },

  readLine: readRow,
};
