import {
  collapseWhitespace,
  createTransaction,
  monthNumber,
  parseMinorUnits,
  parseSignedMinorUnits,
  sliceColumn,
} from '@ledgerscan/types';
import { isBoilerplate, isWrappedDescription, lineContains, lineEquals } from '../line-classifier.js';
import type { StatementVariant } from '../types.js';
import { findFirst, group, ignored, resolveRowDate } from './shared.js';

const COLUMNS = {
  description: { start: 0, end: 68 },
  withdrawals: { start: 86, end: 110 },
  deposits: { start: 110, end: 128 },
  balance: { start: 128, end: 146 },
} as const;

const AMOUNT_COLUMNS = [COLUMNS.withdrawals, COLUMNS.deposits, COLUMNS.balance];

const ROW = /^\s+([A-Z][a-z]{2})\s+(\d{1,2})\s+(.+)$/;
const PERIOD_ENDING = /^\s+For\s+the\s+period\s+ending\s+([A-Z][a-z]+)\s+\d{1,2},\s+(\d{4})/;
const BOILERPLATE = ['Opening balance', 'No activity for this period'];

export const bmoChequing: StatementVariant = {
  id: 'bmo-chequing',
  institution: 'BMO',
  accountKind: 'chequing',
  markers: ['Summary of your account'],
  layout: { xDensity: 4.5, xTolerance: 1 },
  headerPattern: /^\s+Date\s+Description\s+.*$/,
  rowPattern: ROW,
  columns: COLUMNS,
  amountConvention: 'by-column',
  reconciliation: { kind: 'running-balance' },
  requiredMetadata: ['fiscalYear'],
  malformedLines: 'skip',
  continuesAcrossPages: false,
  isPageEnd: lineEquals('continued'),
  isDocumentEnd: lineContains('Please report any errors'),

  readFirstPage(lines, state) {
    const period = findFirst(lines, PERIOD_ENDING);
    if (period?.[1] !== undefined && period[2] !== undefined) {
      state.fiscalYear = parseInt(period[2], 10);
      state.periodEndMonth = monthNumber(period[1]);
    }
  },

  readLine({ line, next }, state) {
    const row = ROW.exec(sliceColumn(line, COLUMNS.description));
    if (row === null) {
      return ignored('no date prefix');
    }

    let description = collapseWhitespace(group(row, 3, line));
    if (isBoilerplate(description, BOILERPLATE)) {
      return ignored(`boilerplate: ${description}`);
    }
    if (next !== undefined && isWrappedDescription(next, COLUMNS.description, AMOUNT_COLUMNS, ROW)) {
      description = collapseWhitespace(`${description} ${sliceColumn(next, COLUMNS.description)}`);
    }

    const debit = parseMinorUnits(sliceColumn(line, COLUMNS.withdrawals));
    const credit = parseMinorUnits(sliceColumn(line, COLUMNS.deposits));

    // Totals row: blank column means nothing moved in that direction
    if (description.includes('Closing totals')) {
      state.declaredDebits = debit ?? 0;
      state.declaredCredits = credit ?? 0;
      return ignored('closing totals');
    }

    const transactionDate = resolveRowDate(state, group(row, 1, line), group(row, 2, line));
    return {
      kind: 'transaction',
      transaction: createTransaction({
        transactionDate,
        payee: description,
        credit,
        debit,
        balance: parseSignedMinorUnits(sliceColumn(line, COLUMNS.balance)),
      }),
    };
  },
};
