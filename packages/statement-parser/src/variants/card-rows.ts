import { FieldFormatError, collapseWhitespace, sanitizeAmount, sliceColumn } from '@ledgerscan/types';
import type { AmountConvention, ColumnRange, StatementState } from '../types.js';
import { group, resolveRowDate, routeAmount } from './shared.js';

export interface CardRow {
  transactionDate: string;
  postDate: string;
  payee: string;
  credit: number | undefined;
  debit: number | undefined;
}

/**
 * Card rows lead with two month/day pairs (transaction, then posting) and
 * carry one signed amount column.
 * Returns undefined when the description column does not start a row.
 */
export function readCardRow(
  line: string,
  state: StatementState,
  layout: {
    rowPattern: RegExp;
    description: ColumnRange;
    amount: ColumnRange;
    convention: Exclude<AmountConvention, 'by-column'>;
  },
): CardRow | undefined {
  const row = layout.rowPattern.exec(sliceColumn(line, layout.description));
  if (row === null) {
    return undefined;
  }

  const rawAmount = sliceColumn(line, layout.amount);
  const amount = sanitizeAmount(rawAmount);
  if (amount === undefined) {
    throw new FieldFormatError('Transaction row has no amount', line);
  }

  return {
    transactionDate: resolveRowDate(state, group(row, 1, line), group(row, 2, line)),
    postDate: resolveRowDate(state, group(row, 3, line), group(row, 4, line)),
    payee: collapseWhitespace(group(row, 5, line)),
    ...routeAmount(amount, layout.convention, rawAmount),
  };
}
