import { formatMinorUnits, type Transaction } from '@ledgerscan/types';

const PAYEE_WIDTH = 55;
const AMOUNT_WIDTH = 12;

function cell(minorUnits: number | undefined): string {
  return (minorUnits === undefined ? '' : formatMinorUnits(minorUnits)).padStart(AMOUNT_WIDTH);
}

/**
 * Fixed-width listing of transactions for terminal output.
 */
export function formatTransactionTable(transactions: readonly Transaction[]): string {
  const header = [
    'Date'.padEnd(10),
    'Payee'.padEnd(PAYEE_WIDTH),
    'Credit'.padStart(AMOUNT_WIDTH),
    'Debit'.padStart(AMOUNT_WIDTH),
    'Balance'.padStart(AMOUNT_WIDTH),
  ].join('  ');

  const rows = transactions.map((t) => {
    const payee = t.payee.length > PAYEE_WIDTH ? `${t.payee.slice(0, PAYEE_WIDTH - 1)}~` : t.payee.padEnd(PAYEE_WIDTH);
    return [t.transactionDate, payee, cell(t.credit), cell(t.debit), cell(t.balance)].join('  ');
  });

  return [header, '-'.repeat(header.length), ...rows].join('\n');
}
