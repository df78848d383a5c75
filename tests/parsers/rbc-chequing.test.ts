import { describe, it, expect } from 'vitest';
import { parseStatement } from '@ledgerscan/statement-parser';
import { PendingTransactionError, textPages } from '@ledgerscan/types';
import { at, line, page, right } from '../helpers/fixed-width.js';
import { rbcChequingPages } from '../helpers/statements.js';

const summary = (deposits: string, withdrawals: string): string[] => [
  'Royal Bank of Canada',
  'Your account statement   From December 15, 2023 to January 14, 2024',
  `Total deposits into your account   + ${deposits}`,
  `Total withdrawals from your account   - ${withdrawals}`,
  'Date   Description   Withdrawals ($)   Deposits ($)   Balance ($)',
];

describe('rbc-chequing', () => {
  it('should join multi-line descriptions and carry dates forward', () => {
    const result = parseStatement(textPages(rbcChequingPages()));

    expect(result.variant.id).toBe('rbc-chequing');
    expect(result.transactions.map((t) => [t.transactionDate, t.payee, t.credit, t.debit, t.balance])).toEqual([
      ['2023-12-20', 'Online Banking transfer Savings 1234', undefined, 4540, 15460],
      ['2023-12-20', 'Coffee Shop', undefined, 5000, 10460],
      ['2024-01-05', 'Payroll', 150000, undefined, 160460],
    ]);
  });

  it('should reconcile against the declared deposit and withdrawal totals', () => {
    const { reconciliation } = parseStatement(textPages(rbcChequingPages()));

    expect(reconciliation.passed).toBe(true);
    expect(reconciliation.totalCredits).toBe(150000);
    expect(reconciliation.totalDebits).toBe(9540);
  });

  it('should stop at the closing balance row', () => {
    const result = parseStatement(textPages(rbcChequingPages()));
    expect(result.events.filter((e) => e.type === 'document-stopped')).toEqual([
      { type: 'document-stopped', page: 2, line: 2 },
    ]);
  });

  it('should reject a dated row while a description waits for its amount', () => {
    const pages = [
      page(
        ...summary('$0.00', '$10.00'),
        line(at(1, '20 Dec'), at(8, 'Online Banking transfer')),
        line(at(1, '21 Dec'), at(8, 'Coffee Shop'), right(75, '10.00')),
      ),
    ];

    expect(() => parseStatement(textPages(pages))).toThrow(PendingTransactionError);
    expect(() => parseStatement(textPages(pages))).toThrow(
      'Dated row on page 1 line 7 while "Online Banking transfer" from line 6 still has no amount',
    );
  });

  it('should skip an undated first row', () => {
    const pages = [
      page(...summary('$0.00', '$0.00'), line(at(8, 'Coffee Shop'), right(75, '50.00')), 'Closing Balance'),
    ];

    const result = parseStatement(textPages(pages));

    expect(result.transactions).toEqual([]);
    expect(result.events.flatMap((e) => (e.type === 'line-skipped' ? [[e.line, e.reason]] : []))).toEqual([
      [6, 'Row has no date and no earlier row supplies one'],
    ]);
  });

  it('should not carry the date of a skipped row forward', () => {
    const pages = [
      page(
        ...summary('$0.00', '$0.00'),
        line(at(1, '20 Dec'), at(8, 'Coffee Shop'), right(75, '5.0')),
        line(at(8, 'Tea Room'), right(75, '3.00')),
        'Closing Balance',
      ),
    ];

    const result = parseStatement(textPages(pages));

    expect(result.transactions).toEqual([]);
    expect(result.events.flatMap((e) => (e.type === 'line-skipped' ? [[e.line, e.reason]] : []))).toEqual([
      [6, 'Unable to parse amount: 5.0'],
      [7, 'Row has no date and no earlier row supplies one'],
    ]);
  });
});
