import { describe, it, expect } from 'vitest';
import { parseStatement } from '@ledgerscan/statement-parser';
import { MissingMetadataError, ReconciliationError, textPages } from '@ledgerscan/types';
import { at, line, right } from '../helpers/fixed-width.js';
import { CHEQUING_HEADER, bmoChequingPages } from '../helpers/statements.js';

describe('bmo-chequing', () => {
  it('should parse and reconcile a statement', () => {
    const result = parseStatement(textPages(bmoChequingPages()));

    expect(result.variant.id).toBe('bmo-chequing');
    expect(result.fiscalYear).toBe(2024);
    expect(result.transactions.map((t) => [t.transactionDate, t.payee, t.credit, t.debit, t.balance])).toEqual([
      ['2024-01-05', 'GROCERY STORE PURCHASE', undefined, 4217, 100000],
      ['2024-01-12', 'PAYROLL DEPOSIT ACME CORP', 250000, undefined, 350000],
      ['2024-01-20', 'ONLINE TRANSFER', undefined, 50000, 300000],
    ]);
    expect(result.reconciliation.checks).toEqual([
      { name: 'totalCredits', expected: 250000, actual: 250000, passed: true },
      { name: 'totalDebits', expected: 54217, actual: 54217, passed: true },
    ]);
  });

  it('should record skipped boilerplate rows', () => {
    const result = parseStatement(textPages(bmoChequingPages()));
    const reasons = result.events.flatMap((e) => (e.type === 'line-ignored' ? [e.reason] : []));
    expect(reasons).toContain('boilerplate: Opening balance');
    expect(reasons).toContain('closing totals');
  });

  it('should fail when the closing totals disagree', () => {
    const pages = bmoChequingPages().map((p) => p.replace('   542.17', '   542.18'));
    expect(() => parseStatement(textPages(pages))).toThrow(ReconciliationError);
  });

  it('should fail without the statement year', () => {
    const pages = bmoChequingPages().map((p) => p.replace('   For the period ending January 31, 2024\n', ''));
    expect(() => parseStatement(textPages(pages))).toThrow(MissingMetadataError);
  });

  it('should treat a blank closing total as zero', () => {
    const pages = [
      [
        'BMO Bank of Montreal',
        '   Summary of your account',
        '   For the period ending March 31, 2024',
        CHEQUING_HEADER,
        line(at(3, 'Mar 2'), at(11, 'INTEREST'), at(120, '0.12'), at(136, '10.12')),
        line(at(3, 'Mar 31'), at(11, 'Closing totals'), at(120, '0.12'), at(136, '10.12')),
        '   Please report any errors',
      ].join('\n'),
    ];

    const result = parseStatement(textPages(pages));
    expect(result.transactions.map((t) => t.credit)).toEqual([12]);
    expect(result.reconciliation.totalDebits).toBe(0);
  });

  it('should date December rows on a January statement in the previous year', () => {
    const pages = [
      [
        'BMO Bank of Montreal',
        '   Summary of your account',
        '   For the period ending January 05, 2025',
        CHEQUING_HEADER,
        line(at(3, 'Dec 28'), at(11, 'HOLIDAY MARKET'), right(107, '25.00'), right(142, '975.00')),
        line(at(3, 'Jan 2'), at(11, 'REFUND'), right(125, '5.00'), right(142, '980.00')),
        line(at(3, 'Jan 5'), at(11, 'Closing totals'), right(107, '25.00'), right(125, '5.00'), right(142, '980.00')),
        '   Please report any errors',
      ].join('\n'),
    ];

    const result = parseStatement(textPages(pages));

    expect(result.fiscalYear).toBe(2025);
    expect(result.transactions.map((t) => t.transactionDate)).toEqual(['2024-12-28', '2025-01-02']);
  });
});
