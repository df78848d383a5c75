import { describe, it, expect } from 'vitest';
import { bmoMastercard, bmoMastercardLegacy, parseStatement } from '@ledgerscan/statement-parser';
import { MissingMetadataError, ReconciliationError, textPages } from '@ledgerscan/types';
import { at, line, page, right } from '../helpers/fixed-width.js';
import { bmoMastercardLegacyPages, bmoMastercardPages } from '../helpers/statements.js';

describe('bmo-mastercard', () => {
  it('should parse both dates, wrapped descriptions and CR payments', () => {
    const result = parseStatement(textPages(bmoMastercardPages()));

    expect(result.variant).toBe(bmoMastercard);
    expect(result.transactions).toEqual([
      {
        transactionDate: '2024-01-20',
        postDate: '2024-01-22',
        payee: 'COFFEE SHOP #12 TORONTO ON',
        credit: 475,
        debit: undefined,
        balance: undefined,
        note: 'COFFEE SHOP #12 TORONTO ON',
      },
      {
        transactionDate: '2024-02-01',
        postDate: '2024-02-02',
        payee: 'PAYMENT RECEIVED - THANK YOU',
        credit: undefined,
        debit: 30000,
        balance: undefined,
        note: 'PAYMENT RECEIVED - THANK YOU',
      },
      {
        transactionDate: '2024-02-05',
        postDate: '2024-02-06',
        payee: 'HARDWARE STORE',
        credit: 50050,
        debit: undefined,
        balance: undefined,
        note: 'HARDWARE STORE',
      },
      {
        transactionDate: '2024-02-10',
        postDate: '2024-02-11',
        payee: 'GROCERY MARKET',
        credit: 2500,
        debit: undefined,
        balance: undefined,
        note: 'GROCERY MARKET',
      },
    ]);
  });

  it('should reconcile with credits increasing the balance', () => {
    const { reconciliation } = parseStatement(textPages(bmoMastercardPages()));

    expect(reconciliation).toMatchObject({
      shape: 'balance-delta',
      sign: 'credit-increases',
      openingBalance: 120000,
      closingBalance: 143025,
      totalCredits: 53025,
      totalDebits: 30000,
      passed: true,
    });
  });

  it('should ignore rows after a page stop and after the document stop', () => {
    const payees = parseStatement(textPages(bmoMastercardPages())).transactions.map((t) => t.payee);
    expect(payees).not.toContain('AFTER PAGE STOP');
    expect(payees).not.toContain('AFTER DOCUMENT STOP');
  });

  it('should require the closing balance before scanning', () => {
    const pages = bmoMastercardPages().map((p) => p.replace('   Total balance   $1,430.25\n', ''));
    expect(() => parseStatement(textPages(pages))).toThrow(
      'Required statement field not found: closingBalance (not found on page 1 of a bmo-mastercard statement)'
    );
    expect(() => parseStatement(textPages(pages))).toThrow(MissingMetadataError);
  });

  it('should raise when the declared balance does not match', () => {
    const pages = bmoMastercardPages().map((p) => p.replace('   Total balance   $1,430.25', '   Total balance   $1,430.26'));
    expect(() => parseStatement(textPages(pages))).toThrow('closingBalance mismatch: parsed 143025 != declared 143026');
  });
});

describe('bmo-mastercard year rollover', () => {
  it('should date December rows on a January statement in the previous year', () => {
    const pages = [
      page(
        'BMO Bank of Montreal                    Mastercard',
        '                                        Statement date   Jan. 15, 2025',
        '   Previous total balance, Dec. 15, 2024   $100.00',
        '   Total balance   $120.00',
        '   DATE    DATE    DESCRIPTION                                    AMOUNT ($)',
        line(at(3, 'Dec. 20'), at(12, 'Dec. 22'), at(21, 'GIFT SHOP'), right(92, '20.00')),
        '   Total for card number XXXX XXXX XXXX 1234   $120.00',
      ),
    ];

    const [transaction] = parseStatement(textPages(pages)).transactions;

    expect(transaction?.transactionDate).toBe('2024-12-20');
    expect(transaction?.postDate).toBe('2024-12-22');
  });
});

describe('bmo-mastercard-legacy', () => {
  it('should append the reference number to the note', () => {
    const result = parseStatement(textPages(bmoMastercardLegacyPages()));

    expect(result.variant).toBe(bmoMastercardLegacy);
    expect(result.fiscalYear).toBe(2023);
    expect(result.transactions).toEqual([
      {
        transactionDate: '2023-02-14',
        postDate: '2023-02-15',
        payee: 'RESTAURANT',
        credit: 35000,
        debit: undefined,
        balance: undefined,
        note: 'RESTAURANT 1234567890',
      },
    ]);
  });

  it('should read a CR opening balance as negative', () => {
    const { reconciliation } = parseStatement(textPages(bmoMastercardLegacyPages()));
    expect(reconciliation.openingBalance).toBe(-25000);
    expect(reconciliation.closingBalance).toBe(10000);
  });

  it('should fail reconciliation if the CR marker were ignored', () => {
    const pages = bmoMastercardLegacyPages().map((p) => p.replace('$250.00 CR', '$250.00'));
    expect(() => parseStatement(textPages(pages))).toThrow(ReconciliationError);
  });
});
