/**
 * Balance reconciliation for parsed statements.
 *
 * Running-balance statements (chequing) declare their own credit and debit
 * totals; balance-delta statements (cards) declare an opening and closing
 * balance. Amounts are integer minor units, so every check is exact.
 */
import {
  MissingMetadataError,
  ReconciliationError,
  formatMinorUnits,
  sumMinorUnits,
  type DiagnosticSink,
  type Transaction,
} from '@ledgerscan/types';
import type { BalanceSign, ReconciliationShape, StatementState } from './types.js';

export interface ReconciliationCheck {
  name: 'totalCredits' | 'totalDebits' | 'closingBalance';
  expected: number;
  actual: number;
  passed: boolean;
}

export interface ReconciliationResult {
  /** Whether every check matched exactly */
  passed: boolean;
  shape: ReconciliationShape['kind'];
  sign: BalanceSign | undefined;
  openingBalance: number | undefined;
  closingBalance: number | undefined;
  totalCredits: number;
  totalDebits: number;
  checks: ReconciliationCheck[];
}

export function calculateTotals(transactions: readonly Transaction[]): { totalCredits: number; totalDebits: number } {
  return {
    totalCredits: sumMinorUnits(transactions.flatMap((t) => (t.credit === undefined ? [] : [t.credit]))),
    totalDebits: sumMinorUnits(transactions.flatMap((t) => (t.debit === undefined ? [] : [t.debit]))),
  };
}

function check(name: ReconciliationCheck['name'], expected: number, actual: number): ReconciliationCheck {
  return { name, expected, actual, passed: expected === actual };
}

/**
 * Closing balance implied by the parsed totals.
 *
 * credit-increases: closing = opening + credits - debits
 * credit-decreases: closing = opening - credits + debits
 */
export function expectedClosingBalance(
  openingBalance: number,
  totalCredits: number,
  totalDebits: number,
  sign: BalanceSign,
): number {
  return sign === 'credit-increases'
    ? openingBalance + totalCredits - totalDebits
    : openingBalance - totalCredits + totalDebits;
}

export function reconcileRunningBalance(
  transactions: readonly Transaction[],
  declared: { totalCredits: number; totalDebits: number },
): ReconciliationResult {
  const totals = calculateTotals(transactions);
  const checks = [
    check('totalCredits', declared.totalCredits, totals.totalCredits),
    check('totalDebits', declared.totalDebits, totals.totalDebits),
  ];
  return {
    passed: checks.every((c) => c.passed),
    shape: 'running-balance',
    sign: undefined,
    openingBalance: undefined,
    closingBalance: undefined,
    ...totals,
    checks,
  };
}

export function reconcileBalanceDelta(
  transactions: readonly Transaction[],
  declared: { openingBalance: number; closingBalance: number },
  sign: BalanceSign,
): ReconciliationResult {
  const totals = calculateTotals(transactions);
  const computed = expectedClosingBalance(declared.openingBalance, totals.totalCredits, totals.totalDebits, sign);
  const checks = [check('closingBalance', declared.closingBalance, computed)];
  return {
    passed: checks.every((c) => c.passed),
    shape: 'balance-delta',
    sign,
    openingBalance: declared.openingBalance,
    closingBalance: declared.closingBalance,
    ...totals,
    checks,
  };
}

function declared(state: StatementState, field: 'openingBalance' | 'closingBalance' | 'declaredCredits' | 'declaredDebits'): number {
  const value = state[field];
  if (value === undefined) {
    throw new MissingMetadataError(field, 'needed for reconciliation');
  }
  return value;
}

/**
 * Reconcile against the declared values in `state` and throw
 * ReconciliationError on the first failed check.
 */
export function reconcileStatement(
  shape: ReconciliationShape,
  state: StatementState,
  transactions: readonly Transaction[],
  sink?: DiagnosticSink,
): ReconciliationResult {
  const result =
    shape.kind === 'running-balance'
      ? reconcileRunningBalance(transactions, {
          totalCredits: declared(state, 'declaredCredits'),
          totalDebits: declared(state, 'declaredDebits'),
        })
      : reconcileBalanceDelta(
          transactions,
          { openingBalance: declared(state, 'openingBalance'), closingBalance: declared(state, 'closingBalance') },
          shape.sign,
        );

  for (const c of result.checks) {
    if (!c.passed) {
      throw new ReconciliationError(c.name, c.expected, c.actual, transactions);
    }
    sink?.record({ type: 'reconciled', check: c.name, expected: c.expected, actual: c.actual });
  }
  return result;
}

/**
 * Format reconciliation result as a human-readable message.
 */
export function formatReconciliationResult(result: ReconciliationResult): string {
  const lines = [`Balance Reconciliation (${result.shape}): ${result.passed ? 'PASSED' : 'FAILED'}`];

  if (result.shape === 'balance-delta' && result.openingBalance !== undefined) {
    const creditOp = result.sign === 'credit-increases' ? '+' : '-';
    const debitOp = result.sign === 'credit-increases' ? '-' : '+';
    lines.push(
      `  Opening Balance:  $${formatMinorUnits(result.openingBalance)}`,
      `  ${creditOp} Total Credits:  $${formatMinorUnits(result.totalCredits)}`,
      `  ${debitOp} Total Debits:   $${formatMinorUnits(result.totalDebits)}`,
    );
  } else {
    lines.push(
      `  Total Credits:    $${formatMinorUnits(result.totalCredits)}`,
      `  Total Debits:     $${formatMinorUnits(result.totalDebits)}`,
    );
  }

  for (const c of result.checks) {
    const status = c.passed ? 'ok' : `off by $${formatMinorUnits(c.actual - c.expected)}`;
    lines.push(`  ${c.name}: parsed $${formatMinorUnits(c.actual)}, declared $${formatMinorUnits(c.expected)} (${status})`);
  }

  return lines.join('\n');
}
