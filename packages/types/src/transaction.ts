import { TransactionInvariantError } from './errors.js';

/**
 * Canonical output unit. Amounts are integer minor units (cents).
 */
export interface Transaction {
  readonly transactionDate: string;
  readonly postDate: string;
  readonly payee: string;
  readonly credit: number | undefined;
  readonly debit: number | undefined;
  readonly balance: number | undefined;
  readonly note: string;
}

export interface TransactionInput {
  transactionDate: string;
  /** Defaults to transactionDate for single-date formats */
  postDate?: string | undefined;
  payee: string;
  credit?: number | undefined;
  debit?: number | undefined;
  balance?: number | undefined;
  /** Defaults to payee */
  note?: string | undefined;
}

function checkAmount(field: 'credit' | 'debit', value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new TransactionInvariantError(`Transaction ${field} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Construct a Transaction, enforcing that exactly one of credit/debit is set.
 * A violation is a layout or parser defect, so it throws instead of returning.
 */
export function createTransaction(input: TransactionInput): Transaction {
  const { credit, debit } = input;

  if (credit !== undefined && debit !== undefined) {
    throw new TransactionInvariantError(`Transaction has both credit and debit: ${input.payee}`);
  }
  if (credit === undefined && debit === undefined) {
    throw new TransactionInvariantError(`Transaction has no credit or debit: ${input.payee}`);
  }
  checkAmount('credit', credit);
  checkAmount('debit', debit);
  if (input.balance !== undefined && !Number.isSafeInteger(input.balance)) {
    throw new TransactionInvariantError(`Transaction balance must be an integer, got ${input.balance}`);
  }

  return Object.freeze({
    transactionDate: input.transactionDate,
    postDate: input.postDate ?? input.transactionDate,
    payee: input.payee,
    credit,
    debit,
    balance: input.balance,
    note: input.note ?? input.payee,
  });
}

/**
 * Signed amount from the account holder's point of view: credits positive,
 * debits negative.
 */
export function signedAmount(transaction: Transaction): number {
  return transaction.credit ?? -(transaction.debit ?? 0);
}
