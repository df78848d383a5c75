/**
 * Error taxonomy for statement parsing.
 *
 * Every fatal condition extends StatementError and aborts the whole document.
 * FieldFormatError is the one recoverable failure: variants decide whether a
 * malformed row is skipped or fatal.
 */
import type { Transaction } from './transaction.js';

export type StatementErrorCode =
  | 'UNRECOGNIZED_DOCUMENT'
  | 'MISSING_METADATA'
  | 'TRANSACTION_INVARIANT'
  | 'RECONCILIATION_MISMATCH'
  | 'MISSING_FOLLOW_UP'
  | 'PENDING_TRANSACTION'
  | 'FIELD_FORMAT';

export class StatementError extends Error {
  readonly code: StatementErrorCode;

  constructor(code: StatementErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnrecognizedDocumentError extends StatementError {
  /** Raw first-page text, kept for diagnosis */
  readonly firstPageText: string;

  constructor(firstPageText: string) {
    super('UNRECOGNIZED_DOCUMENT', 'Unrecognized statement: no known layout matched the first page');
    this.firstPageText = firstPageText;
  }
}

export class MissingMetadataError extends StatementError {
  readonly field: string;

  constructor(field: string, detail?: string) {
    super('MISSING_METADATA', `Required statement field not found: ${field}${detail !== undefined ? ` (${detail})` : ''}`);
    this.field = field;
  }
}

export class TransactionInvariantError extends StatementError {
  constructor(message: string) {
    super('TRANSACTION_INVARIANT', message);
  }
}

export class ReconciliationError extends StatementError {
  readonly check: string;
  readonly expected: number;
  readonly actual: number;
  readonly transactions: readonly Transaction[];

  constructor(check: string, expected: number, actual: number, transactions: readonly Transaction[]) {
    super('RECONCILIATION_MISMATCH', `${check} mismatch: parsed ${actual} != declared ${expected}`);
    this.check = check;
    this.expected = expected;
    this.actual = actual;
    this.transactions = transactions;
  }
}

export class MissingFollowUpError extends StatementError {
  readonly line: string;

  constructor(expected: string, line: string) {
    super('MISSING_FOLLOW_UP', `Expected ${expected} after transaction line: ${line.trim()}`);
    this.line = line;
  }
}

export class PendingTransactionError extends StatementError {
  constructor(message: string) {
    super('PENDING_TRANSACTION', message);
  }
}

export class FieldFormatError extends StatementError {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super('FIELD_FORMAT', message);
    this.raw = raw;
  }
}

export function isStatementError(error: unknown): error is StatementError {
  return error instanceof StatementError;
}
