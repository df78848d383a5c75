/**
 * JSON result document (schema v1). Absent amounts become explicit nulls
 * so every transaction carries the same keys.
 */

import type { StatementParseResult } from '@ledgerscan/statement-parser';
import { PARSER_NAME, PARSER_VERSION, TransactionSchema, type Transaction, type VariantId } from '@ledgerscan/types';

export interface TransactionRecordV1 {
  transactionDate: string;
  postDate: string;
  payee: string;
  credit: number | null;
  debit: number | null;
  balance: number | null;
  note: string;
}

export interface StatementResultV1 {
  schemaVersion: 'v1';
  source: {
    fileName: string;
    pageCount: number;
  };
  statement: {
    variant: VariantId;
    institution: string;
    accountKind: 'chequing' | 'credit-card';
    fiscalYear: number;
    reconciliation: {
      shape: 'running-balance' | 'balance-delta';
      signConvention?: 'credit-increases' | 'credit-decreases';
      openingBalance?: number;
      closingBalance?: number;
      totalCredits: number;
      totalDebits: number;
      checks: Array<{ name: string; expected: number; actual: number; passed: boolean }>;
    };
    transactionCount: number;
    transactions: TransactionRecordV1[];
  };
  metadata: {
    parser: { name: string; version: string };
    parsedAt: string;
    warnings: string[];
  };
}

export function toTransactionRecord(transaction: Transaction): TransactionRecordV1 {
  const t = TransactionSchema.parse(transaction);
  return {
    transactionDate: t.transactionDate,
    postDate: t.postDate,
    payee: t.payee,
    credit: t.credit ?? null,
    debit: t.debit ?? null,
    balance: t.balance ?? null,
    note: t.note,
  };
}

export function toStatementResult(
  result: StatementParseResult,
  source: { fileName: string },
  parsedAt: Date = new Date()
): StatementResultV1 {
  const { reconciliation, variant } = result;

  return {
    schemaVersion: 'v1',
    source: {
      fileName: source.fileName,
      pageCount: result.pageCount,
    },
    statement: {
      variant: variant.id,
      institution: variant.institution,
      accountKind: variant.accountKind,
      fiscalYear: result.fiscalYear,
      reconciliation: {
        shape: reconciliation.shape,
        ...(reconciliation.sign !== undefined && { signConvention: reconciliation.sign }),
        ...(reconciliation.openingBalance !== undefined && { openingBalance: reconciliation.openingBalance }),
        ...(reconciliation.closingBalance !== undefined && { closingBalance: reconciliation.closingBalance }),
        totalCredits: reconciliation.totalCredits,
        totalDebits: reconciliation.totalDebits,
        checks: reconciliation.checks.map((c) => ({ ...c })),
      },
      transactionCount: result.transactions.length,
      transactions: result.transactions.map(toTransactionRecord),
    },
    metadata: {
      parser: { name: PARSER_NAME, version: PARSER_VERSION },
      parsedAt: parsedAt.toISOString(),
      warnings: result.warnings,
    },
  };
}
