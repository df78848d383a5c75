import {
  FieldFormatError,
  PendingTransactionError,
  signedAmount,
  type DiagnosticSink,
  type Transaction,
} from '@ledgerscan/types';
import type { LineResult, PendingTransaction, StatementState, StatementVariant } from './types.js';

export type ScanState = 'SEEKING_TABLE_START' | 'IN_TABLE' | 'DONE';

export interface PageScanResult {
  transactions: Transaction[];
  /** Table state the page finished in; DONE means no further pages are read */
  endState: ScanState;
  tableFound: boolean;
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Scan one rendered page for transaction rows.
 *
 * Lines up to and including the table header are discarded. Inside the
 * table every line is checked for the document end, then the page end, then
 * handed to the variant. A description still waiting for its amount when the
 * page runs out is an error.
 */
export function scanPage(
  variant: StatementVariant,
  state: StatementState,
  page: { pageNumber: number; text: string },
  sink: DiagnosticSink,
  startState: Exclude<ScanState, 'DONE'> = 'SEEKING_TABLE_START',
): PageScanResult {
  const lines = splitLines(page.text);
  const transactions: Transaction[] = [];
  let scan: ScanState = startState;
  let tableFound = startState === 'IN_TABLE';
  let pending: PendingTransaction | undefined;

  for (let index = 0; index < lines.length && scan !== 'DONE'; index++) {
    const line = lines[index];
    if (line === undefined) continue;
    const lineNumber = index + 1;

    if (scan === 'SEEKING_TABLE_START') {
      if (variant.headerPattern.test(line)) {
        scan = 'IN_TABLE';
        tableFound = true;
        sink.record({ type: 'table-started', page: page.pageNumber, line: lineNumber });
      }
      continue;
    }

    if (variant.isDocumentEnd(line)) {
      sink.record({ type: 'document-stopped', page: page.pageNumber, line: lineNumber });
      scan = 'DONE';
      break;
    }
    if (variant.isPageEnd(line)) {
      sink.record({ type: 'page-stopped', page: page.pageNumber, line: lineNumber });
      break;
    }

    const following = lines[index + 1];
    const next =
      following === undefined || variant.isPageEnd(following) || variant.isDocumentEnd(following)
        ? undefined
        : following;

    let result: LineResult;
    try {
      result = variant.readLine({ line, previous: lines[index - 1], next, pending, page: page.pageNumber, lineNumber }, state);
    } catch (error) {
      if (error instanceof FieldFormatError && variant.malformedLines === 'skip') {
        sink.record({ type: 'line-skipped', page: page.pageNumber, line: lineNumber, reason: error.message, text: line });
        continue;
      }
      throw error;
    }

    switch (result.kind) {
      case 'transaction':
        pending = undefined;
        transactions.push(result.transaction);
        state.lastTransactionDate = result.transaction.transactionDate;
        sink.record({
          type: 'transaction-parsed',
          page: page.pageNumber,
          line: lineNumber,
          payee: result.transaction.payee,
          amount: signedAmount(result.transaction),
        });
        break;
      case 'pending':
        pending = result.pending;
        break;
      case 'ignored':
        sink.record({ type: 'line-ignored', page: page.pageNumber, line: lineNumber, reason: result.reason });
        break;
    }
  }

  if (!tableFound) {
    sink.record({ type: 'table-not-found', page: page.pageNumber });
  }
  if (pending !== undefined) {
    throw new PendingTransactionError(
      `Transaction "${pending.descriptionParts.join(' ')}" from page ${pending.page} line ${pending.line} ` +
        `has no amount by the end of page ${page.pageNumber}`,
    );
  }

  return { transactions, endState: scan, tableFound };
}
