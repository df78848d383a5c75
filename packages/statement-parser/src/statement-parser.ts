import { MissingMetadataError, type DiagnosticSink, type Transaction } from '@ledgerscan/types';
import { reconcileStatement, type ReconciliationResult } from './reconciliation.js';
import { scanPage, splitLines, type ScanState } from './scanner.js';
import { METADATA_FIELDS, type StatementState, type StatementVariant } from './types.js';

export interface ParsedStatement {
  variant: StatementVariant;
  fiscalYear: number;
  transactions: Transaction[];
  reconciliation: ReconciliationResult;
}

/**
 * Parses one document with one variant. Holds the state carried between
 * pages (year, declared totals, last date, table position), so a new
 * instance is needed per document.
 */
export class StatementParser {
  readonly variant: StatementVariant;
  private readonly sink: DiagnosticSink;
  private readonly state: StatementState = {};
  private readonly transactions: Transaction[] = [];
  private scan: ScanState = 'SEEKING_TABLE_START';
  private metadataRead = false;

  constructor(variant: StatementVariant, sink: DiagnosticSink) {
    this.variant = variant;
    this.sink = sink;
  }

  get done(): boolean {
    return this.scan === 'DONE';
  }

  /**
   * Read statement-level values from the first page. Throws
   * MissingMetadataError before any row is scanned if a required one is absent.
   */
  readFirstPage(text: string): void {
    this.variant.readFirstPage(splitLines(text), this.state);
    this.metadataRead = true;

    for (const field of METADATA_FIELDS) {
      const value = this.state[field];
      if (value !== undefined) {
        this.sink.record({ type: 'metadata-resolved', field, value });
      }
    }
    for (const field of this.variant.requiredMetadata) {
      if (this.state[field] === undefined) {
        throw new MissingMetadataError(field, `not found on page 1 of a ${this.variant.id} statement`);
      }
    }
  }

  scanPage(pageNumber: number, text: string): Transaction[] {
    if (!this.metadataRead) {
      throw new Error('readFirstPage must be called before scanning pages');
    }
    if (this.done) {
      return [];
    }

    this.sink.record({ type: 'page-started', page: pageNumber });
    const startState = this.scan === 'IN_TABLE' && this.variant.continuesAcrossPages ? 'IN_TABLE' : 'SEEKING_TABLE_START';
    const result = scanPage(this.variant, this.state, { pageNumber, text }, this.sink, startState);

    this.transactions.push(...result.transactions);
    if (result.endState === 'DONE') {
      this.scan = 'DONE';
    } else if (result.tableFound) {
      this.scan = 'IN_TABLE';
    }
    return result.transactions;
  }

  finish(): ParsedStatement {
    const { fiscalYear } = this.state;
    if (fiscalYear === undefined) {
      throw new MissingMetadataError('fiscalYear');
    }
    const reconciliation = reconcileStatement(this.variant.reconciliation, this.state, this.transactions, this.sink);
    return {
      variant: this.variant,
      fiscalYear,
      transactions: [...this.transactions],
      reconciliation,
    };
  }
}
