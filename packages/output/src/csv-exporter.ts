/**
 * CSV Exporter Module
 *
 * Converts parsed transactions to CSV for spreadsheet import.
 */

import type { Transaction } from '@ledgerscan/types';

/**
 * Options for CSV export
 */
export interface CsvExportOptions {
  /** Include header row (default: true) */
  includeHeader?: boolean;
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Include the running balance column (default: true) */
  includeBalance?: boolean;
  /** Include the note column (default: true) */
  includeNote?: boolean;
  /** Date format: 'iso' (YYYY-MM-DD) or 'us' (MM/DD/YYYY) (default: 'iso') */
  dateFormat?: 'iso' | 'us';
}

export interface CsvSource {
  fileName: string;
  transactions: readonly Transaction[];
}

const BASE_COLUMNS = ['Transaction Date', 'Post Date', 'Payee', 'Credit', 'Debit'] as const;

/**
 * Escape a value for CSV (handles quotes and delimiters)
 */
export function escapeCsvValue(value: string | number | undefined, delimiter: string): string {
  if (value === undefined) {
    return '';
  }

  const str = String(value);
  const needsQuoting = str.includes(delimiter) ||
                       str.includes('"') ||
                       str.includes('\n') ||
                       str.includes('\r');

  if (needsQuoting) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

function formatDate(isoDate: string, format: 'iso' | 'us'): string {
  if (format === 'us') {
    const parts = isoDate.split('-');
    if (parts.length === 3) {
      return `${parts[1]}/${parts[2]}/${parts[0]}`;
    }
  }
  return isoDate;
}

/**
 * Minor units as a plain decimal ("1234.56", "-0.05"); no grouping so
 * spreadsheets read it as a number.
 */
function formatAmount(minorUnits: number | undefined): string {
  if (minorUnits === undefined) {
    return '';
  }
  const sign = minorUnits < 0 ? '-' : '';
  const abs = Math.abs(minorUnits);
  return `${sign}${Math.floor(abs / 100)}.${(abs % 100).toString().padStart(2, '0')}`;
}

function resolveOptions(options: CsvExportOptions): Required<CsvExportOptions> {
  return {
    includeHeader: options.includeHeader ?? true,
    delimiter: options.delimiter ?? ',',
    includeBalance: options.includeBalance ?? true,
    includeNote: options.includeNote ?? true,
    dateFormat: options.dateFormat ?? 'iso',
  };
}

function buildHeaderRow(options: Required<CsvExportOptions>, withSource: boolean): string[] {
  const headers: string[] = withSource ? ['Source'] : [];
  headers.push(...BASE_COLUMNS);
  if (options.includeBalance) headers.push('Balance');
  if (options.includeNote) headers.push('Note');
  return headers;
}

function buildDataRow(txn: Transaction, options: Required<CsvExportOptions>, source?: string): string[] {
  const row: string[] = source !== undefined ? [source] : [];
  row.push(
    formatDate(txn.transactionDate, options.dateFormat),
    formatDate(txn.postDate, options.dateFormat),
    txn.payee,
    formatAmount(txn.credit),
    formatAmount(txn.debit),
  );
  if (options.includeBalance) row.push(formatAmount(txn.balance));
  if (options.includeNote) row.push(txn.note);
  return row;
}

function rowToCsvLine(row: string[], delimiter: string): string {
  return row.map((value) => escapeCsvValue(value, delimiter)).join(delimiter);
}

/**
 * Export transactions to CSV text, in statement order.
 */
export function exportCsv(transactions: readonly Transaction[], options: CsvExportOptions = {}): string {
  const opts = resolveOptions(options);
  const lines: string[] = [];

  if (opts.includeHeader) {
    lines.push(rowToCsvLine(buildHeaderRow(opts, false), opts.delimiter));
  }
  for (const txn of transactions) {
    lines.push(rowToCsvLine(buildDataRow(txn, opts), opts.delimiter));
  }

  return lines.join('\n') + '\n';
}

/**
 * Export several statements into one CSV with a leading Source column.
 */
export function exportCsvBySource(sources: readonly CsvSource[], options: CsvExportOptions = {}): string {
  const opts = resolveOptions(options);
  const lines: string[] = [];

  if (opts.includeHeader) {
    lines.push(rowToCsvLine(buildHeaderRow(opts, true), opts.delimiter));
  }
  for (const source of sources) {
    for (const txn of source.transactions) {
      lines.push(rowToCsvLine(buildDataRow(txn, opts, source.fileName), opts.delimiter));
    }
  }

  return lines.join('\n') + '\n';
}
