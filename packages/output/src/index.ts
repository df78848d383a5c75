/**
 * Output module - handles conversion of parsed statements to output formats.
 */

export {
  toStatementResult,
  toTransactionRecord,
  type StatementResultV1,
  type TransactionRecordV1,
} from './result-document.js';

export {
  exportCsv,
  exportCsvBySource,
  escapeCsvValue,
  type CsvExportOptions,
  type CsvSource,
} from './csv-exporter.js';

export { formatTransactionTable } from './transaction-table.js';
