// Engine
export { parseStatement, parseStatementFile, DETECTION_LAYOUT } from './pipeline.js';
export type { ParseOptions, StatementParseResult } from './pipeline.js';
export { StatementParser } from './statement-parser.js';
export type { ParsedStatement } from './statement-parser.js';
export { scanPage, splitLines } from './scanner.js';
export type { ScanState, PageScanResult } from './scanner.js';
export { detectVariant } from './detector.js';

// Variants
export {
  VARIANTS_BY_PRIORITY,
  getVariant,
  bmoChequing,
  bmoMastercard,
  bmoMastercardLegacy,
  rbcChequing,
  rbcVisa,
} from './variants/index.js';
export type {
  StatementVariant,
  StatementState,
  ColumnRange,
  LineContext,
  LineResult,
  PendingTransaction,
  ReconciliationShape,
  BalanceSign,
  AmountConvention,
  MetadataField,
} from './types.js';

// Line classification
export { hasAllMarkers, isBoilerplate, isWrappedDescription } from './line-classifier.js';

// Reconciliation
export {
  calculateTotals,
  expectedClosingBalance,
  reconcileRunningBalance,
  reconcileBalanceDelta,
  reconcileStatement,
  formatReconciliationResult,
} from './reconciliation.js';
export type { ReconciliationCheck, ReconciliationResult } from './reconciliation.js';

// Batch processing
export { processBatch } from './batch-processor.js';
export type { ParseError, ParsedFile, BatchProcessResult, BatchProcessOptions } from './batch-processor.js';
export { scanDirectoryForPdfs, validateDirectory } from './directory-scanner.js';
export type { PdfFileInfo, ScanResult, ScanOptions } from './directory-scanner.js';
