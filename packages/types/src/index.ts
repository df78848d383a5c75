// Transaction model and invariant
export { createTransaction, signedAmount } from './transaction.js';
export type { Transaction, TransactionInput } from './transaction.js';

// Error taxonomy
export {
  StatementError,
  UnrecognizedDocumentError,
  MissingMetadataError,
  TransactionInvariantError,
  ReconciliationError,
  MissingFollowUpError,
  PendingTransactionError,
  FieldFormatError,
  isStatementError,
} from './errors.js';
export type { StatementErrorCode } from './errors.js';

// Diagnostics
export { EventLog, levelOf, describeEvent } from './diagnostics.js';
export type { DiagnosticEvent, DiagnosticLevel, DiagnosticSink } from './diagnostics.js';

// Page text contract
export { textPages } from './layout.js';
export type { LayoutOptions, CropRegion, PageSource } from './layout.js';

// Zod schemas + JSON schema registry
export * from './schemas/index.js';

// Pure utils (date, money, text, constants)
export * from './utils/index.js';
