export {
  TransactionSchema,
  VariantIdSchema,
  OutputFormatSchema,
} from './transaction.js';

export type { TransactionRecord, VariantId, OutputFormat } from './transaction.js';

export {
  getSchemaPath,
  getSchema,
  isValidSchemaVersion,
  assertValidSchemaVersion,
  validateOutput,
  validateOutputOrThrow,
  resolveSchemaVersion,
  AVAILABLE_SCHEMA_VERSIONS,
  DEFAULT_SCHEMA_VERSION,
} from './schema-registry.js';

export type { SchemaVersion, ValidationResult, ValidationError } from './schema-registry.js';
