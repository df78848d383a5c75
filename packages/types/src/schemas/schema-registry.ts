/**
 * JSON Schema registry for result documents. Schemas live as JSON files in
 * `packages/types/schemas/` and are compiled with ajv on first use.
 */
import Ajv from 'ajv';
import ajvFormats from 'ajv-formats';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const SCHEMA_FILES = {
  v1: 'statement-result.v1.schema.json',
} as const;

export type SchemaVersion = keyof typeof SCHEMA_FILES;

export const AVAILABLE_SCHEMA_VERSIONS: readonly SchemaVersion[] = ['v1'];
export const DEFAULT_SCHEMA_VERSION: SchemaVersion = 'v1';

export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

interface CompiledSchema {
  (data: unknown): boolean;
  errors?: Array<{ instancePath: string; message?: string; keyword: string }> | null;
}

interface SchemaCompiler {
  compile(schema: object): CompiledSchema;
}

// ajv and ajv-formats are CommonJS; under ESM the callable may sit on `.default`
function interopDefault<T>(mod: unknown): T {
  const withDefault = mod as { default?: unknown };
  return (withDefault.default ?? mod) as T;
}

const AjvConstructor = interopDefault<new (opts: object) => SchemaCompiler>(Ajv);
const addFormats = interopDefault<(ajv: SchemaCompiler) => unknown>(ajvFormats);

const schemas = new Map<SchemaVersion, object>();
const validators = new Map<SchemaVersion, CompiledSchema>();

function unknownVersion(version: string): Error {
  return new Error(`Invalid schema version: "${version}". Available versions: ${AVAILABLE_SCHEMA_VERSIONS.join(', ')}`);
}

export function isValidSchemaVersion(version: string): version is SchemaVersion {
  return AVAILABLE_SCHEMA_VERSIONS.some((v) => v === version);
}

export function assertValidSchemaVersion(version: string): asserts version is SchemaVersion {
  if (!isValidSchemaVersion(version)) {
    throw unknownVersion(version);
  }
}

export function getSchemaPath(version: SchemaVersion): string {
  return fileURLToPath(new URL(`../../schemas/${SCHEMA_FILES[version]}`, import.meta.url));
}

export function getSchema(version: SchemaVersion): object {
  assertValidSchemaVersion(version);
  let schema = schemas.get(version);
  if (schema === undefined) {
    schema = JSON.parse(readFileSync(getSchemaPath(version), 'utf-8')) as object;
    schemas.set(version, schema);
  }
  return schema;
}

function validatorFor(version: SchemaVersion): CompiledSchema {
  let validate = validators.get(version);
  if (validate === undefined) {
    const ajv = new AjvConstructor({ allErrors: true, strict: false });
    addFormats(ajv);
    validate = ajv.compile(getSchema(version));
    validators.set(version, validate);
  }
  return validate;
}

/**
 * Validate a result document against one schema version.
 */
export function validateOutput(version: SchemaVersion, payload: unknown): ValidationResult {
  assertValidSchemaVersion(version);
  const validate = validatorFor(version);
  if (validate(payload)) {
    return { valid: true, errors: [] };
  }
  return {
    valid: false,
    errors: (validate.errors ?? []).map((err) => ({
      path: err.instancePath || '/',
      message: err.message ?? 'Unknown validation error',
      keyword: err.keyword,
    })),
  };
}

export function validateOutputOrThrow(version: SchemaVersion, payload: unknown): void {
  const { valid, errors } = validateOutput(version, payload);
  if (!valid) {
    const details = errors.map((e) => `  ${e.path}: ${e.message} (${e.keyword})`).join('\n');
    throw new Error(`Schema validation failed for version "${version}":\n${details}`);
  }
}

/**
 * Schema version to write: the flag if given, then LEDGERSCAN_SCHEMA_VERSION,
 * then the default.
 */
export function resolveSchemaVersion(flag?: string, env: NodeJS.ProcessEnv = process.env): SchemaVersion {
  const requested = flag || env['LEDGERSCAN_SCHEMA_VERSION'] || DEFAULT_SCHEMA_VERSION;
  assertValidSchemaVersion(requested);
  return requested;
}
