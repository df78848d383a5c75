import { z } from 'zod';
import { OutputFormatSchema, VariantIdSchema } from '@ledgerscan/types';

/** Boolean environment variable; only "true" and "1" count as set. */
export const envBool = (key: string, defaultVal: boolean, env: NodeJS.ProcessEnv = process.env): boolean => {
  const val = env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

export const CliOptionsSchema = z
  .object({
    inputDir: z.string().min(1).optional(),
    recursive: z.boolean().default(false),
    out: z.string().min(1).optional(),
    format: OutputFormatSchema.default('json'),
    variant: VariantIdSchema.optional(),
    schemaVersion: z.string().optional(),
    verbose: z.boolean().default(false),
    pretty: z.boolean().default(true),
  })
  .strict();

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/** Raw option values as commander hands them over. */
export type RawCliOptions = Record<string, unknown>;

export interface EnvDefaults {
  inputDir: string | undefined;
  out: string | undefined;
  format: string;
  variant: string | undefined;
  schemaVersion: string | undefined;
  verbose: boolean;
  pretty: boolean;
  recursive: boolean;
}

/**
 * Environment defaults for every flag. Flags given on the command line
 * override these.
 */
export function envDefaults(env: NodeJS.ProcessEnv = process.env): EnvDefaults {
  return {
    inputDir: env['LEDGERSCAN_INPUT_DIR'] || undefined,
    out: env['LEDGERSCAN_OUT'] || undefined,
    format: env['LEDGERSCAN_FORMAT'] || 'json',
    variant: env['LEDGERSCAN_VARIANT'] || undefined,
    schemaVersion: env['LEDGERSCAN_SCHEMA_VERSION'] || undefined,
    verbose: envBool('LEDGERSCAN_VERBOSE', false, env),
    pretty: envBool('LEDGERSCAN_PRETTY', true, env),
    recursive: envBool('LEDGERSCAN_RECURSIVE', false, env),
  };
}

/**
 * Validate merged options, reporting every problem at once.
 */
export function resolveCliOptions(raw: RawCliOptions): CliOptions {
  const parsed = CliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `  - ${issue.path.join('.') || '(options)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid options:\n${details}`);
  }
  return parsed.data;
}
