import { z } from 'zod';

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format');
const MinorUnitsSchema = z.number().int().nonnegative();

export const TransactionSchema = z
  .object({
    transactionDate: IsoDateSchema,
    postDate: IsoDateSchema,
    payee: z.string(),
    credit: MinorUnitsSchema.optional(),
    debit: MinorUnitsSchema.optional(),
    balance: z.number().int().optional(),
    note: z.string(),
  })
  .refine((t) => (t.credit === undefined) !== (t.debit === undefined), {
    message: 'Exactly one of credit or debit must be set',
  });
export type TransactionRecord = z.infer<typeof TransactionSchema>;

export const VariantIdSchema = z.enum([
  'bmo-chequing',
  'bmo-mastercard',
  'bmo-mastercard-legacy',
  'rbc-chequing',
  'rbc-visa',
]);
export type VariantId = z.infer<typeof VariantIdSchema>;

export const OutputFormatSchema = z.enum(['json', 'csv', 'table']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
