import type { LayoutOptions, Transaction, VariantId } from '@ledgerscan/types';

/**
 * Half-open character range `[start, end)` of a fixed-width column.
 * An omitted end runs to the end of the line.
 */
export interface ColumnRange {
  readonly start: number;
  readonly end?: number;
}

/** How parsed totals are checked against what the statement declares. */
export type BalanceSign = 'credit-increases' | 'credit-decreases';

export type ReconciliationShape =
  | { readonly kind: 'running-balance' }
  | { readonly kind: 'balance-delta'; readonly sign: BalanceSign };

/**
 * How a single signed amount column maps onto credit/debit.
 * Chequing layouts have one column per direction and use 'by-column'.
 */
export type AmountConvention = 'by-column' | 'cr-marks-debit' | 'negative-marks-credit';

/**
 * Values read from the first page, plus the running date context some
 * layouts need. Mutated in place by the variant while a document is parsed.
 */
export interface StatementState {
  fiscalYear?: number;
  /** Month (1..12) the statement period closes in; enables year rollover */
  periodEndMonth?: number;
  openingBalance?: number;
  closingBalance?: number;
  declaredCredits?: number;
  declaredDebits?: number;
  /** Most recently resolved transaction date, for rows that omit one */
  lastTransactionDate?: string;
}

export type MetadataField = 'fiscalYear' | 'openingBalance' | 'closingBalance' | 'declaredCredits' | 'declaredDebits';

export const METADATA_FIELDS: readonly MetadataField[] = [
  'fiscalYear',
  'openingBalance',
  'closingBalance',
  'declaredCredits',
  'declaredDebits',
];

/** A transaction whose description has started but whose amount has not been seen. */
export interface PendingTransaction {
  readonly transactionDate: string;
  readonly postDate: string;
  readonly descriptionParts: readonly string[];
  readonly page: number;
  readonly line: number;
}

export interface LineContext {
  readonly line: string;
  /** Preceding line on the page, undefined on the first line */
  readonly previous: string | undefined;
  /** Following line, unless it ends the page or the document */
  readonly next: string | undefined;
  readonly pending: PendingTransaction | undefined;
  readonly page: number;
  /** 1-based line number within the rendered page */
  readonly lineNumber: number;
}

export type LineResult =
  | { readonly kind: 'transaction'; readonly transaction: Transaction }
  | { readonly kind: 'pending'; readonly pending: PendingTransaction }
  | { readonly kind: 'ignored'; readonly reason: string };

export type LinePredicate = (line: string) => boolean;

export type Marker = string | RegExp;

/**
 * One supported statement layout. Everything layout-specific lives here;
 * detection, scanning and reconciliation are shared.
 */
export interface StatementVariant {
  readonly id: VariantId;
  readonly institution: string;
  readonly accountKind: 'chequing' | 'credit-card';
  /** All must appear in the first page text for the variant to match */
  readonly markers: readonly Marker[];
  readonly layout: LayoutOptions;
  readonly headerPattern: RegExp;
  /** Start of a transaction row, matched against the description column */
  readonly rowPattern: RegExp;
  readonly columns: Readonly<Record<string, ColumnRange>>;
  readonly amountConvention: AmountConvention;
  readonly reconciliation: ReconciliationShape;
  readonly requiredMetadata: readonly MetadataField[];
  /** Whether a FieldFormatError on a row skips the row or aborts the document */
  readonly malformedLines: 'skip' | 'fail';
  /** Later pages start inside the table instead of searching for a header */
  readonly continuesAcrossPages: boolean;
  readonly isPageEnd: LinePredicate;
  readonly isDocumentEnd: LinePredicate;
  readFirstPage(lines: readonly string[], state: StatementState): void;
  readLine(context: LineContext, state: StatementState): LineResult;
}
