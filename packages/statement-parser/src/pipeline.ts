import { openPdfDocument } from '@ledgerscan/pdf-extract';
import {
  EventLog,
  UnrecognizedDocumentError,
  type DiagnosticEvent,
  type LayoutOptions,
  type PageSource,
  type VariantId,
} from '@ledgerscan/types';
import { detectVariant } from './detector.js';
import { StatementParser, type ParsedStatement } from './statement-parser.js';
import type { StatementVariant } from './types.js';
import { getVariant } from './variants/index.js';

/** Tight joining so marker phrases render as contiguous words. */
export const DETECTION_LAYOUT: LayoutOptions = { xTolerance: 1 };

export interface ParseOptions {
  /** Skip detection and use this layout */
  variant?: VariantId;
  /** Called with each diagnostic event as it is recorded */
  onEvent?: (event: DiagnosticEvent) => void;
}

export interface StatementParseResult extends ParsedStatement {
  pageCount: number;
  events: DiagnosticEvent[];
  warnings: string[];
}

/**
 * Detect the layout from page 1, read its metadata, then scan pages in
 * order until the document ends and reconcile.
 */
export function parseStatement(pages: readonly PageSource[], options: ParseOptions = {}): StatementParseResult {
  const log = new EventLog(options.onEvent);

  const firstPage = pages[0];
  if (firstPage === undefined) {
    throw new UnrecognizedDocumentError('');
  }

  let variant: StatementVariant | undefined;
  if (options.variant !== undefined) {
    variant = getVariant(options.variant);
  } else {
    const firstPageText = firstPage.extractText(DETECTION_LAYOUT);
    variant = detectVariant(firstPageText);
    if (variant === undefined) {
      throw new UnrecognizedDocumentError(firstPageText);
    }
  }
  log.record({ type: 'variant-detected', variant: variant.id });

  const parser = new StatementParser(variant, log);
  for (const page of pages) {
    if (parser.done) break;
    const text = page.extractText(variant.layout);
    if (page === firstPage) {
      parser.readFirstPage(text);
    }
    parser.scanPage(page.pageNumber, text);
  }

  return {
    ...parser.finish(),
    pageCount: pages.length,
    events: log.events,
    warnings: log.warnings(),
  };
}

export async function parseStatementFile(filePath: string, options: ParseOptions = {}): Promise<StatementParseResult> {
  const document = await openPdfDocument(filePath);
  return parseStatement(document.pages, options);
}
