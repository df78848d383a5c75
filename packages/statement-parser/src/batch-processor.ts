import { openPdfDocument } from '@ledgerscan/pdf-extract';
import { isStatementError, type PageSource } from '@ledgerscan/types';
import type { PdfFileInfo } from './directory-scanner.js';
import { parseStatement, type ParseOptions, type StatementParseResult } from './pipeline.js';

export interface ParseError {
  filename: string;
  filePath: string;
  /** StatementError code, or undefined for I/O and PDF failures */
  code: string | undefined;
  error: string;
  stack: string | undefined;
  timestamp: string;
}

export interface ParsedFile {
  file: PdfFileInfo;
  result: StatementParseResult;
}

export interface BatchProcessResult {
  parsed: ParsedFile[];
  totalTransactions: number;
  parseErrors: ParseError[];
  summary: {
    totalPdfsFound: number;
    pdfsSucceeded: number;
    pdfsFailed: number;
  };
}

export interface BatchProcessOptions extends ParseOptions {
  onProgress?: (current: number, total: number, filename: string) => void;
  onError?: (error: ParseError) => void;
  /** Page loader; defaults to reading the PDF from disk */
  loadPages?: (filePath: string) => Promise<readonly PageSource[]>;
}

async function loadPdfPages(filePath: string): Promise<readonly PageSource[]> {
  const document = await openPdfDocument(filePath);
  return document.pages;
}

/**
 * Parse several statements, one at a time and in the order given.
 *
 * Each file gets its own parser and event log. A file that fails is
 * recorded in parseErrors and the batch carries on.
 */
export async function processBatch(
  files: readonly PdfFileInfo[],
  options: BatchProcessOptions = {}
): Promise<BatchProcessResult> {
  const { onProgress, onError, loadPages = loadPdfPages, ...parseOptions } = options;
  const parsed: ParsedFile[] = [];
  const parseErrors: ParseError[] = [];

  for (let i = 0; i < files.length; i++) {
    const file = files[i];
    if (file === undefined) continue;

    onProgress?.(i + 1, files.length, file.fileName);

    try {
      const pages = await loadPages(file.filePath);
      parsed.push({ file, result: parseStatement(pages, parseOptions) });
    } catch (error) {
      const parseError = createParseError(file, error);
      parseErrors.push(parseError);
      onError?.(parseError);
    }
  }

  return {
    parsed,
    totalTransactions: parsed.reduce((sum, p) => sum + p.result.transactions.length, 0),
    parseErrors,
    summary: {
      totalPdfsFound: files.length,
      pdfsSucceeded: parsed.length,
      pdfsFailed: parseErrors.length,
    },
  };
}

function createParseError(file: PdfFileInfo, error: unknown): ParseError {
  return {
    filename: file.fileName,
    filePath: file.filePath,
    code: isStatementError(error) ? error.code : undefined,
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
    timestamp: new Date().toISOString(),
  };
}
