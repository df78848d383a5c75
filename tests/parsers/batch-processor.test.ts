import { describe, it, expect } from 'vitest';
import { processBatch, type ParseError, type PdfFileInfo } from '@ledgerscan/statement-parser';
import { textPages, type PageSource } from '@ledgerscan/types';
import { bmoChequingPages, rbcVisaPages } from '../helpers/statements.js';

function file(fileName: string): PdfFileInfo {
  return { filePath: `/statements/${fileName}`, fileName, sizeBytes: 1024, modifiedAt: new Date(0) };
}

const sources: Record<string, string[]> = {
  '/statements/chequing.pdf': bmoChequingPages(),
  '/statements/newsletter.pdf': ['Nothing to see here'],
  '/statements/visa.pdf': rbcVisaPages(),
};

async function loadPages(filePath: string): Promise<readonly PageSource[]> {
  const texts = sources[filePath];
  if (texts === undefined) {
    throw new Error(`Cannot read ${filePath}`);
  }
  return textPages(texts);
}

describe('processBatch', () => {
  const files = ['chequing.pdf', 'newsletter.pdf', 'missing.pdf', 'visa.pdf'].map(file);

  it('should parse each file and carry on past failures', async () => {
    const result = await processBatch(files, { loadPages });

    expect(result.parsed.map((p) => [p.file.fileName, p.result.variant.id])).toEqual([
      ['chequing.pdf', 'bmo-chequing'],
      ['visa.pdf', 'rbc-visa'],
    ]);
    expect(result.totalTransactions).toBe(5);
    expect(result.summary).toEqual({ totalPdfsFound: 4, pdfsSucceeded: 2, pdfsFailed: 2 });
  });

  it('should keep the error code of statement errors', async () => {
    const result = await processBatch(files, { loadPages });

    expect(result.parseErrors.map((e) => [e.filename, e.code, e.error])).toEqual([
      ['newsletter.pdf', 'UNRECOGNIZED_DOCUMENT', 'Unrecognized statement: no known layout matched the first page'],
      ['missing.pdf', undefined, 'Cannot read /statements/missing.pdf'],
    ]);
  });

  it('should report progress and errors through callbacks', async () => {
    const progress: Array<[number, number, string]> = [];
    const errors: ParseError[] = [];

    await processBatch(files, {
      loadPages,
      onProgress: (current, total, filename) => progress.push([current, total, filename]),
      onError: (error) => errors.push(error),
    });

    expect(progress).toEqual([
      [1, 4, 'chequing.pdf'],
      [2, 4, 'newsletter.pdf'],
      [3, 4, 'missing.pdf'],
      [4, 4, 'visa.pdf'],
    ]);
    expect(errors.map((e) => e.filePath)).toEqual(['/statements/newsletter.pdf', '/statements/missing.pdf']);
  });

  it('should pass parse options through to every file', async () => {
    const result = await processBatch([file('chequing.pdf')], { loadPages, variant: 'rbc-visa' });

    expect(result.parsed).toEqual([]);
    expect(result.parseErrors[0]?.code).toBe('MISSING_METADATA');
  });
});
