#!/usr/bin/env -S node --import tsx
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { mkdir, writeFile } from 'node:fs/promises';
import { basename, dirname, resolve } from 'node:path';
import {
  formatReconciliationResult,
  parseStatementFile,
  processBatch,
  scanDirectoryForPdfs,
  validateDirectory,
  type ParseError,
} from '@ledgerscan/statement-parser';
import { exportCsv, exportCsvBySource, formatTransactionTable, toStatementResult } from '@ledgerscan/output';
import {
  AVAILABLE_SCHEMA_VERSIONS,
  PARSER_VERSION,
  UnrecognizedDocumentError,
  describeEvent,
  levelOf,
  resolveSchemaVersion,
  validateOutputOrThrow,
  type DiagnosticEvent,
} from '@ledgerscan/types';
import { envDefaults, resolveCliOptions, type CliOptions } from './config.js';

const program = new Command();
const defaults = envDefaults();

/**
 * Print a diagnostic event to stderr. Without --verbose only warnings are shown.
 */
function logEvent(event: DiagnosticEvent, verbose: boolean): void {
  const level = levelOf(event);
  if (level !== 'warn' && !verbose) return;
  console.error(`[${level.toUpperCase()}] ${describeEvent(event)}`);
}

async function writeOutput(content: string, out: string | undefined, verbose: boolean): Promise<void> {
  if (out === undefined) {
    process.stdout.write(content.endsWith('\n') ? content : `${content}\n`);
    return;
  }
  const outPath = resolve(out);
  await mkdir(dirname(outPath), { recursive: true });
  await writeFile(outPath, content, 'utf-8');
  if (verbose) {
    console.error(`[INFO] Output written to: ${outPath}`);
  }
}

function renderJson(payload: unknown, pretty: boolean): string {
  return pretty ? JSON.stringify(payload, null, 2) : JSON.stringify(payload);
}

/**
 * Parse one statement PDF
 */
async function processSingleFile(pdfFile: string, options: CliOptions): Promise<void> {
  const filePath = resolve(pdfFile);
  const schemaVersion = resolveSchemaVersion(options.schemaVersion);

  if (options.verbose) {
    console.error(`[INFO] Parsing: ${filePath}`);
    console.error(`[INFO] Parser version: ${PARSER_VERSION}`);
    console.error(`[INFO] Schema version: ${schemaVersion}`);
  }

  const result = await parseStatementFile(filePath, {
    ...(options.variant !== undefined && { variant: options.variant }),
    onEvent: (event) => logEvent(event, options.verbose),
  });

  if (options.verbose) {
    console.error(`[INFO] Found ${result.transactions.length} transactions`);
    console.error(formatReconciliationResult(result.reconciliation));
  }

  switch (options.format) {
    case 'csv':
      await writeOutput(exportCsv(result.transactions), options.out, options.verbose);
      break;
    case 'table':
      await writeOutput(formatTransactionTable(result.transactions), options.out, options.verbose);
      break;
    case 'json': {
      const document = toStatementResult(result, { fileName: basename(filePath) });
      validateOutputOrThrow(schemaVersion, document);
      await writeOutput(renderJson(document, options.pretty), options.out, options.verbose);
      break;
    }
  }
}

/**
 * Parse every statement PDF in a directory
 */
async function processDirectory(inputDir: string, options: CliOptions): Promise<void> {
  const dirPath = resolve(inputDir);
  const schemaVersion = resolveSchemaVersion(options.schemaVersion);

  if (options.verbose) {
    console.error(`[INFO] Batch mode: scanning directory`);
    console.error(`[INFO] Directory: ${dirPath}`);
    console.error(`[INFO] Parser version: ${PARSER_VERSION}`);
  }

  const validation = await validateDirectory(dirPath);
  if (!validation.valid) {
    throw new Error(validation.error ?? `Cannot access directory: ${dirPath}`);
  }

  const scanResult = await scanDirectoryForPdfs(dirPath, { recursive: options.recursive });
  for (const skip of scanResult.skipped) {
    console.error(`[WARN] Skipped ${skip.fileName}: ${skip.reason}`);
  }
  if (scanResult.files.length === 0) {
    throw new Error(`No PDF files found in directory: ${dirPath}`);
  }

  const result = await processBatch(scanResult.files, {
    ...(options.variant !== undefined && { variant: options.variant }),
    onEvent: (event) => logEvent(event, options.verbose),
    onProgress: (current, total, filename) => {
      console.error(`[INFO] Parsing ${current}/${total}: ${filename}`);
    },
    onError: (error: ParseError) => {
      console.error(`[ERROR] Failed to parse ${error.filename}: ${error.error}`);
    },
  });

  console.error('');
  console.error('=== Batch Processing Summary ===');
  console.error(`Total PDFs found:   ${result.summary.totalPdfsFound}`);
  console.error(`PDFs succeeded:     ${result.summary.pdfsSucceeded}`);
  console.error(`PDFs failed:        ${result.summary.pdfsFailed}`);
  console.error(`Transactions:       ${result.totalTransactions}`);
  console.error('================================');

  switch (options.format) {
    case 'csv':
      await writeOutput(
        exportCsvBySource(result.parsed.map((p) => ({ fileName: p.file.fileName, transactions: p.result.transactions }))),
        options.out,
        options.verbose
      );
      break;
    case 'table':
      await writeOutput(
        result.parsed.map((p) => `${p.file.fileName}\n${formatTransactionTable(p.result.transactions)}`).join('\n\n'),
        options.out,
        options.verbose
      );
      break;
    case 'json': {
      const documents = result.parsed.map((p) => toStatementResult(p.result, { fileName: p.file.fileName }));
      for (const document of documents) {
        validateOutputOrThrow(schemaVersion, document);
      }
      await writeOutput(
        renderJson({ statements: documents, parseErrors: result.parseErrors.map(({ stack: _stack, ...rest }) => rest) }, options.pretty),
        options.out,
        options.verbose
      );
      break;
    }
  }

  if (result.summary.pdfsFailed > 0) {
    process.exitCode = 1;
  }
}

program
  .name('ledgerscan')
  .description('Parse bank and credit-card statement PDFs into reconciled transaction lists')
  .version(PARSER_VERSION)
  .argument('[pdf-file]', 'Path to the statement PDF')
  .option('-d, --inputDir <directory>', 'Directory containing multiple PDF files to process', defaults.inputDir)
  .option('-r, --recursive', 'Include PDFs in subdirectories of --inputDir', defaults.recursive)
  .option('-o, --out <file>', 'Output file path (default: stdout)', defaults.out)
  .option('-f, --format <format>', 'Output format (json, csv, table)', defaults.format)
  .option('--variant <id>', 'Skip layout detection and parse with this layout', defaults.variant)
  .option(
    '--schema-version <version>',
    `Output schema version (${AVAILABLE_SCHEMA_VERSIONS.join(', ')})`,
    defaults.schemaVersion
  )
  .option('-v, --verbose', 'Enable verbose output', defaults.verbose)
  .option('--pretty', 'Pretty-print JSON output', defaults.pretty)
  .option('--no-pretty', 'Disable pretty-printing')
  .action(async (pdfFile: string | undefined, rawOptions: Record<string, unknown>) => {
    const verbose = rawOptions['verbose'] === true;
    try {
      const options = resolveCliOptions(rawOptions);

      if (options.inputDir !== undefined) {
        await processDirectory(options.inputDir, options);
      } else if (pdfFile !== undefined) {
        await processSingleFile(pdfFile, options);
      } else {
        console.error('[ERROR] Either a PDF file or --inputDir must be specified');
        process.exit(1);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ERROR] ${message}`);
      if (error instanceof UnrecognizedDocumentError) {
        console.error('[ERROR] First page text:');
        console.error(error.firstPageText);
      }
      if (verbose && error instanceof Error && error.stack !== undefined) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

await program.parseAsync();
