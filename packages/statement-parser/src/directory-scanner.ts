import { readdir, stat } from 'node:fs/promises';
import { extname, join, normalize } from 'node:path';

export interface PdfFileInfo {
  filePath: string;
  fileName: string;
  sizeBytes: number;
  modifiedAt: Date;
}

export interface ScanResult {
  files: PdfFileInfo[];
  skipped: Array<{ fileName: string; reason: string }>;
  directoryPath: string;
}

export interface ScanOptions {
  /** Descend into subdirectories (default: false) */
  recursive?: boolean;
}

/**
 * Find statement PDFs in a directory, skipping temporary and empty files.
 * Returns files sorted by path for a deterministic processing order.
 */
export async function scanDirectoryForPdfs(directoryPath: string, options: ScanOptions = {}): Promise<ScanResult> {
  const normalizedPath = normalize(directoryPath);
  const files: PdfFileInfo[] = [];
  const skipped: Array<{ fileName: string; reason: string }> = [];

  await collectPdfs(normalizedPath, options.recursive ?? false, files, skipped);
  files.sort((a, b) => a.filePath.localeCompare(b.filePath));

  return { files, skipped, directoryPath: normalizedPath };
}

async function collectPdfs(
  directory: string,
  recursive: boolean,
  files: PdfFileInfo[],
  skipped: Array<{ fileName: string; reason: string }>,
): Promise<void> {
  const entries = await readdir(directory, { withFileTypes: true });

  for (const entry of entries) {
    const fileName = entry.name;
    const filePath = join(directory, fileName);

    if (entry.isDirectory()) {
      if (recursive) {
        await collectPdfs(filePath, recursive, files, skipped);
      }
      continue;
    }
    if (extname(fileName).toLowerCase() !== '.pdf') {
      continue;
    }

    // Office lock files and hidden files
    if (fileName.startsWith('~$') || fileName.startsWith('.')) {
      skipped.push({ fileName, reason: 'Temporary file (starts with ~$ or .)' });
      continue;
    }

    const fileStat = await stat(filePath);
    if (fileStat.size === 0) {
      skipped.push({ fileName, reason: 'Zero-byte file' });
      continue;
    }

    files.push({ filePath, fileName, sizeBytes: fileStat.size, modifiedAt: fileStat.mtime });
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Check that a directory exists and is accessible.
 */
export async function validateDirectory(directoryPath: string): Promise<{ valid: boolean; error?: string }> {
  const normalizedPath = normalize(directoryPath);
  try {
    const dirStat = await stat(normalizedPath);
    if (!dirStat.isDirectory()) {
      return { valid: false, error: `Path is not a directory: ${normalizedPath}` };
    }
    return { valid: true };
  } catch (error) {
    switch (errorCode(error)) {
      case 'ENOENT':
        return { valid: false, error: `Directory does not exist: ${directoryPath}` };
      case 'EACCES':
        return { valid: false, error: `Permission denied: ${directoryPath}` };
      default:
        return { valid: false, error: `Cannot access directory: ${directoryPath}` };
    }
  }
}
