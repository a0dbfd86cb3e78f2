/**
 * Which statement files a run reads: the paths given explicitly, or every
 * statement export in one directory.
 */

import { readdir, readFile, stat } from 'fs/promises';
import { basename, extname, join, resolve } from 'path';
import { ConfigError, errorMessage } from '@ledger/types';
import type { StatementInput } from './types.js';

export const STATEMENT_EXTENSIONS: readonly string[] = ['.csv', '.txt'];

export interface StatementFile {
  filePath: string;
  /** Used for source detection and in failure reports */
  fileName: string;
}

export interface SkippedFile {
  fileName: string;
  reason: string;
}

export interface StatementFileSelection {
  files: StatementFile[];
  skipped: SkippedFile[];
  /** Directory that was listed; null when explicit paths were given */
  directory: string | null;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

async function assertDirectory(directory: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(directory)).isDirectory();
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigError(`Statement directory does not exist: ${directory}`);
    }
    throw new ConfigError(`Cannot read statement directory ${directory}: ${errorMessage(error)}`);
  }
  if (!isDirectory) {
    throw new ConfigError(`Not a directory: ${directory}`);
  }
}

/**
 * Statement exports directly inside `directory`, sorted by file name.
 * Hidden files, office lock files (`~$…`) and empty files are reported as skipped.
 */
export async function listStatementFiles(directory: string): Promise<StatementFileSelection> {
  const dir = resolve(directory);
  await assertDirectory(dir);

  const files: StatementFile[] = [];
  const skipped: SkippedFile[] = [];

  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const fileName = entry.name;
    if (entry.isDirectory() || !STATEMENT_EXTENSIONS.includes(extname(fileName).toLowerCase())) continue;

    if (fileName.startsWith('.') || fileName.startsWith('~$')) {
      skipped.push({ fileName, reason: 'hidden or temporary file' });
      continue;
    }

    const filePath = join(dir, fileName);
    if ((await stat(filePath)).size === 0) {
      skipped.push({ fileName, reason: 'empty file' });
      continue;
    }

    files.push({ filePath, fileName });
  }

  files.sort((a, b) => a.fileName.localeCompare(b.fileName));
  return { files, skipped, directory: dir };
}

/**
 * Named paths win; the directory is listed only when no path is given.
 */
export async function selectStatementFiles(
  paths: readonly string[],
  directory?: string
): Promise<StatementFileSelection> {
  if (paths.length > 0) {
    return {
      files: paths.map((path) => ({ filePath: resolve(path), fileName: basename(path) })),
      skipped: [],
      directory: null,
    };
  }
  if (directory === undefined || directory === '') {
    throw new ConfigError('Either statement files or --input-dir must be specified');
  }
  return listStatementFiles(directory);
}

export async function readStatementFile(file: StatementFile | string): Promise<StatementInput> {
  const { filePath, fileName } = typeof file === 'string' ? { filePath: file, fileName: basename(file) } : file;
  return { fileName, content: await readFile(filePath, 'utf-8') };
}
