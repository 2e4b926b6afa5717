/**
 * File system access: config and ignore files, bounded source reads,
 * report output and root-relative globbing.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

/**
 * Read a UTF-8 text file.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Read a file as raw bytes.
 */
export async function readFileBuffer(filePath: string): Promise<Buffer> {
  return fs.promises.readFile(filePath);
}

/**
 * Outcome of a size-bounded read. `buffer` is null when the file is larger
 * than the limit and was not read.
 */
export interface BoundedRead {
  size: number;
  buffer: Buffer | null;
}

/**
 * Stat a file and read it only if it is at most `maxBytes` long.
 */
export async function readFileBounded(filePath: string, maxBytes: number): Promise<BoundedRead> {
  const stats = await fs.promises.stat(filePath);
  if (stats.size > maxBytes) {
    return { size: stats.size, buffer: null };
  }
  return { size: stats.size, buffer: await fs.promises.readFile(filePath) };
}

/**
 * Write a UTF-8 file, creating parent directories as needed.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* not found */ }
  return false;
}

export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch { /* not found or not accessible */ }
  return false;
}

export interface GlobOptions {
  /** Patterns excluded from the result */
  ignore?: string[];
}

/**
 * Files under `root` matching the patterns, as forward-slash paths relative
 * to `root`. Dot-files and dot-directories are included.
 */
export async function globFiles(
  root: string,
  patterns: string[],
  options: GlobOptions = {}
): Promise<string[]> {
  return fg(patterns, {
    cwd: root,
    ignore: options.ignore ?? [],
    absolute: false,
    dot: true,
    onlyFiles: true,
  });
}
