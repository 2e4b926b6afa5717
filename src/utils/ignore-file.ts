/**
 * `.codeprintignore`: gitignore-syntax exclusions read from a collection root.
 */
import * as path from 'node:path';
import ignore from 'ignore';
import { fileExists, readFile } from './file-system.js';

export const IGNORE_FILENAME = '.codeprintignore';

/** Drops root-relative paths matched by the root's ignore file. */
export type PathFilter = (relPaths: string[]) => string[];

/**
 * Build a filter from ignore-file text. Blank lines and `#` comments are
 * skipped by the matcher itself.
 */
export function createPathFilter(content: string): PathFilter {
  const matcher = ignore().add(content);
  return (relPaths) => matcher.filter(relPaths);
}

/**
 * Filter for a collection root; passes everything when the root has no
 * ignore file.
 */
export async function loadIgnoreFilter(root: string): Promise<PathFilter> {
  const ignorePath = path.join(root, IGNORE_FILENAME);
  if (!(await fileExists(ignorePath))) {
    return (relPaths) => relPaths;
  }
  return createPathFilter(await readFile(ignorePath));
}
