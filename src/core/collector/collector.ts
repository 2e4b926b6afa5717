/**
 * Code file enumeration for one collection root.
 */
import { globFiles, isDirectory } from '../../utils/file-system.js';
import { loadIgnoreFilter } from '../../utils/ignore-file.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import type { FilesConfig } from '../config/schema.js';

function caseInsensitive(text: string): string {
  return [...text]
    .map((ch) => (ch.toLowerCase() !== ch.toUpperCase() ? `[${ch.toLowerCase()}${ch.toUpperCase()}]` : ch))
    .join('');
}

/**
 * Glob patterns matching every allowed extension in any letter case,
 * e.g. `**\/*.[tT][sS]`. Directory names stay case-sensitive.
 */
export function buildIncludePatterns(extensions: readonly string[]): string[] {
  return [...new Set(extensions.map((ext) => ext.toLowerCase()))].map((ext) => `**/*${caseInsensitive(ext)}`);
}

/**
 * Glob patterns excluding directory names at any depth.
 */
export function buildExcludePatterns(excludeDirs: readonly string[]): string[] {
  return excludeDirs.map((dir) => `**/${dir}/**`);
}

/**
 * Collect code files under a root.
 *
 * Returns relative, forward-slash paths sorted by code unit order.
 * Extensions match case-insensitively; excluded directory names match exactly. Directories named in
 * `exclude_dirs` and paths matched by the root's .codeprintignore are left out.
 */
export async function collectCodeFiles(root: string, files: FilesConfig): Promise<string[]> {
  if (!(await isDirectory(root))) {
    throw new SystemError(
      ErrorCodes.NOT_A_DIRECTORY,
      `Not a directory: ${root}`,
      { root }
    );
  }

  const matches = await globFiles(root, buildIncludePatterns(files.extensions), {
    ignore: buildExcludePatterns(files.exclude_dirs),
  });

  const ignoreFilter = await loadIgnoreFilter(root);
  return ignoreFilter(matches).sort();
}
