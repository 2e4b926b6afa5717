/**
 * Reserved-word catalog loading and keyword set resolution.
 */
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import type { KeywordCatalog } from './types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const CATALOG_PATH = resolve(__dirname, '../../../grammars/keywords.json');

const KeywordCatalogSchema = z.record(z.string(), z.array(z.string().min(1)));

let cachedCatalog: KeywordCatalog | null = null;

/**
 * Load the bundled keyword catalog. Parsed once per process.
 */
export function loadKeywordCatalog(): KeywordCatalog {
  if (cachedCatalog) return cachedCatalog;

  const raw: unknown = JSON.parse(readFileSync(CATALOG_PATH, 'utf-8'));
  const result = KeywordCatalogSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_CONFIG,
      `Invalid keyword catalog: ${formatZodError(result.error)}`,
      { path: CATALOG_PATH }
    );
  }

  cachedCatalog = result.data;
  return cachedCatalog;
}

/**
 * Build the combined reserved-word set from catalog entries plus extra words.
 * Throws ConfigError for unknown set names or when the result is empty.
 */
export function resolveKeywordSet(
  sets: readonly string[],
  extra: readonly string[] = [],
  catalog: KeywordCatalog = loadKeywordCatalog()
): ReadonlySet<string> {
  const keywords = new Set<string>();

  for (const name of sets) {
    const words = Object.hasOwn(catalog, name) ? catalog[name] : undefined;
    if (!words) {
      throw new ConfigError(
        ErrorCodes.UNKNOWN_KEYWORD_SET,
        `Unknown keyword set '${name}'. Available: ${Object.keys(catalog).sort().join(', ')}`,
        { name }
      );
    }
    for (const word of words) keywords.add(word);
  }

  for (const word of extra) keywords.add(word);

  if (keywords.size === 0) {
    throw new ConfigError(
      ErrorCodes.EMPTY_KEYWORDS,
      'The reserved-word set is empty; configure keywords.sets or keywords.extra',
      { sets: [...sets] }
    );
  }

  return keywords;
}
