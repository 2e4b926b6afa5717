/**
 * Configuration schema for comparison runs.
 */
import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const DEFAULT_EXTENSIONS = [
  '.py', '.java', '.c', '.cpp', '.js', '.ts', '.cs', '.go', '.rb', '.php', '.jsx', '.tsx',
];

export const DEFAULT_EXCLUDE_DIRS = [
  '.git', '__pycache__', 'node_modules', '.metadata', '.idea', '.vscode', 'target', 'build',
];

/** Which files of a collection are compared. */
export const FilesConfigSchema = z.object({
  /** Source extensions to include, with leading dot; matched case-insensitively */
  extensions: z.array(z.string().regex(/^\.[A-Za-z0-9_+-]+$/, 'must look like ".ext"')).min(1).default(DEFAULT_EXTENSIONS),
  /** Directory names excluded at any depth */
  exclude_dirs: z.array(z.string().min(1)).default(DEFAULT_EXCLUDE_DIRS),
});

/** Reserved words kept verbatim by the normalizer. */
export const KeywordsConfigSchema = z.object({
  /** Entries of grammars/keywords.json to combine */
  sets: z.array(z.string()).default(['java', 'javascript']),
  /** Additional reserved words */
  extra: z.array(z.string().min(1)).default([]),
});

/** Bounds on per-file and per-run work. */
export const LimitsConfigSchema = z.object({
  /** Files larger than this are skipped with a warning */
  max_file_bytes: z.number().int().min(1).default(1_048_576),
  /** Token streams are truncated at this length */
  max_tokens_per_file: z.number().int().min(1).default(500_000),
  /** Abort the run after this many milliseconds (null = no deadline) */
  timeout_ms: z.number().int().min(1).nullable().default(null),
});

export const ConfigSchema = z.object({
  /** Shingle window size k */
  shingle_size: z.number().int().min(1).default(5),
  /** Canonical tokens kept per file in the report preview */
  preview_tokens: z.number().int().min(0).default(80),
  /** Files processed concurrently (default: 75% of CPUs, min 2, max 16) */
  concurrency: z.number().int().min(1).max(64).optional(),
  /** Log per-file statistics at debug level */
  diagnostics: z.boolean().default(false),
  files: withDefaults(FilesConfigSchema),
  keywords: withDefaults(KeywordsConfigSchema),
  limits: withDefaults(LimitsConfigSchema),
});

/** Accepts an empty YAML document. */
export const ConfigFileSchema = withDefaults(ConfigSchema);

export type Config = z.infer<typeof ConfigSchema>;
export type FilesConfig = z.infer<typeof FilesConfigSchema>;
export type KeywordsConfig = z.infer<typeof KeywordsConfigSchema>;
export type LimitsConfig = z.infer<typeof LimitsConfigSchema>;
