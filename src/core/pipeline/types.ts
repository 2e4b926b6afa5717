/**
 * Types for comparison runs.
 */
import type { ErrorCode } from '../../utils/errors.js';
import type { GrammarRegistry } from '../grammar/registry.js';
import type {
  AggregateScore,
  CollectionId,
  FingerprintedFile,
  PairwiseResult,
} from '../similarity/types.js';

/**
 * A file after tokenize → normalize → fingerprint.
 * The raw text and canonical sequence are not retained.
 */
export interface ProcessedFile extends FingerprintedFile {
  collection: CollectionId;
  rawTokenCount: number;
  /** Original identifier → symbolic name, in allocation order */
  identifierMap: Record<string, string>;
  /** Leading canonical tokens, for debugging */
  preview: string[];
  /** True when the token stream hit max_tokens_per_file */
  truncated: boolean;
}

/**
 * A file that was skipped or altered, with the reason.
 */
export interface FileWarning {
  collection: CollectionId;
  file: string;
  code: ErrorCode;
  message: string;
}

/**
 * In-memory source file.
 */
export interface SourceInput {
  path: string;
  text: string;
}

/**
 * Validated, derived settings for one run.
 */
export interface RunSettings {
  shingleSize: number;
  keywords: ReadonlySet<string>;
  grammars: GrammarRegistry;
  previewTokens: number;
  maxFileBytes: number;
  maxTokensPerFile: number;
  concurrency: number;
  timeoutMs: number | null;
  diagnostics: boolean;
}

export interface ComparisonRun {
  /** Collection roots; null for in-memory comparisons */
  rootA: string | null;
  rootB: string | null;
  shingleSize: number;
  filesA: ProcessedFile[];
  filesB: ProcessedFile[];
  pairs: PairwiseResult[];
  aggregate: AggregateScore;
  warnings: FileWarning[];
  durationMs: number;
}
