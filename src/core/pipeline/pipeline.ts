/**
 * Comparison run orchestration.
 *
 * Config is validated before any file is touched. Files are processed in
 * concurrent batches via Promise.allSettled, so one failing file becomes a
 * warning instead of aborting the run.
 */
import * as os from 'node:os';
import * as path from 'node:path';
import { logger } from '../../utils/logger.js';
import { CodeprintError, PipelineError, ErrorCodes, isErrorCode, type ErrorCode } from '../../utils/errors.js';
import type { Config } from '../config/schema.js';
import { resolveKeywordSet } from '../grammar/keywords.js';
import { GrammarRegistry } from '../grammar/registry.js';
import { assertShingleSize } from '../fingerprint/fingerprinter.js';
import { collectCodeFiles } from '../collector/collector.js';
import { compareCollections } from '../similarity/engine.js';
import type { CollectionId } from '../similarity/types.js';
import { processFile, processSource } from './processor.js';
import type {
  ComparisonRun,
  FileWarning,
  ProcessedFile,
  RunSettings,
  SourceInput,
} from './types.js';

/**
 * Default concurrency: 75% of available CPUs (min 2, max 16).
 */
export function defaultConcurrency(): number {
  return Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 2), 16);
}

/**
 * Validate config and derive run settings.
 * Throws ConfigError for an invalid shingle size or keyword set.
 */
export function resolveRunSettings(config: Config): RunSettings {
  assertShingleSize(config.shingle_size);
  const keywords = resolveKeywordSet(config.keywords.sets, config.keywords.extra);

  return {
    shingleSize: config.shingle_size,
    keywords,
    grammars: new GrammarRegistry(keywords),
    previewTokens: config.preview_tokens,
    maxFileBytes: config.limits.max_file_bytes,
    maxTokensPerFile: config.limits.max_tokens_per_file,
    concurrency: config.concurrency ?? defaultConcurrency(),
    timeoutMs: config.limits.timeout_ms,
    diagnostics: config.diagnostics,
  };
}

class Deadline {
  private readonly expiresAt: number | null;

  constructor(private readonly timeoutMs: number | null, private readonly startedAt: number) {
    this.expiresAt = timeoutMs === null ? null : startedAt + timeoutMs;
  }

  check(stage: string): void {
    if (this.expiresAt !== null && Date.now() > this.expiresAt) {
      throw new PipelineError(
        ErrorCodes.TIMEOUT,
        `Comparison exceeded ${this.timeoutMs}ms during ${stage}`,
        { timeoutMs: this.timeoutMs, stage, elapsedMs: Date.now() - this.startedAt }
      );
    }
  }
}

function warningFor(collection: CollectionId, file: string, reason: unknown): FileWarning {
  const code: ErrorCode = reason instanceof CodeprintError && isErrorCode(reason.code)
    ? reason.code
    : ErrorCodes.READ_ERROR;
  return {
    collection,
    file,
    code,
    message: reason instanceof Error ? reason.message : 'Unknown error',
  };
}

function truncationWarning(file: ProcessedFile, maxTokens: number): FileWarning {
  return {
    collection: file.collection,
    file: file.path,
    code: ErrorCodes.TOKENS_TRUNCATED,
    message: `Token stream truncated at ${maxTokens} tokens`,
  };
}

function logFileDiagnostics(settings: RunSettings, file: ProcessedFile): void {
  if (!settings.diagnostics) return;
  logger.child('pipeline').debug(`${file.collection}:${file.path}`, {
    rawTokens: file.rawTokenCount,
    normalizedTokens: file.normCount,
    fingerprints: file.fingerprints.size,
    uniqueIdentifiers: Object.keys(file.identifierMap).length,
  });
}

/**
 * Process one collection's files in batches of `settings.concurrency`.
 * Results keep the input path order; failed files become warnings.
 */
export async function processCollection(
  collection: CollectionId,
  root: string,
  relPaths: readonly string[],
  settings: RunSettings,
  deadline: { check(stage: string): void } = { check: () => undefined }
): Promise<{ files: ProcessedFile[]; warnings: FileWarning[] }> {
  const files: ProcessedFile[] = [];
  const warnings: FileWarning[] = [];

  for (let i = 0; i < relPaths.length; i += settings.concurrency) {
    deadline.check(`processing collection ${collection}`);

    const batch = relPaths.slice(i, i + settings.concurrency);
    const batchResults = await Promise.allSettled(
      batch.map((relPath) => processFile(collection, root, relPath, settings))
    );

    for (let j = 0; j < batchResults.length; j++) {
      const result = batchResults[j];
      if (result.status === 'fulfilled') {
        files.push(result.value);
        logFileDiagnostics(settings, result.value);
        if (result.value.truncated) {
          warnings.push(truncationWarning(result.value, settings.maxTokensPerFile));
        }
      } else {
        warnings.push(warningFor(collection, batch[j], result.reason));
      }
    }
  }

  return { files, warnings };
}

/**
 * Compare two directories.
 */
export async function runComparison(
  rootA: string,
  rootB: string,
  config: Config
): Promise<ComparisonRun> {
  const startedAt = Date.now();
  const settings = resolveRunSettings(config);
  const deadline = new Deadline(settings.timeoutMs, startedAt);
  const log = logger.child('pipeline');

  const absA = path.resolve(rootA);
  const absB = path.resolve(rootB);

  const [pathsA, pathsB] = await Promise.all([
    collectCodeFiles(absA, config.files),
    collectCodeFiles(absB, config.files),
  ]);
  log.debug(`Collected ${pathsA.length} files in A, ${pathsB.length} files in B`);

  const a = await processCollection('A', absA, pathsA, settings, deadline);
  const b = await processCollection('B', absB, pathsB, settings, deadline);

  deadline.check('scoring');
  const { pairs, aggregate } = compareCollections(a.files, b.files);

  const warnings = [...a.warnings, ...b.warnings];
  for (const warning of warnings) {
    log.debug(`Skipped or truncated ${warning.collection}:${warning.file}`, { ...warning });
  }

  return {
    rootA: absA,
    rootB: absB,
    shingleSize: settings.shingleSize,
    filesA: a.files,
    filesB: b.files,
    pairs,
    aggregate,
    warnings,
    durationMs: Date.now() - startedAt,
  };
}

/**
 * Compare two in-memory file lists.
 * Paths choose the grammar by extension; no file system access.
 */
export function compareSources(
  sourcesA: readonly SourceInput[],
  sourcesB: readonly SourceInput[],
  config: Config
): ComparisonRun {
  const startedAt = Date.now();
  const settings = resolveRunSettings(config);

  const processAll = (collection: CollectionId, sources: readonly SourceInput[]) => {
    const files = sources.map((source) => {
      const file = processSource(collection, source.path, source.text, settings.grammars.forFile(source.path), {
        shingleSize: settings.shingleSize,
        previewTokens: settings.previewTokens,
        maxTokens: settings.maxTokensPerFile,
      });
      logFileDiagnostics(settings, file);
      return file;
    });
    const warnings = files
      .filter((file) => file.truncated)
      .map((file) => truncationWarning(file, settings.maxTokensPerFile));
    return { files, warnings };
  };

  const a = processAll('A', sourcesA);
  const b = processAll('B', sourcesB);
  const { pairs, aggregate } = compareCollections(a.files, b.files);

  return {
    rootA: null,
    rootB: null,
    shingleSize: settings.shingleSize,
    filesA: a.files,
    filesB: b.files,
    pairs,
    aggregate,
    warnings: [...a.warnings, ...b.warnings],
    durationMs: Date.now() - startedAt,
  };
}
