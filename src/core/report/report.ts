/**
 * Builds and writes the comparison report document.
 */
import { writeFile } from '../../utils/file-system.js';
import { roundTo, toPercent } from '../../utils/format.js';
import type { PairwiseResult } from '../similarity/types.js';
import type { ComparisonRun, ProcessedFile } from '../pipeline/types.js';
import type { ComparisonReport, FileReport, PairReport } from './types.js';

export interface ReportOptions {
  /** Timestamp source; override for reproducible output */
  now?: () => Date;
}

function fileReport(file: ProcessedFile): FileReport {
  return {
    collection: file.collection,
    file: file.path,
    raw_token_count: file.rawTokenCount,
    normalized_token_count: file.normCount,
    fingerprint_count: file.fingerprints.size,
    unique_identifiers: Object.keys(file.identifierMap).length,
    identifier_map: file.identifierMap,
    normalized_preview: file.preview,
    truncated: file.truncated,
  };
}

function pairReport(pair: PairwiseResult): PairReport {
  return {
    file_a: pair.fileA,
    file_b: pair.fileB,
    jaccard: roundTo(pair.jaccard, 4),
    similarity_percent: toPercent(pair.jaccard),
    file_a_fingerprints: pair.fingerprintsA,
    file_b_fingerprints: pair.fingerprintsB,
    file_a_tokens: pair.tokensA,
    file_b_tokens: pair.tokensB,
  };
}

/**
 * Pairs by descending score, ties broken by file A then file B path.
 */
export function rankPairs(pairs: readonly PairwiseResult[]): PairwiseResult[] {
  return [...pairs].sort((x, y) => {
    if (y.jaccard !== x.jaccard) return y.jaccard - x.jaccard;
    if (x.fileA !== y.fileA) return x.fileA < y.fileA ? -1 : 1;
    if (x.fileB !== y.fileB) return x.fileB < y.fileB ? -1 : 1;
    return 0;
  });
}

export function buildReport(run: ComparisonRun, options: ReportOptions = {}): ComparisonReport {
  const now = options.now ?? (() => new Date());

  const perFile: Record<string, FileReport> = {};
  for (const file of [...run.filesA, ...run.filesB]) {
    perFile[`${file.collection}:${file.path}`] = fileReport(file);
  }

  return {
    metadata: {
      generated_at: now().toISOString(),
      repo_a_root: run.rootA,
      repo_b_root: run.rootB,
      shingle_size_k: run.shingleSize,
      repo_a_files: run.filesA.length,
      repo_b_files: run.filesB.length,
      total_comparisons: run.pairs.length,
      duration_ms: run.durationMs,
    },
    per_file: perFile,
    pairwise_similarities: rankPairs(run.pairs).map(pairReport),
    directional: {
      a_to_b: roundTo(run.aggregate.aToB, 4),
      b_to_a: roundTo(run.aggregate.bToA, 4),
    },
    overall_repo_similarity: roundTo(run.aggregate.score, 4),
    overall_repo_similarity_percent: toPercent(run.aggregate.score),
    status: run.aggregate.status,
    warnings: run.warnings,
  };
}

/**
 * Write a report as pretty-printed JSON.
 */
export async function writeReport(filePath: string, report: ComparisonReport): Promise<void> {
  await writeFile(filePath, `${JSON.stringify(report, null, 2)}\n`);
}
