/**
 * Pairwise scoring and weighted, symmetric aggregation of two collections.
 *
 * Aggregation is best-match based: each file takes its highest Jaccard score
 * against any file of the other collection, weighted by max(1, normCount).
 * The A→B and B→A directional scores are averaged, since a small file fully
 * contained in a large one scores high one way and low the other.
 */
import { jaccard } from './jaccard.js';
import type {
  AggregateScore,
  CollectionComparison,
  FingerprintedFile,
  PairwiseResult,
} from './types.js';

/**
 * Jaccard score for every (a, b) combination; matrix[i][j] pairs a[i] with b[j].
 */
export function scoreMatrix(
  a: readonly FingerprintedFile[],
  b: readonly FingerprintedFile[]
): number[][] {
  return a.map((fileA) => b.map((fileB) => jaccard(fileA.fingerprints, fileB.fingerprints)));
}

/**
 * One PairwiseResult per (A file, B file), A-major in input order.
 */
export function scorePairs(
  a: readonly FingerprintedFile[],
  b: readonly FingerprintedFile[],
  matrix: number[][] = scoreMatrix(a, b)
): PairwiseResult[] {
  const pairs: PairwiseResult[] = [];
  a.forEach((fileA, i) => {
    b.forEach((fileB, j) => {
      pairs.push({
        fileA: fileA.path,
        fileB: fileB.path,
        jaccard: matrix[i][j],
        fingerprintsA: fileA.fingerprints.size,
        fingerprintsB: fileB.fingerprints.size,
        tokensA: fileA.normCount,
        tokensB: fileB.normCount,
      });
    });
  });
  return pairs;
}

function comparePaths(x: string, y: string): number {
  if (x < y) return -1;
  if (x > y) return 1;
  return 0;
}

/**
 * Weighted mean of per-file best-match scores.
 *
 * Terms are summed in path order, so any permutation of `files` yields the
 * same floating-point result. Returns 0 for an empty collection.
 */
export function weightedBestMatch(
  files: readonly FingerprintedFile[],
  bestScores: readonly number[]
): number {
  const order = files
    .map((file, index) => ({ path: file.path, index }))
    .sort((x, y) => comparePaths(x.path, y.path) || x.index - y.index);

  let weightedSum = 0;
  let totalWeight = 0;
  for (const { index } of order) {
    const weight = Math.max(1, files[index].normCount);
    weightedSum += bestScores[index] * weight;
    totalWeight += weight;
  }

  return totalWeight > 0 ? weightedSum / totalWeight : 0;
}

/**
 * Directional score of `from` against `to`.
 */
export function directionalScore(
  from: readonly FingerprintedFile[],
  to: readonly FingerprintedFile[]
): number {
  const best = from.map((file) =>
    to.reduce((max, other) => Math.max(max, jaccard(file.fingerprints, other.fingerprints)), 0)
  );
  return weightedBestMatch(from, best);
}

function aggregateFromMatrix(
  a: readonly FingerprintedFile[],
  b: readonly FingerprintedFile[],
  matrix: number[][]
): AggregateScore {
  if (a.length === 0 || b.length === 0) {
    return { score: 0, aToB: 0, bToA: 0, status: 'empty-collection' };
  }

  const bestForA = matrix.map((row) => row.reduce((max, score) => Math.max(max, score), 0));
  const bestForB = b.map((_, j) => matrix.reduce((max, row) => Math.max(max, row[j]), 0));

  const aToB = weightedBestMatch(a, bestForA);
  const bToA = weightedBestMatch(b, bestForB);

  return { score: (aToB + bToA) / 2, aToB, bToA, status: 'ok' };
}

/**
 * Symmetric repo-level score. An empty collection on either side yields 0
 * with status 'empty-collection'.
 */
export function aggregate(
  a: readonly FingerprintedFile[],
  b: readonly FingerprintedFile[]
): AggregateScore {
  return aggregateFromMatrix(a, b, scoreMatrix(a, b));
}

/**
 * All pairwise results plus the aggregate, scoring each pair once.
 */
export function compareCollections(
  a: readonly FingerprintedFile[],
  b: readonly FingerprintedFile[]
): CollectionComparison {
  const matrix = scoreMatrix(a, b);
  return {
    pairs: scorePairs(a, b, matrix),
    aggregate: aggregateFromMatrix(a, b, matrix),
  };
}
