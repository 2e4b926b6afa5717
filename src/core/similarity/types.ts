/**
 * Types for fingerprint similarity scoring.
 */
import type { FingerprintSet } from '../fingerprint/fingerprinter.js';

/** Which side of a comparison a file belongs to. */
export type CollectionId = 'A' | 'B';

/**
 * The per-file inputs the engine compares.
 */
export interface FingerprintedFile {
  /** Relative path inside its collection */
  path: string;
  fingerprints: FingerprintSet;
  /** Canonical sequence length, used as the aggregation weight */
  normCount: number;
}

/**
 * Jaccard score of one (A file, B file) combination.
 */
export interface PairwiseResult {
  fileA: string;
  fileB: string;
  /** Jaccard similarity (0-1) */
  jaccard: number;
  fingerprintsA: number;
  fingerprintsB: number;
  tokensA: number;
  tokensB: number;
}

/**
 * 'empty-collection' flags a run where either side had no files;
 * its score is the neutral value 0.
 */
export type AggregateStatus = 'ok' | 'empty-collection';

/**
 * Run-level similarity.
 */
export interface AggregateScore {
  /** Mean of the two directional scores (0-1) */
  score: number;
  /** Weighted best-match score of A's files against B */
  aToB: number;
  /** Weighted best-match score of B's files against A */
  bToA: number;
  status: AggregateStatus;
}

export interface CollectionComparison {
  pairs: PairwiseResult[];
  aggregate: AggregateScore;
}
