/**
 * JSON-compatible result document.
 */
import type { AggregateStatus, CollectionId } from '../similarity/types.js';
import type { FileWarning } from '../pipeline/types.js';

export interface ReportMetadata {
  generated_at: string;
  repo_a_root: string | null;
  repo_b_root: string | null;
  shingle_size_k: number;
  repo_a_files: number;
  repo_b_files: number;
  total_comparisons: number;
  duration_ms: number;
}

export interface FileReport {
  collection: CollectionId;
  file: string;
  raw_token_count: number;
  normalized_token_count: number;
  fingerprint_count: number;
  unique_identifiers: number;
  identifier_map: Record<string, string>;
  normalized_preview: string[];
  truncated: boolean;
}

export interface PairReport {
  file_a: string;
  file_b: string;
  jaccard: number;
  similarity_percent: number;
  file_a_fingerprints: number;
  file_b_fingerprints: number;
  file_a_tokens: number;
  file_b_tokens: number;
}

export interface ComparisonReport {
  metadata: ReportMetadata;
  /** Keyed "A:<path>" / "B:<path>" */
  per_file: Record<string, FileReport>;
  pairwise_similarities: PairReport[];
  directional: { a_to_b: number; b_to_a: number };
  overall_repo_similarity: number;
  overall_repo_similarity_percent: number;
  status: AggregateStatus;
  warnings: FileWarning[];
}
