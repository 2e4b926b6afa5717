/**
 * Similarity analysis exports.
 */
export { jaccard, EMPTY_SET_SIMILARITY } from './jaccard.js';
export {
  scoreMatrix,
  scorePairs,
  weightedBestMatch,
  directionalScore,
  aggregate,
  compareCollections,
} from './engine.js';
export type {
  CollectionId,
  FingerprintedFile,
  PairwiseResult,
  AggregateStatus,
  AggregateScore,
  CollectionComparison,
} from './types.js';
