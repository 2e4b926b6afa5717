/**
 * Pipeline exports.
 */
export {
  runComparison,
  compareSources,
  processCollection,
  resolveRunSettings,
  defaultConcurrency,
} from './pipeline.js';
export { processSource, processFile, decodeSource, looksBinary } from './processor.js';
export type { ProcessOptions } from './processor.js';
export type {
  ProcessedFile,
  FileWarning,
  SourceInput,
  RunSettings,
  ComparisonRun,
} from './types.js';
