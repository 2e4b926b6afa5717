/**
 * Report exports.
 */
export { buildReport, writeReport, rankPairs } from './report.js';
export type { ReportOptions } from './report.js';
export type {
  ComparisonReport,
  ReportMetadata,
  FileReport,
  PairReport,
} from './types.js';
