/**
 * Formatter type definitions.
 */
import type { ComparisonReport } from '../../core/report/types.js';

/**
 * Output format options.
 */
export type OutputFormat = 'human' | 'json';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Output format */
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
  /** Number of top pairs to list */
  top: number;
  /** List every per-file entry */
  verbose: boolean;
}

/**
 * Interface for report formatters.
 */
export interface IFormatter {
  formatReport(report: ComparisonReport): string;
}
