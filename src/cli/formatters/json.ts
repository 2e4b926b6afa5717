import type { ComparisonReport } from '../../core/report/types.js';
import type { IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  formatReport(report: ComparisonReport): string {
    return JSON.stringify(report, null, 2);
  }
}
