import chalk from 'chalk';
import type { ComparisonReport, PairReport } from '../../core/report/types.js';
import type { IFormatter, FormatOptions } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'dim' | 'bold';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
      top: options.top ?? 5,
      verbose: options.verbose ?? false,
    };
  }

  formatReport(report: ComparisonReport): string {
    const lines: string[] = [];
    const { metadata } = report;

    lines.push(this.colorize('Code Similarity Report', 'bold'));
    lines.push(`   Repo A: ${metadata.repo_a_root ?? '(in memory)'} (${metadata.repo_a_files} files)`);
    lines.push(`   Repo B: ${metadata.repo_b_root ?? '(in memory)'} (${metadata.repo_b_files} files)`);
    lines.push(`   Shingle size (k): ${metadata.shingle_size_k}`);
    lines.push(`   Comparisons: ${metadata.total_comparisons}`);

    if (this.options.verbose) {
      lines.push('');
      lines.push(this.colorize('Files:', 'bold'));
      for (const [key, file] of Object.entries(report.per_file)) {
        lines.push(
          `   ${key} ${this.colorize(
            `tokens=${file.raw_token_count} normalized=${file.normalized_token_count} fingerprints=${file.fingerprint_count}`,
            'dim'
          )}`
        );
      }
    }

    const top = report.pairwise_similarities.slice(0, this.options.top);
    if (top.length > 0) {
      lines.push('');
      lines.push(this.colorize(`Top ${top.length} most similar file pairs:`, 'bold'));
      top.forEach((pair, index) => lines.push(...this.formatPair(pair, index + 1)));
    }

    if (report.warnings.length > 0) {
      lines.push('');
      lines.push(this.colorize(`WARNINGS (${report.warnings.length}):`, 'yellow'));
      for (const warning of report.warnings) {
        lines.push(`   [${warning.code}] ${warning.collection}:${warning.file} ${this.colorize(warning.message, 'dim')}`);
      }
    }

    lines.push('');
    const overall = `Overall repository similarity: ${report.overall_repo_similarity_percent}%`;
    lines.push(this.colorize(overall, this.scoreColor(report.overall_repo_similarity)));
    lines.push(
      this.colorize(
        `   A→B ${report.directional.a_to_b}, B→A ${report.directional.b_to_a}`,
        'dim'
      )
    );
    if (report.status === 'empty-collection') {
      lines.push(this.colorize('   One collection has no comparable files; score reported as 0.', 'yellow'));
    }

    return lines.join('\n');
  }

  private formatPair(pair: PairReport, rank: number): string[] {
    return [
      `   ${rank}. ${pair.file_a}`,
      `      <--> ${pair.file_b}`,
      `      Similarity: ${this.colorize(`${pair.similarity_percent}%`, this.scoreColor(pair.jaccard))} (Jaccard: ${pair.jaccard})`,
      `      ${this.colorize(`Fingerprints: A=${pair.file_a_fingerprints}, B=${pair.file_b_fingerprints}`, 'dim')}`,
    ];
  }

  private scoreColor(score: number): Color {
    if (score >= 0.7) return 'red';
    if (score >= 0.4) return 'yellow';
    return 'green';
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}
