/**
 * CLI command comparing two source collections.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import { runComparison } from '../../core/pipeline/pipeline.js';
import { buildReport, writeReport } from '../../core/report/report.js';
import { createFormatter } from '../formatters/index.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { configureLogging, parseNumberOption, resolveConfig, type CommonOptions } from './shared.js';

interface CompareOptions extends CommonOptions {
  k?: string;
  out?: string;
  top?: string;
  color?: boolean;
}

export function createCompareCommand(): Command {
  return new Command('compare')
    .description('Compare two source collections and report structural similarity')
    .argument('<repoA>', 'Root directory of collection A')
    .argument('<repoB>', 'Root directory of collection B')
    .option('-k, --k <n>', 'Shingle size (default: from config, 5)')
    .option('-o, --out <file>', 'Write the JSON report to a file')
    .option('--json', 'Print the JSON report instead of the summary')
    .option('--top <n>', 'Number of most similar pairs to list', '5')
    .option('-c, --config <path>', 'Config file (default: .codeprint/config.yaml)')
    .option('-v, --verbose', 'Log per-file diagnostics')
    .option('-q, --quiet', 'Suppress log output')
    .option('--no-color', 'Disable colored output')
    .action(async (repoA: string, repoB: string, options: CompareOptions) => {
      try {
        await runCompare(repoA, repoB, options);
      } catch (error) {
        logger.error(errorMessage(error));
        process.exit(1);
      }
    });
}

async function runCompare(repoA: string, repoB: string, options: CompareOptions): Promise<void> {
  configureLogging(options, false);
  const config = await resolveConfig(options, parseNumberOption(options.k));
  configureLogging(options, config.diagnostics);

  logger.info(`Comparing ${repoA} with ${repoB} (k=${config.shingle_size})`);

  const run = await runComparison(repoA, repoB, config);
  const report = buildReport(run);

  if (options.out) {
    await writeReport(path.resolve(options.out), report);
  }

  const top = parseNumberOption(options.top);
  const formatter = createFormatter({
    format: options.json ? 'json' : 'human',
    colors: options.color !== false,
    top: top !== undefined && Number.isInteger(top) && top >= 0 ? top : 5,
    verbose: options.verbose ?? false,
  });
  console.log(formatter.formatReport(report));

  if (options.out) {
    logger.success(`Saved report: ${options.out}`);
  }
}
