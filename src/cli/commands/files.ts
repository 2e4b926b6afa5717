/**
 * CLI command listing the code files a collection contributes.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import { collectCodeFiles } from '../../core/collector/collector.js';
import { buildFileTree, renderFileTree } from '../../core/collector/tree.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { configureLogging, resolveConfig, type CommonOptions } from './shared.js';

export function createFilesCommand(): Command {
  return new Command('files')
    .description('List the code files collected under a root')
    .argument('<root>', 'Collection root directory')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Config file (default: .codeprint/config.yaml)')
    .action(async (root: string, options: CommonOptions) => {
      try {
        await runFiles(root, options);
      } catch (error) {
        logger.error(errorMessage(error));
        process.exit(1);
      }
    });
}

async function runFiles(root: string, options: CommonOptions): Promise<void> {
  configureLogging(options, false);
  const config = await resolveConfig(options);
  const absRoot = path.resolve(root);
  const files = await collectCodeFiles(absRoot, config.files);

  if (options.json) {
    console.log(JSON.stringify({ root: absRoot, files }, null, 2));
    return;
  }

  if (files.length === 0) {
    logger.warn(`No code files found under ${absRoot}`);
    return;
  }

  console.log(renderFileTree(buildFileTree(files), path.basename(absRoot)).join('\n'));
  console.log();
  console.log(`${files.length} code files`);
}
