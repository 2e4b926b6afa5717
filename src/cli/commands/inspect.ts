/**
 * CLI command showing how one file tokenizes and normalizes.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { readFileBuffer } from '../../utils/file-system.js';
import { SystemError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { mergeConfig } from '../../core/config/loader.js';
import { resolveRunSettings } from '../../core/pipeline/pipeline.js';
import { processSource, decodeSource, looksBinary } from '../../core/pipeline/processor.js';
import { configureLogging, parseNumberOption, resolveConfig, type CommonOptions } from './shared.js';

interface InspectOptions extends CommonOptions {
  k?: string;
  limit?: string;
}

export function createInspectCommand(): Command {
  return new Command('inspect')
    .description('Show tokens, identifier renames and fingerprints for one file')
    .argument('<file>', 'Source file')
    .option('-k, --k <n>', 'Shingle size (default: from config, 5)')
    .option('--limit <n>', 'Canonical tokens to show (default: preview_tokens from config)')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Config file (default: .codeprint/config.yaml)')
    .action(async (file: string, options: InspectOptions) => {
      try {
        await runInspect(file, options);
      } catch (error) {
        logger.error(errorMessage(error));
        process.exit(1);
      }
    });
}

async function runInspect(file: string, options: InspectOptions): Promise<void> {
  configureLogging(options, false);
  const loaded = await resolveConfig(options, parseNumberOption(options.k));
  const limit = parseNumberOption(options.limit);
  const config = limit === undefined ? loaded : mergeConfig({ ...loaded, preview_tokens: limit });
  const settings = resolveRunSettings(config);

  const absolutePath = path.resolve(file);
  const buffer = await readFileBuffer(absolutePath);
  if (looksBinary(buffer)) {
    throw new SystemError(ErrorCodes.BINARY_CONTENT, `File looks binary: ${file}`, { file });
  }

  const processed = processSource('A', file, decodeSource(buffer), settings.grammars.forFile(file), {
    shingleSize: settings.shingleSize,
    previewTokens: settings.previewTokens,
    maxTokens: settings.maxTokensPerFile,
  });

  const grammar = settings.grammars.forFile(file).name;

  if (options.json) {
    console.log(JSON.stringify({
      file,
      grammar,
      shingle_size_k: settings.shingleSize,
      raw_token_count: processed.rawTokenCount,
      normalized_token_count: processed.normCount,
      fingerprint_count: processed.fingerprints.size,
      identifier_map: processed.identifierMap,
      normalized_preview: processed.preview,
      truncated: processed.truncated,
    }, null, 2));
    return;
  }

  console.log();
  console.log(chalk.bold(file) + chalk.dim(` (${grammar})`));
  console.log(`   Raw tokens:        ${processed.rawTokenCount}`);
  console.log(`   Normalized tokens: ${processed.normCount}`);
  console.log(`   Fingerprints:      ${processed.fingerprints.size} (k=${settings.shingleSize})`);
  console.log(`   Identifiers:       ${Object.keys(processed.identifierMap).length}`);

  const renames = Object.entries(processed.identifierMap);
  if (renames.length > 0) {
    console.log();
    console.log(chalk.bold('Identifier renames:'));
    for (const [original, symbol] of renames) {
      console.log(`   ${chalk.cyan(symbol)} ${chalk.dim('←')} ${original}`);
    }
  }

  if (processed.preview.length > 0) {
    console.log();
    console.log(chalk.bold(`First ${processed.preview.length} normalized tokens:`));
    console.log(processed.preview.join(' '));
  }

  if (processed.truncated) {
    logger.warn(`Token stream truncated at ${settings.maxTokensPerFile} tokens`);
  }
}
