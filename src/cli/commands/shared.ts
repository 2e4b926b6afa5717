/**
 * Option handling shared by commands.
 */
import { logger } from '../../utils/logger.js';
import { loadConfig, applyOverrides } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';

export interface CommonOptions {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
  json?: boolean;
}

/**
 * Parse a numeric option. Non-numeric text becomes NaN so that the
 * consuming validator reports it.
 */
export function parseNumberOption(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  return value.trim() === '' ? Number.NaN : Number(value);
}

/**
 * Set the log level from flags. JSON output keeps stdout clean unless
 * diagnostics were asked for.
 */
export function configureLogging(options: CommonOptions, diagnostics: boolean): void {
  if (options.quiet) {
    logger.setLevel('silent');
  } else if (options.verbose || diagnostics) {
    logger.setLevel('debug');
  } else if (options.json) {
    logger.setLevel('warn');
  } else {
    logger.setLevel('info');
  }
}

/**
 * Load config from the working directory and apply command-line overrides.
 */
export async function resolveConfig(options: CommonOptions, shingleSize?: number): Promise<Config> {
  const fileConfig = await loadConfig(process.cwd(), options.config);
  return applyOverrides(fileConfig, {
    shingleSize,
    diagnostics: options.verbose ? true : undefined,
  });
}
