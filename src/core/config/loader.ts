import * as path from 'node:path';
import { ConfigSchema, ConfigFileSchema, type Config } from './schema.js';
import { loadYamlWithSchema, formatZodError } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { assertShingleSize } from '../fingerprint/fingerprinter.js';

const DEFAULT_CONFIG_PATH = '.codeprint/config.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the default config file doesn't exist; an
 * explicitly named file must exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : path.resolve(projectRoot, DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.INVALID_CONFIG,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    return getDefaultConfig();
  }

  return loadYamlWithSchema(fullPath, ConfigFileSchema);
}

/**
 * Command-line values that take precedence over the config file.
 */
export interface ConfigOverrides {
  shingleSize?: number;
  diagnostics?: boolean;
}

/**
 * Apply overrides and re-validate.
 */
export function applyOverrides(config: Config, overrides: ConfigOverrides): Config {
  if (overrides.shingleSize !== undefined) {
    assertShingleSize(overrides.shingleSize);
  }

  const merged = {
    ...config,
    shingle_size: overrides.shingleSize ?? config.shingle_size,
    diagnostics: overrides.diagnostics ?? config.diagnostics,
  };

  return mergeConfig(merged);
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: Partial<Config>): Config {
  const result = ConfigSchema.safeParse(partial);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_CONFIG,
      `Invalid configuration: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return result.data;
}

/**
 * Get the expected config file path for a project.
 */
export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}
