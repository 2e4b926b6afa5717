/**
 * Configuration exports.
 */
export { loadConfig, getDefaultConfig, mergeConfig, applyOverrides, getConfigPath } from './loader.js';
export type { ConfigOverrides } from './loader.js';
export {
  ConfigSchema,
  ConfigFileSchema,
  FilesConfigSchema,
  KeywordsConfigSchema,
  LimitsConfigSchema,
  DEFAULT_EXTENSIONS,
  DEFAULT_EXCLUDE_DIRS,
} from './schema.js';
export type { Config, FilesConfig, KeywordsConfig, LimitsConfig } from './schema.js';
