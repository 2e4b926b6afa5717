/**
 * codeprint - structural similarity between two source code collections.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Grammar, tokenizer, normalizer, fingerprinter
export * from './core/grammar/index.js';
export * from './core/tokenizer/index.js';
export * from './core/normalizer/index.js';
export * from './core/fingerprint/index.js';

// Similarity
export * from './core/similarity/index.js';

// File collection, runs and reports
export * from './core/collector/index.js';
export * from './core/pipeline/index.js';
export * from './core/report/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
