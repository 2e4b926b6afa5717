/**
 * Fingerprinter exports.
 */
export {
  fingerprint,
  hashShingle,
  assertShingleSize,
  DEFAULT_SHINGLE_SIZE,
  SHINGLE_SEPARATOR,
} from './fingerprinter.js';
export type { FingerprintSet } from './fingerprinter.js';
