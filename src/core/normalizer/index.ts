/**
 * Normalizer exports.
 */
export { normalize, canonicalize, STRING_PLACEHOLDER, NUMBER_PLACEHOLDER } from './normalizer.js';
export type { NormalizationResult } from './normalizer.js';
export { NormalizationContext, createNormalizationContext } from './context.js';
