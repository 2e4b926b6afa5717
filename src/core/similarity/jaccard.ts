/**
 * Jaccard similarity over fingerprint sets.
 */
import type { FingerprintSet } from '../fingerprint/fingerprinter.js';

/**
 * Score returned when either set is empty, including when both are.
 * An empty file carries no structure, so it matches nothing.
 */
export const EMPTY_SET_SIMILARITY = 0;

/**
 * |X ∩ Y| / |X ∪ Y|.
 */
export function jaccard(x: FingerprintSet, y: FingerprintSet): number {
  if (x.size === 0 || y.size === 0) return EMPTY_SET_SIMILARITY;

  const [smaller, larger] = x.size <= y.size ? [x, y] : [y, x];
  let intersection = 0;
  for (const fp of smaller) {
    if (larger.has(fp)) intersection++;
  }

  return intersection / (x.size + y.size - intersection);
}
