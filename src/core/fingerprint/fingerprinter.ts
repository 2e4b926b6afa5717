/**
 * k-gram shingle fingerprinting.
 */
import { createHash } from 'node:crypto';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_SHINGLE_SIZE = 5;

/** U+241F SYMBOL FOR UNIT SEPARATOR; the tokenizer never emits it. */
export const SHINGLE_SEPARATOR = '␟';

export type FingerprintSet = ReadonlySet<string>;

/**
 * Reject shingle sizes that are not positive integers.
 */
export function assertShingleSize(k: number): void {
  if (!Number.isInteger(k) || k < 1) {
    throw new ConfigError(
      ErrorCodes.INVALID_SHINGLE_SIZE,
      `Shingle size must be an integer >= 1 (got ${k})`,
      { k }
    );
  }
}

/**
 * SHA-1 hex digest of a shingle's joined tokens.
 */
export function hashShingle(tokens: readonly string[]): string {
  return createHash('sha1').update(tokens.join(SHINGLE_SEPARATOR), 'utf8').digest('hex');
}

/**
 * Fingerprint a canonical sequence.
 *
 * One digest per window of k consecutive tokens, collapsed into a set.
 * A non-empty sequence shorter than k yields exactly one digest over the
 * whole sequence; an empty sequence yields an empty set.
 */
export function fingerprint(canonical: readonly string[], k: number = DEFAULT_SHINGLE_SIZE): FingerprintSet {
  assertShingleSize(k);

  const fingerprints = new Set<string>();
  const n = canonical.length;
  if (n === 0) return fingerprints;

  if (n < k) {
    fingerprints.add(hashShingle(canonical));
    return fingerprints;
  }

  for (let i = 0; i <= n - k; i++) {
    fingerprints.add(hashShingle(canonical.slice(i, i + k)));
  }
  return fingerprints;
}
