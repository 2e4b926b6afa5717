/**
 * Number formatting helpers shared by the report builder and CLI output.
 */

/**
 * Round to a fixed number of decimal places.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Convert a 0-1 ratio to a percentage rounded to two decimals.
 */
export function toPercent(ratio: number): number {
  return roundTo(ratio * 100, 2);
}
