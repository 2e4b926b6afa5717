/**
 * Per-file identifier rename table.
 */

const SYMBOL_PREFIX = 'ID';

/**
 * Maps original identifiers to symbolic names (ID1, ID2, …) in
 * first-occurrence order. One context belongs to exactly one file.
 */
export class NormalizationContext {
  private readonly renames = new Map<string, string>();
  private nextId = 1;

  /**
   * Symbolic name for an identifier, allocating the next one on first use.
   */
  rename(identifier: string): string {
    const existing = this.renames.get(identifier);
    if (existing) return existing;

    const symbol = `${SYMBOL_PREFIX}${this.nextId}`;
    this.nextId++;
    this.renames.set(identifier, symbol);
    return symbol;
  }

  get size(): number {
    return this.renames.size;
  }

  /**
   * The rename table as a plain object, in allocation order.
   */
  toRecord(): Record<string, string> {
    return Object.fromEntries(this.renames);
  }
}

export function createNormalizationContext(): NormalizationContext {
  return new NormalizationContext();
}
