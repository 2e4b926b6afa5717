/**
 * Canonical, identifier-blind rewriting of token sequences.
 */
import type { Token } from '../tokenizer/types.js';
import { isIdentifierText, isNumberText } from '../tokenizer/tokenizer.js';
import { NormalizationContext, createNormalizationContext } from './context.js';

export const STRING_PLACEHOLDER = 'STR';
export const NUMBER_PLACEHOLDER = 'NUM';

export interface NormalizationResult {
  canonical: string[];
  context: NormalizationContext;
}

/**
 * Rewrite one token into its canonical form.
 *
 * Rules, first match wins:
 * 1. string/template literal → STR
 * 2. reserved keyword → verbatim
 * 3. numeric literal → NUM
 * 4. identifier → symbolic name from the context
 * 5. anything else → verbatim
 */
export function canonicalize(
  token: Token,
  keywords: ReadonlySet<string>,
  context: NormalizationContext
): string {
  if (token.kind === 'string') return STRING_PLACEHOLDER;
  if (keywords.has(token.text)) return token.text;
  if (isNumberText(token.text)) return NUMBER_PLACEHOLDER;
  if (isIdentifierText(token.text)) return context.rename(token.text);
  return token.text;
}

/**
 * Normalize a file's tokens with a fresh rename context.
 * Pass an explicit context only to continue a file split across calls.
 */
export function normalize(
  tokens: readonly Token[],
  keywords: ReadonlySet<string>,
  context: NormalizationContext = createNormalizationContext()
): NormalizationResult {
  const canonical = tokens.map((token) => canonicalize(token, keywords, context));
  return { canonical, context };
}
