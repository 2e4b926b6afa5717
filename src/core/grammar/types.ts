/**
 * Types for lexical grammars.
 */

/**
 * Delimiters of a block comment, e.g. `/*` and `*\/`.
 */
export interface BlockCommentRule {
  open: string;
  close: string;
}

/**
 * Lexical rules for one language family.
 * Only comment syntax differs between grammars; literal, number,
 * identifier and operator rules are shared.
 */
export interface LanguageGrammar {
  /** Grammar name (e.g. "c-family") */
  name: string;
  /** Lowercase file extensions including the dot */
  extensions: readonly string[];
  /** Markers that start a comment running to end of line */
  lineComments: readonly string[];
  /** Block comment delimiter pairs */
  blockComments: readonly BlockCommentRule[];
  /** Reserved words kept verbatim during normalization */
  keywords: ReadonlySet<string>;
}

/**
 * Named reserved-word lists, as stored in grammars/keywords.json.
 */
export type KeywordCatalog = Record<string, readonly string[]>;
