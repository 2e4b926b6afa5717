/**
 * Token types produced by the tokenizer.
 */

export type TokenKind = 'keyword' | 'identifier' | 'number' | 'string' | 'symbol';

/**
 * A classified lexical unit and its raw source text.
 */
export interface Token {
  kind: TokenKind;
  text: string;
}
