/**
 * Tokenizer exports.
 */
export { tokenize, scanTokens, isNumberText, isIdentifierText, MULTI_CHAR_OPERATORS } from './tokenizer.js';
export type { Token, TokenKind } from './types.js';
