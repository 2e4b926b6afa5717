/**
 * Grammar exports.
 */
export { loadKeywordCatalog, resolveKeywordSet } from './keywords.js';
export { GrammarRegistry, GRAMMAR_SHAPES } from './registry.js';
export type { GrammarShape } from './registry.js';
export type { LanguageGrammar, BlockCommentRule, KeywordCatalog } from './types.js';
