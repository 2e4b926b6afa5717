/**
 * Lexical tokenizer for heterogeneous source text.
 *
 * A single left-to-right scan with no backtracking. At each position the
 * alternatives are tried in this order:
 *   whitespace → comment → string literal → number → identifier/keyword
 *   → multi-character operator → single-character symbol
 * Comments are consumed and never emitted. Characters that match nothing
 * (e.g. `@`, `$`, non-ASCII text) are skipped.
 */
import type { LanguageGrammar } from '../grammar/types.js';
import type { Token } from './types.js';

/** Multi-character operators, longest first so matching is greedy. */
export const MULTI_CHAR_OPERATORS: readonly string[] = [
  '>>>=',
  '===', '!==', '>>>', '**=', '<<=', '>>=', '...',
  '==', '!=', '<=', '>=', '&&', '||', '++', '--', '->', '=>', ':=', '::',
  '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '**', '<<', '>>', '??', '?.',
];

const SINGLE_CHAR_SYMBOLS = new Set('~!%^&*()+={}[]|\\:;<>,.?/-');

const QUOTES = new Set(['"', "'", '`']);

const NUMBER_GRAMMAR = /^(?:\d+\.\d+|\d+)$/;
const IDENTIFIER_GRAMMAR = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isNumberText(text: string): boolean {
  return NUMBER_GRAMMAR.test(text);
}

export function isIdentifierText(text: string): boolean {
  return IDENTIFIER_GRAMMAR.test(text);
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f' || ch === '\v';
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isIdentStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

function isIdentPart(ch: string): boolean {
  return isIdentStart(ch) || isDigit(ch);
}

/**
 * Index just past the comment starting at `pos`, or -1 if none starts there.
 * Unterminated block comments run to end of input.
 */
function matchComment(text: string, pos: number, grammar: LanguageGrammar): number {
  for (const rule of grammar.blockComments) {
    if (text.startsWith(rule.open, pos)) {
      const close = text.indexOf(rule.close, pos + rule.open.length);
      return close === -1 ? text.length : close + rule.close.length;
    }
  }

  for (const marker of grammar.lineComments) {
    if (text.startsWith(marker, pos)) {
      const newline = text.indexOf('\n', pos + marker.length);
      return newline === -1 ? text.length : newline;
    }
  }

  return -1;
}

/**
 * Index just past the string literal opened at `pos`.
 * `"` and `'` literals stop at an unescaped newline; backtick literals may
 * span lines. Unterminated literals end at end of line or input.
 */
function matchString(text: string, pos: number): number {
  const quote = text[pos];
  const multiline = quote === '`';
  let i = pos + 1;

  while (i < text.length) {
    const ch = text[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === quote) return i + 1;
    if (ch === '\n' && !multiline) return i;
    i++;
  }

  return text.length;
}

function matchNumber(text: string, pos: number): number {
  let i = pos;
  while (i < text.length && isDigit(text[i])) i++;
  if (text[i] === '.' && i + 1 < text.length && isDigit(text[i + 1])) {
    i++;
    while (i < text.length && isDigit(text[i])) i++;
  }
  return i;
}

function matchIdentifier(text: string, pos: number): number {
  let i = pos + 1;
  while (i < text.length && isIdentPart(text[i])) i++;
  return i;
}

function matchOperator(text: string, pos: number): string | null {
  for (const op of MULTI_CHAR_OPERATORS) {
    if (text.startsWith(op, pos)) return op;
  }
  return null;
}

/**
 * Lazily scan tokens from source text.
 * Callers that cap token counts can stop iterating early.
 */
export function* scanTokens(text: string, grammar: LanguageGrammar): Generator<Token> {
  let pos = 0;

  while (pos < text.length) {
    const ch = text[pos];

    if (isWhitespace(ch)) {
      pos++;
      continue;
    }

    const commentEnd = matchComment(text, pos, grammar);
    if (commentEnd !== -1) {
      pos = commentEnd;
      continue;
    }

    if (QUOTES.has(ch)) {
      const end = matchString(text, pos);
      yield { kind: 'string', text: text.slice(pos, end) };
      pos = end;
      continue;
    }

    if (isDigit(ch)) {
      const end = matchNumber(text, pos);
      yield { kind: 'number', text: text.slice(pos, end) };
      pos = end;
      continue;
    }

    if (isIdentStart(ch)) {
      const end = matchIdentifier(text, pos);
      const word = text.slice(pos, end);
      yield { kind: grammar.keywords.has(word) ? 'keyword' : 'identifier', text: word };
      pos = end;
      continue;
    }

    const op = matchOperator(text, pos);
    if (op) {
      yield { kind: 'symbol', text: op };
      pos += op.length;
      continue;
    }

    if (SINGLE_CHAR_SYMBOLS.has(ch)) {
      yield { kind: 'symbol', text: ch };
    }
    pos++;
  }
}

/**
 * Tokenize source text into an ordered token list. Comments are dropped.
 */
export function tokenize(text: string, grammar: LanguageGrammar): Token[] {
  return Array.from(scanTokens(text, grammar));
}
