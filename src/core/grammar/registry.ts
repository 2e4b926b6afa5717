/**
 * Extension → grammar mapping.
 */
import * as path from 'node:path';
import type { BlockCommentRule, LanguageGrammar } from './types.js';

const C_BLOCK: BlockCommentRule = { open: '/*', close: '*/' };

export interface GrammarShape {
  name: string;
  extensions: string[];
  lineComments: string[];
  blockComments: BlockCommentRule[];
}

/**
 * Comment syntax per language family.
 * Extensions not listed here fall back to the c-family grammar.
 */
export const GRAMMAR_SHAPES: readonly GrammarShape[] = [
  {
    name: 'c-family',
    extensions: ['.java', '.c', '.cpp', '.h', '.hpp', '.js', '.jsx', '.ts', '.tsx', '.cs', '.go'],
    lineComments: ['//'],
    blockComments: [C_BLOCK],
  },
  {
    name: 'hash',
    extensions: ['.py', '.rb'],
    lineComments: ['#'],
    blockComments: [],
  },
  {
    name: 'php',
    extensions: ['.php'],
    lineComments: ['//', '#'],
    blockComments: [C_BLOCK],
  },
];

const FALLBACK_SHAPE = 'c-family';

/**
 * Resolves the grammar for a file path.
 * Every grammar shares one reserved-word set.
 */
export class GrammarRegistry {
  private readonly byExtension = new Map<string, LanguageGrammar>();
  private readonly fallback: LanguageGrammar;

  constructor(keywords: ReadonlySet<string>, shapes: readonly GrammarShape[] = GRAMMAR_SHAPES) {
    let fallback: LanguageGrammar | undefined;

    for (const shape of shapes) {
      const grammar: LanguageGrammar = { ...shape, keywords };
      for (const ext of shape.extensions) {
        this.byExtension.set(ext.toLowerCase(), grammar);
      }
      if (shape.name === FALLBACK_SHAPE) fallback = grammar;
    }

    this.fallback = fallback ?? {
      name: FALLBACK_SHAPE,
      extensions: [],
      lineComments: ['//'],
      blockComments: [C_BLOCK],
      keywords,
    };
  }

  /**
   * Grammar for a file, chosen by its lowercase extension.
   */
  forFile(filePath: string): LanguageGrammar {
    return this.byExtension.get(path.extname(filePath).toLowerCase()) ?? this.fallback;
  }

  get keywords(): ReadonlySet<string> {
    return this.fallback.keywords;
  }
}
