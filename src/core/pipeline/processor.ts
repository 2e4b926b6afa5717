/**
 * Per-file transform: raw bytes → fingerprint set.
 * Pure apart from the file read in processFile.
 */
import * as path from 'node:path';
import { readFileBounded, type BoundedRead } from '../../utils/file-system.js';
import { SystemError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import type { LanguageGrammar } from '../grammar/types.js';
import { scanTokens } from '../tokenizer/tokenizer.js';
import type { Token } from '../tokenizer/types.js';
import { normalize } from '../normalizer/normalizer.js';
import { fingerprint } from '../fingerprint/fingerprinter.js';
import type { CollectionId } from '../similarity/types.js';
import type { ProcessedFile, RunSettings } from './types.js';

/** Bytes inspected when sniffing for binary content. */
const BINARY_SNIFF_BYTES = 8000;

export interface ProcessOptions {
  shingleSize: number;
  previewTokens: number;
  maxTokens: number;
}

/**
 * True when the leading bytes contain a NUL byte.
 */
export function looksBinary(buffer: Buffer): boolean {
  return buffer.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

/**
 * Decode UTF-8, replacing invalid sequences with U+FFFD. Strips a BOM.
 */
export function decodeSource(buffer: Buffer): string {
  const text = buffer.toString('utf-8');
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function collectTokens(text: string, grammar: LanguageGrammar, maxTokens: number): { tokens: Token[]; truncated: boolean } {
  const tokens: Token[] = [];
  for (const token of scanTokens(text, grammar)) {
    if (tokens.length >= maxTokens) {
      return { tokens, truncated: true };
    }
    tokens.push(token);
  }
  return { tokens, truncated: false };
}

/**
 * Tokenize, normalize and fingerprint one file's text.
 */
export function processSource(
  collection: CollectionId,
  filePath: string,
  text: string,
  grammar: LanguageGrammar,
  options: ProcessOptions
): ProcessedFile {
  const { tokens, truncated } = collectTokens(text, grammar, options.maxTokens);
  const { canonical, context } = normalize(tokens, grammar.keywords);
  const fingerprints = fingerprint(canonical, options.shingleSize);

  return {
    collection,
    path: filePath,
    fingerprints,
    normCount: canonical.length,
    rawTokenCount: tokens.length,
    identifierMap: context.toRecord(),
    preview: canonical.slice(0, options.previewTokens),
    truncated,
  };
}

/**
 * Read and process a file under a collection root.
 * Throws SystemError (S002, S003, S004) for files that must be skipped.
 */
export async function processFile(
  collection: CollectionId,
  root: string,
  relPath: string,
  settings: RunSettings
): Promise<ProcessedFile> {
  const absolutePath = path.resolve(root, relPath);

  let read: BoundedRead;
  try {
    read = await readFileBounded(absolutePath, settings.maxFileBytes);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.READ_ERROR,
      `Failed to read file: ${errorMessage(error)}`,
      { file: relPath }
    );
  }

  const { buffer, size } = read;
  if (buffer === null) {
    throw new SystemError(
      ErrorCodes.FILE_TOO_LARGE,
      `File exceeds ${settings.maxFileBytes} bytes (${size})`,
      { file: relPath, size }
    );
  }

  if (looksBinary(buffer)) {
    throw new SystemError(
      ErrorCodes.BINARY_CONTENT,
      'File looks binary (NUL byte found)',
      { file: relPath }
    );
  }

  return processSource(collection, relPath, decodeSource(buffer), settings.grammars.forFile(relPath), {
    shingleSize: settings.shingleSize,
    previewTokens: settings.previewTokens,
    maxTokens: settings.maxTokensPerFile,
  });
}
