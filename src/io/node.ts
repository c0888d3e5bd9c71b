/**
 * node.ts - Node.js vocabulary sources
 *
 * Reads newline-delimited vocabulary files from disk or over HTTP(S). These
 * sit outside tokenization itself, which only needs an ordered token list.
 *
 * @module io/node
 */

import { readFile } from 'fs/promises';
import { log } from '../debug/index.js';
import { ERROR_CODES, createPiecewiseError } from '../errors/piecewise-error.js';
import { buildVocabulary, type Vocabulary } from '../vocabulary/vocabulary.js';
import type { VocabularyOptions } from '../vocabulary/types.js';
import { parseVocabularyText, type ReadLinesOptions } from './text.js';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && Reflect.get(error, 'code') === 'ENOENT';
}

/**
 * Read a vocabulary file. A file that does not exist reads as empty.
 */
export async function readVocabularyFile(path: string, options: ReadLinesOptions = {}): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      log.warn('IO', `Vocabulary file not found, reading as empty: ${path}`);
      return [];
    }
    throw error;
  }
  const tokens = parseVocabularyText(text, options);
  log.debug('IO', `Read ${tokens.length} tokens from ${path}`);
  return tokens;
}

/**
 * Fetch a vocabulary over HTTP(S).
 */
export async function fetchVocabulary(url: string | URL, options: ReadLinesOptions = {}): Promise<string[]> {
  const response = await fetch(url);
  if (!response.ok) {
    throw createPiecewiseError(
      ERROR_CODES.SOURCE_UNREADABLE,
      `Failed to fetch vocabulary ${String(url)}: ${response.status} ${response.statusText}`,
      { url: String(url), status: response.status }
    );
  }
  const tokens = parseVocabularyText(await response.text(), options);
  log.debug('IO', `Fetched ${tokens.length} tokens from ${String(url)}`);
  return tokens;
}

/**
 * Load tokens through a caller-supplied parser, for formats other than one
 * token per line.
 */
export async function loadVocabularyWith<S>(
  source: S,
  parser: (source: S) => readonly string[] | Promise<readonly string[]>
): Promise<string[]> {
  return [...(await parser(source))];
}

/**
 * Read a vocabulary file and build a Vocabulary from its lines.
 */
export async function loadVocabularyFromFile(
  path: string,
  options: Omit<VocabularyOptions, 'sentences'> = {}
): Promise<Vocabulary> {
  const tokens = await readVocabularyFile(path);
  return buildVocabulary({ ...options, sentences: [tokens] });
}
