/**
 * Word Splitting
 *
 * Cuts text into the words fed to subword segmentation. No normalization
 * (case folding, accent stripping, punctuation splitting) happens here.
 *
 * @module tokenizers/pretokenize
 */

import type { SplitMode } from './types.js';

const WHITESPACE_RUN = /\s+/;

/**
 * Split trimmed text into words.
 *
 * In `space` mode every single space is a boundary, so consecutive spaces
 * produce empty words; tabs and newlines stay inside words.
 */
export function splitWords(text: string, mode: SplitMode = 'space'): string[] {
  const trimmed = text.trim();
  if (mode === 'whitespace') {
    return trimmed === '' ? [] : trimmed.split(WHITESPACE_RUN);
  }
  return trimmed.split(' ');
}
