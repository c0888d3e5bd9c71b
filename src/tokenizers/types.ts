/**
 * Tokenizer Types and Interfaces
 *
 * @module tokenizers/types
 */

import type { SplitMode } from '../config/schema/index.js';

export type { SplitMode };

/** WordPiece tokenizer options; omitted fields come from the runtime config */
export interface WordPieceTokenizerOptions {
  /** Emitted in place of a word that is too long or cannot be segmented */
  unknownPlaceholder?: string;
  /** Longest word (UTF-16 code units) that is segmented */
  maxInputChars?: number;
  /** Prefix marking non-initial pieces, "##" by default */
  continuationPrefix?: string;
  /** Word splitting before segmentation */
  splitMode?: SplitMode;
}

/** Tokenizer Backend Interface */
export interface TokenizerBackend {
  /** Split text into vocabulary tokens */
  tokenize(text: string): string[];
  /** Map tokens to vocabulary indices */
  tokenToIds(tokens: readonly string[]): number[];
  /** Encode text to token IDs */
  encode(text: string): number[];
  /** Decode token IDs to text */
  decode(ids: readonly number[]): string;
  /** Get vocabulary size */
  getVocabSize(): number;
}
