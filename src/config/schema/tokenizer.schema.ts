/**
 * Tokenizer Config Schema
 *
 * Runtime defaults for the wordpiece tokenizer. A tokenizer constructed with
 * explicit options ignores the matching defaults.
 *
 * @module config/schema/tokenizer
 */

/**
 * How input text is cut into words before subword segmentation.
 *
 * - `space`: trim, then split on every single U+0020 (empty words emit nothing)
 * - `whitespace`: trim, then split on runs of any whitespace
 */
export type SplitMode = 'space' | 'whitespace';

export const SPLIT_MODES: readonly SplitMode[] = ['space', 'whitespace'];

export interface TokenizerDefaultsSchema {
  /** Emitted for a word that is too long or cannot be segmented */
  unknownPlaceholder: string;

  /** Words longer than this (UTF-16 code units) become a single placeholder */
  maxInputChars: number;

  /** Prefix that marks non-initial pieces of a word */
  continuationPrefix: string;

  splitMode: SplitMode;
}

/** Default tokenizer configuration (BERT conventions) */
export const DEFAULT_TOKENIZER_DEFAULTS: TokenizerDefaultsSchema = {
  unknownPlaceholder: '[UNK]',
  maxInputChars: 200,
  continuationPrefix: '##',
  splitMode: 'space',
};
