/**
 * WordPiece Tokenizer
 *
 * Greedy longest-match-first segmentation of whitespace-delimited words into
 * vocabulary pieces. Non-initial pieces carry a continuation prefix ("##").
 * A word that is too long, or that has a position no piece matches, becomes
 * a single unknown placeholder.
 *
 * @module tokenizers/wordpiece
 */

import { getRuntimeConfig } from '../config/runtime.js';
import { log } from '../debug/index.js';
import { ERROR_CODES, createPiecewiseError } from '../errors/piecewise-error.js';
import type { VocabularyLookup } from '../vocabulary/types.js';
import { splitWords } from './pretokenize.js';
import type { SplitMode, TokenizerBackend, WordPieceTokenizerOptions } from './types.js';

export class WordPieceTokenizer implements TokenizerBackend {
  readonly unknownPlaceholder: string;
  readonly maxInputChars: number;
  readonly continuationPrefix: string;
  readonly splitMode: SplitMode;
  private readonly vocabulary: VocabularyLookup;

  constructor(vocabulary: VocabularyLookup, options: WordPieceTokenizerOptions = {}) {
    const defaults = getRuntimeConfig().tokenizer;
    this.vocabulary = vocabulary;
    this.unknownPlaceholder = options.unknownPlaceholder ?? defaults.unknownPlaceholder;
    this.maxInputChars = options.maxInputChars ?? defaults.maxInputChars;
    this.continuationPrefix = options.continuationPrefix ?? defaults.continuationPrefix;
    this.splitMode = options.splitMode ?? defaults.splitMode;

    if (!Number.isInteger(this.maxInputChars) || this.maxInputChars < 1) {
      throw createPiecewiseError(
        ERROR_CODES.CONFIG_INVALID,
        `maxInputChars must be a positive integer, got ${this.maxInputChars}`,
        { maxInputChars: this.maxInputChars }
      );
    }
    if (this.continuationPrefix.length === 0) {
      throw createPiecewiseError(ERROR_CODES.CONFIG_INVALID, 'continuationPrefix must not be empty');
    }

    log.debug(
      'WordPiece',
      `Initialized: vocab=${vocabulary.size()}, unk=${this.unknownPlaceholder}, maxInputChars=${this.maxInputChars}`
    );
  }

  /**
   * Split text into words, then each word into vocabulary pieces.
   */
  tokenize(text: string): string[] {
    const output: string[] = [];
    for (const word of splitWords(text, this.splitMode)) {
      const pieces = this.tokenizeWord(word);
      if (pieces === null) {
        output.push(this.unknownPlaceholder);
      } else {
        output.push(...pieces);
      }
    }
    return output;
  }

  /**
   * Segment one word. Returns null when the word must be replaced by the
   * placeholder, and an empty array for an empty word.
   */
  tokenizeWord(word: string): string[] | null {
    if (word.length > this.maxInputChars) {
      return null;
    }

    const pieces: string[] = [];
    let start = 0;
    while (start < word.length) {
      let end = word.length;
      let match: string | null = null;
      while (start < end) {
        const piece = start > 0
          ? this.continuationPrefix + word.slice(start, end)
          : word.slice(start, end);
        if (this.vocabulary.contains(piece)) {
          match = piece;
          break;
        }
        end--;
      }

      if (match === null) {
        return null;
      }

      pieces.push(match);
      if (pieces.length > this.maxInputChars) {
        throw createPiecewiseError(
          ERROR_CODES.TOKENIZER_INVARIANT,
          `Too many subTokens for: '${word}'`,
          { word, pieces: pieces.length, maxInputChars: this.maxInputChars }
        );
      }
      start = end;
    }
    return pieces;
  }

  /**
   * Map tokens to indices, one per token.
   *
   * @throws PIECEWISE_VOCAB_UNDEFINED_TOKEN for a token the vocabulary cannot
   *   resolve (no entry and no unknown token)
   */
  tokenToIds(tokens: readonly string[]): number[] {
    return tokens.map((token) => this.vocabulary.getIndex(token));
  }

  encode(text: string): number[] {
    return this.tokenToIds(this.tokenize(text));
  }

  /**
   * Map indices back to tokens. Out-of-range ids become the vocabulary's
   * unknown token, or null without one.
   */
  idsToTokens(ids: readonly number[]): Array<string | null> {
    return ids.map((id) => this.vocabulary.getToken(id));
  }

  /**
   * Join tokens with spaces, gluing continuation pieces onto the previous
   * piece. Ids that resolve to null are dropped.
   *
   * Ids carry no word boundaries, so decoding is lossy: a whole word that
   * itself starts with the prefix (`'##b'` in `'a ##b'`) encodes to the same
   * ids as a continuation piece and is glued on (`'ab'`).
   */
  decode(ids: readonly number[]): string {
    let text = '';
    for (const token of this.idsToTokens(ids)) {
      if (token === null) continue;
      if (text.length > 0 && token.startsWith(this.continuationPrefix)) {
        text += token.slice(this.continuationPrefix.length);
      } else {
        text += text.length > 0 ? ` ${token}` : token;
      }
    }
    return text;
  }

  getVocabSize(): number {
    return this.vocabulary.size();
  }
}
