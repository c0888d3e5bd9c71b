/**
 * Vocabulary
 *
 * Immutable bidirectional mapping between token strings and dense indices.
 * Built once by buildVocabulary(); read-only afterwards, so one instance can
 * be shared by any number of tokenizers.
 *
 * @module vocabulary/vocabulary
 */

import { ERROR_CODES, createPiecewiseError } from '../errors/piecewise-error.js';
import { assembleVocabularyData, type VocabularyData } from './builder.js';
import type { Frequency, TokenInfo, VocabularyLookup, VocabularyOptions } from './types.js';

export class Vocabulary implements VocabularyLookup {
  private readonly entries: ReadonlyMap<string, TokenInfo>;
  private readonly indexToToken: readonly string[];
  private readonly reservedTokens: ReadonlySet<string>;
  private readonly unknownToken: string | null;

  constructor(data: VocabularyData) {
    this.entries = data.tokens;
    this.indexToToken = data.indexToToken;
    this.reservedTokens = data.reservedTokens;
    this.unknownToken = data.unknownToken;
  }

  /**
   * Build from a single ordered token list, e.g. the lines of a vocab file.
   */
  static fromTokens(tokens: readonly string[], options: Omit<VocabularyOptions, 'sentences'> = {}): Vocabulary {
    return buildVocabulary({ ...options, sentences: [tokens] });
  }

  contains(token: string): boolean {
    return this.entries.has(token);
  }

  getToken(index: number): string | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.indexToToken.length) {
      return this.unknownToken;
    }
    return this.indexToToken[index];
  }

  getIndex(token: string): number {
    const info = this.entries.get(token);
    if (info) {
      return info.index;
    }

    if (this.unknownToken !== null) {
      const unknown = this.entries.get(this.unknownToken);
      if (unknown) {
        return unknown.index;
      }
    }

    throw createPiecewiseError(
      ERROR_CODES.VOCAB_UNDEFINED_TOKEN,
      `Unexpected token in getIndex: '${token}'. Define an unknownToken for the vocabulary to enable support for unknown tokens.`,
      { token }
    );
  }

  size(): number {
    return this.entries.size;
  }

  /**
   * Frequency recorded for `token` during the build, or null if absent.
   */
  getFrequency(token: string): Frequency | null {
    return this.entries.get(token)?.frequency ?? null;
  }

  getUnknownToken(): string | null {
    return this.unknownToken;
  }

  getReservedTokens(): ReadonlySet<string> {
    return this.reservedTokens;
  }

  /** Tokens in index order */
  tokens(): Iterable<string> {
    return this.indexToToken.values();
  }
}

/**
 * Build a vocabulary from sentences and pruning options.
 *
 * @throws PIECEWISE_VOCAB_INVALID_CONFIG when maxTokens is positive but
 *   smaller than the reserved-token count
 */
export function buildVocabulary(options: VocabularyOptions = {}): Vocabulary {
  return new Vocabulary(assembleVocabularyData(options));
}
