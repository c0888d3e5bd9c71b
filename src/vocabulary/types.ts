/**
 * Vocabulary Types and Interfaces
 *
 * @module vocabulary/types
 */

import type { Frequency } from './frequency.js';

export type { Frequency };

/**
 * Read-only token/index lookup that tokenizers depend on.
 */
export interface VocabularyLookup {
  /**
   * Token at `index`, or the unknown token when `index` is outside [0, size).
   * Null when out of range and no unknown token is configured.
   */
  getToken(index: number): string | null;

  /** True iff `token` has an entry */
  contains(token: string): boolean;

  /**
   * Index of `token`, or of the unknown token when `token` has no entry.
   * Throws PIECEWISE_VOCAB_UNDEFINED_TOKEN when neither exists.
   */
  getIndex(token: string): number;

  /** Number of entries */
  size(): number;
}

/** Build options for a vocabulary */
export interface VocabularyOptions {
  /** Ordered token sequences; first occurrence fixes the initial index */
  sentences?: ReadonlyArray<readonly string[]>;

  /** Tokens that always survive pruning */
  reservedTokens?: Iterable<string>;

  /** Prune tokens seen fewer times than this (disabled below 2) */
  minFrequency?: number;

  /** Keep at most this many tokens, most frequent first (disabled at 0 or less) */
  maxTokens?: number;

  /** Fallback for lookups of unmapped tokens; always reserved */
  unknownToken?: string | null;

  /**
   * Use the configured default unknown token ("<unk>") when unknownToken is
   * not given.
   */
  requestUnknownToken?: boolean;
}

/** Per-token entry in a built vocabulary */
export interface TokenInfo {
  readonly index: number;
  readonly frequency: Frequency;
}
