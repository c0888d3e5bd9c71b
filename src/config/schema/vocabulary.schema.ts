/**
 * Vocabulary Config Schema
 *
 * Defaults applied when a vocabulary is built without explicit pruning or
 * unknown-token options.
 *
 * @module config/schema/vocabulary
 */

/**
 * Vocabulary build defaults.
 *
 * A minFrequency below 2 and a maxTokens of 0 or less disable the matching
 * pruning pass.
 */
export interface VocabularyDefaultsSchema {
  /** Tokens seen fewer times than this are pruned (-1 = disabled) */
  minFrequency: number;

  /** Keep only this many most frequent tokens (-1 = disabled) */
  maxTokens: number;

  /** Fallback token for lookups of unmapped tokens (null = lookups fail) */
  unknownToken: string | null;

  /** Tokens that always survive pruning */
  reservedTokens: string[];

  /** Token used when an unknown token is requested without naming one */
  defaultUnknownToken: string;
}

/** Default vocabulary configuration */
export const DEFAULT_VOCABULARY_DEFAULTS: VocabularyDefaultsSchema = {
  minFrequency: -1,
  maxTokens: -1,
  unknownToken: null,
  reservedTokens: [],
  defaultUnknownToken: '<unk>',
};
