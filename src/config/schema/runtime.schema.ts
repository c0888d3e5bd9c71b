/**
 * Runtime Config Schema
 *
 * Master configuration that composes the per-domain schemas. Individual
 * schemas stay importable for subsystems that only need their own domain.
 *
 * @module config/schema/runtime
 */

import type { DebugConfigSchema } from './debug.schema.js';
import type { TokenizerDefaultsSchema } from './tokenizer.schema.js';
import type { VocabularyDefaultsSchema } from './vocabulary.schema.js';

import { DEFAULT_DEBUG_CONFIG } from './debug.schema.js';
import { DEFAULT_TOKENIZER_DEFAULTS } from './tokenizer.schema.js';
import { DEFAULT_VOCABULARY_DEFAULTS } from './vocabulary.schema.js';

// =============================================================================
// Runtime Config
// =============================================================================

export interface RuntimeConfigSchema {
  /** Pruning and unknown-token defaults */
  vocabulary: VocabularyDefaultsSchema;

  /** Placeholder, character cap, continuation prefix, split mode */
  tokenizer: TokenizerDefaultsSchema;

  /** Logging */
  debug: DebugConfigSchema;
}

/** Default runtime configuration */
export const DEFAULT_RUNTIME_CONFIG: RuntimeConfigSchema = {
  vocabulary: DEFAULT_VOCABULARY_DEFAULTS,
  tokenizer: DEFAULT_TOKENIZER_DEFAULTS,
  debug: DEFAULT_DEBUG_CONFIG,
};

/**
 * Partial overrides, one level deeper than Partial<RuntimeConfigSchema> so a
 * caller can set a single field of a nested section.
 */
export interface RuntimeConfigOverrides {
  vocabulary?: Partial<VocabularyDefaultsSchema>;
  tokenizer?: Partial<TokenizerDefaultsSchema>;
  debug?: {
    logHistory?: Partial<DebugConfigSchema['logHistory']>;
    logLevel?: Partial<DebugConfigSchema['logLevel']>;
  };
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Create a runtime configuration with optional overrides.
 *
 * Missing sections and fields fall back to the defaults. Arrays are replaced,
 * not concatenated.
 *
 * @example
 * ```typescript
 * const config = createRuntimeConfig({
 *   tokenizer: { maxInputChars: 100 },
 *   debug: { logLevel: { defaultLogLevel: 'warn' } },
 * });
 * ```
 */
export function createRuntimeConfig(overrides?: RuntimeConfigOverrides): RuntimeConfigSchema {
  const base = DEFAULT_RUNTIME_CONFIG;
  if (!overrides) {
    return {
      vocabulary: { ...base.vocabulary, reservedTokens: [...base.vocabulary.reservedTokens] },
      tokenizer: { ...base.tokenizer },
      debug: {
        logHistory: { ...base.debug.logHistory },
        logLevel: { ...base.debug.logLevel },
      },
    };
  }

  const vocabulary = { ...base.vocabulary, ...overrides.vocabulary };
  return {
    vocabulary: { ...vocabulary, reservedTokens: [...vocabulary.reservedTokens] },
    tokenizer: { ...base.tokenizer, ...overrides.tokenizer },
    debug: {
      logHistory: { ...base.debug.logHistory, ...overrides.debug?.logHistory },
      logLevel: { ...base.debug.logLevel, ...overrides.debug?.logLevel },
    },
  };
}
