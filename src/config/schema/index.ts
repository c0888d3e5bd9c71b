/**
 * Config Schema Index
 *
 * @module config/schema
 */

export {
  type LogHistoryConfigSchema,
  type LogLevelConfigSchema,
  type LogLevelName,
  type DebugConfigSchema,
  LOG_LEVEL_NAMES,
  DEFAULT_LOG_HISTORY_CONFIG,
  DEFAULT_LOG_LEVEL_CONFIG,
  DEFAULT_DEBUG_CONFIG,
} from './debug.schema.js';

export {
  type VocabularyDefaultsSchema,
  DEFAULT_VOCABULARY_DEFAULTS,
} from './vocabulary.schema.js';

export {
  type SplitMode,
  type TokenizerDefaultsSchema,
  SPLIT_MODES,
  DEFAULT_TOKENIZER_DEFAULTS,
} from './tokenizer.schema.js';

export {
  type RuntimeConfigSchema,
  type RuntimeConfigOverrides,
  DEFAULT_RUNTIME_CONFIG,
  createRuntimeConfig,
} from './runtime.schema.js';
