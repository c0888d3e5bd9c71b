/**
 * piecewise - WordPiece tokenization over an immutable, prunable vocabulary
 *
 * @module piecewise
 */

export const VERSION = '0.1.0';

// Vocabulary
export {
  Vocabulary,
  buildVocabulary,
  resolveVocabularyOptions,
  PINNED,
  counted,
  isPinned,
} from './vocabulary/index.js';
export type {
  Frequency,
  TokenInfo,
  VocabularyData,
  VocabularyLookup,
  VocabularyOptions,
  ResolvedVocabularyOptions,
} from './vocabulary/index.js';

// Tokenizers
export { WordPieceTokenizer, splitWords } from './tokenizers/index.js';
export type { SplitMode, TokenizerBackend, WordPieceTokenizerOptions } from './tokenizers/index.js';

// Vocabulary sources
export {
  parseVocabularyText,
  readVocabularyFile,
  fetchVocabulary,
  loadVocabularyWith,
  loadVocabularyFromFile,
} from './io/index.js';
export type { ReadLinesOptions } from './io/index.js';

// Errors
export { ERROR_CODES, createPiecewiseError, isPiecewiseError } from './errors/piecewise-error.js';
export type { PiecewiseError, PiecewiseErrorCode } from './errors/piecewise-error.js';

// Config
export { getRuntimeConfig, setRuntimeConfig, resetRuntimeConfig } from './config/runtime.js';
export { validateRuntimeConfig } from './config/validate.js';
export {
  createRuntimeConfig,
  DEFAULT_RUNTIME_CONFIG,
  DEFAULT_TOKENIZER_DEFAULTS,
  DEFAULT_VOCABULARY_DEFAULTS,
  DEFAULT_DEBUG_CONFIG,
} from './config/schema/index.js';
export type {
  RuntimeConfigSchema,
  RuntimeConfigOverrides,
  TokenizerDefaultsSchema,
  VocabularyDefaultsSchema,
  DebugConfigSchema,
} from './config/schema/index.js';

// Logging
export {
  log,
  setLogLevel,
  getLogLevel,
  enableModules,
  disableModules,
  resetModuleFilters,
  getLogHistory,
  clearLogHistory,
  getDebugSnapshot,
} from './debug/index.js';
export type { LogEntry, LogHistoryFilter, DebugSnapshot } from './debug/index.js';
