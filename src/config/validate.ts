/**
 * Runtime Config Validation
 *
 * @module config/validate
 */

import type { RuntimeConfigSchema } from './schema/index.js';
import { LOG_LEVEL_NAMES, SPLIT_MODES } from './schema/index.js';
import { ERROR_CODES, createPiecewiseError } from '../errors/piecewise-error.js';

function invalid(path: string, reason: string, value: unknown): never {
  throw createPiecewiseError(
    ERROR_CODES.CONFIG_INVALID,
    `Invalid config at ${path}: ${reason}`,
    { path, value }
  );
}

function requireInteger(path: string, value: number): void {
  if (!Number.isInteger(value)) {
    invalid(path, 'expected an integer', value);
  }
}

function requireNonEmpty(path: string, value: string): void {
  if (value.length === 0) {
    invalid(path, 'expected a non-empty string', value);
  }
}

/**
 * Throws a PIECEWISE_CONFIG_INVALID error for the first invalid field found.
 */
export function validateRuntimeConfig(config: RuntimeConfigSchema): void {
  const { vocabulary, tokenizer, debug } = config;

  requireInteger('vocabulary.minFrequency', vocabulary.minFrequency);
  requireInteger('vocabulary.maxTokens', vocabulary.maxTokens);
  if (vocabulary.unknownToken !== null) {
    requireNonEmpty('vocabulary.unknownToken', vocabulary.unknownToken);
  }
  requireNonEmpty('vocabulary.defaultUnknownToken', vocabulary.defaultUnknownToken);

  requireNonEmpty('tokenizer.unknownPlaceholder', tokenizer.unknownPlaceholder);
  requireNonEmpty('tokenizer.continuationPrefix', tokenizer.continuationPrefix);
  requireInteger('tokenizer.maxInputChars', tokenizer.maxInputChars);
  if (tokenizer.maxInputChars < 1) {
    invalid('tokenizer.maxInputChars', 'must be at least 1', tokenizer.maxInputChars);
  }
  if (!SPLIT_MODES.includes(tokenizer.splitMode)) {
    invalid('tokenizer.splitMode', `expected one of ${SPLIT_MODES.join(', ')}`, tokenizer.splitMode);
  }

  requireInteger('debug.logHistory.maxLogHistoryEntries', debug.logHistory.maxLogHistoryEntries);
  if (debug.logHistory.maxLogHistoryEntries < 0) {
    invalid('debug.logHistory.maxLogHistoryEntries', 'must not be negative', debug.logHistory.maxLogHistoryEntries);
  }
  if (!LOG_LEVEL_NAMES.includes(debug.logLevel.defaultLogLevel)) {
    invalid('debug.logLevel.defaultLogLevel', `expected one of ${LOG_LEVEL_NAMES.join(', ')}`, debug.logLevel.defaultLogLevel);
  }
}
