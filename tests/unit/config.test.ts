import { afterEach, describe, expect, it } from 'vitest';
import { fileURLToPath } from 'url';

import {
  DEFAULT_RUNTIME_CONFIG,
  createRuntimeConfig,
} from '../../src/config/schema/index.js';
import { getRuntimeConfig, resetRuntimeConfig, setRuntimeConfig } from '../../src/config/runtime.js';
import { validateRuntimeConfig } from '../../src/config/validate.js';
import { getLogLevel } from '../../src/debug/index.js';
import { ERROR_CODES, createPiecewiseError, isPiecewiseError } from '../../src/errors/piecewise-error.js';
import { loadConfigFile, parseRuntimeOverrides } from '../../cli/config/config-loader.js';

const CONFIG_PATH = fileURLToPath(new URL('../fixtures/config.json', import.meta.url));

function errorCodeOf(fn: () => unknown): string | null {
  try {
    fn();
  } catch (error) {
    return isPiecewiseError(error) ? error.code : 'not-a-piecewise-error';
  }
  return null;
}

describe('config/schema', () => {
  it('creates a copy of the defaults without overrides', () => {
    const config = createRuntimeConfig();

    expect(config).toEqual(DEFAULT_RUNTIME_CONFIG);
    expect(config.tokenizer).not.toBe(DEFAULT_RUNTIME_CONFIG.tokenizer);
    expect(config.vocabulary.reservedTokens).not.toBe(DEFAULT_RUNTIME_CONFIG.vocabulary.reservedTokens);
  });

  it('merges nested overrides field by field', () => {
    const config = createRuntimeConfig({
      tokenizer: { maxInputChars: 100 },
      debug: { logHistory: { maxLogHistoryEntries: 5 } },
    });

    expect(config.tokenizer).toEqual({
      unknownPlaceholder: '[UNK]',
      maxInputChars: 100,
      continuationPrefix: '##',
      splitMode: 'space',
    });
    expect(config.debug.logHistory.maxLogHistoryEntries).toBe(5);
    expect(config.debug.logLevel.defaultLogLevel).toBe('info');
    expect(config.vocabulary).toEqual(DEFAULT_RUNTIME_CONFIG.vocabulary);
  });
});

describe('config/runtime', () => {
  afterEach(() => {
    resetRuntimeConfig();
  });

  it('applies overrides and resets to defaults', () => {
    setRuntimeConfig({ vocabulary: { unknownToken: '[UNK]' } });
    expect(getRuntimeConfig().vocabulary.unknownToken).toBe('[UNK]');

    resetRuntimeConfig();
    expect(getRuntimeConfig().vocabulary.unknownToken).toBeNull();
  });

  it('applies the configured log level', () => {
    setRuntimeConfig({ debug: { logLevel: { defaultLogLevel: 'error' } } });
    expect(getLogLevel()).toBe('error');

    resetRuntimeConfig();
    expect(getLogLevel()).toBe('info');
  });

  it('restores the default log level when called without overrides', () => {
    setRuntimeConfig({ debug: { logLevel: { defaultLogLevel: 'error' } } });
    setRuntimeConfig();

    expect(getRuntimeConfig().debug.logLevel.defaultLogLevel).toBe('info');
    expect(getLogLevel()).toBe('info');
  });

  it('keeps the log level in step with a later partial override', () => {
    setRuntimeConfig({ debug: { logLevel: { defaultLogLevel: 'error' } } });
    setRuntimeConfig({ tokenizer: { maxInputChars: 10 } });

    expect(getRuntimeConfig().tokenizer.maxInputChars).toBe(10);
    expect(getRuntimeConfig().debug.logLevel.defaultLogLevel).toBe('info');
    expect(getLogLevel()).toBe('info');
  });

  it('rejects invalid overrides and keeps the previous config', () => {
    const code = errorCodeOf(() => setRuntimeConfig({ tokenizer: { maxInputChars: 0 } }));

    expect(code).toBe(ERROR_CODES.CONFIG_INVALID);
    expect(getRuntimeConfig().tokenizer.maxInputChars).toBe(200);
  });
});

describe('config/validate', () => {
  it('accepts the defaults', () => {
    expect(() => validateRuntimeConfig(createRuntimeConfig())).not.toThrow();
  });

  it('names the offending field', () => {
    const config = createRuntimeConfig({ tokenizer: { continuationPrefix: '' } });

    expect(() => validateRuntimeConfig(config)).toThrow(
      'Invalid config at tokenizer.continuationPrefix: expected a non-empty string'
    );
  });

  it('rejects fractional pruning thresholds', () => {
    const config = createRuntimeConfig({ vocabulary: { minFrequency: 2.5 } });

    expect(errorCodeOf(() => validateRuntimeConfig(config))).toBe(ERROR_CODES.CONFIG_INVALID);
  });
});

describe('errors/piecewise-error', () => {
  it('carries a code and details', () => {
    const error = createPiecewiseError(ERROR_CODES.VOCAB_UNDEFINED_TOKEN, 'missing', { token: 'x' });

    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('PIECEWISE_VOCAB_UNDEFINED_TOKEN');
    expect(error.details).toEqual({ token: 'x' });
    expect(isPiecewiseError(error, ERROR_CODES.VOCAB_UNDEFINED_TOKEN)).toBe(true);
    expect(isPiecewiseError(error, ERROR_CODES.CONFIG_INVALID)).toBe(false);
  });

  it('does not match plain errors', () => {
    expect(isPiecewiseError(new Error('plain'))).toBe(false);
    expect(isPiecewiseError('PIECEWISE_CONFIG_INVALID')).toBe(false);
  });
});

describe('cli/config/config-loader', () => {
  it('converts a runtime section to overrides', () => {
    const overrides = parseRuntimeOverrides({
      runtime: {
        vocabulary: { unknownToken: null, reservedTokens: ['[CLS]', '[SEP]'] },
        tokenizer: { splitMode: 'whitespace' },
      },
    });

    expect(overrides).toEqual({
      vocabulary: { unknownToken: null, reservedTokens: ['[CLS]', '[SEP]'] },
      tokenizer: { splitMode: 'whitespace' },
    });
  });

  it('returns no overrides without a runtime section', () => {
    expect(parseRuntimeOverrides({})).toEqual({});
  });

  it('rejects values of the wrong type', () => {
    expect(() => parseRuntimeOverrides({ runtime: { tokenizer: { maxInputChars: '200' } } })).toThrow(
      'Invalid config at runtime.tokenizer.maxInputChars: expected a number'
    );
    expect(() => parseRuntimeOverrides({ runtime: { tokenizer: { splitMode: 'tabs' } } })).toThrow(
      'Invalid config at runtime.tokenizer.splitMode: expected one of space, whitespace'
    );
    expect(() => parseRuntimeOverrides([])).toThrow('Invalid config at $: expected an object');
  });

  it('loads a config file', async () => {
    const overrides = await loadConfigFile(CONFIG_PATH);

    expect(overrides).toEqual({
      tokenizer: { maxInputChars: 4 },
      debug: { logLevel: { defaultLogLevel: 'warn' } },
    });
  });
});
