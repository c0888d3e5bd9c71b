import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  log,
  formatMessage,
  setLogLevel,
  getLogLevel,
  enableModules,
  disableModules,
  resetModuleFilters,
  getLogHistory,
  clearLogHistory,
  getDebugSnapshot,
} from '../../src/debug/index.js';
import { resetRuntimeConfig, setRuntimeConfig } from '../../src/config/runtime.js';

describe('debug', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    clearLogHistory();
  });

  afterEach(() => {
    resetModuleFilters();
    resetRuntimeConfig();
    vi.restoreAllMocks();
  });

  it('formats messages with a timestamp and module tag', () => {
    expect(formatMessage('Vocabulary', 'Built 3 tokens')).toMatch(/^\[\d+\.\dms\]\[Vocabulary\] Built 3 tokens$/);
  });

  it('filters by level', () => {
    setLogLevel('warn');
    log.info('Test', 'hidden');
    log.warn('Test', 'shown');
    log.error('Test', 'also shown', { detail: 1 });

    expect(getLogHistory().map((entry) => entry.message)).toEqual(['shown', 'also shown']);
    expect(getLogHistory({ level: 'error' })[0].data).toEqual({ detail: 1 });
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('always logs regardless of level', () => {
    setLogLevel('silent');
    log.error('Test', 'hidden');
    log.always('Test', 'critical');

    expect(getLogHistory().map((entry) => entry.level)).toEqual(['ALWAYS']);
  });

  it('falls back to info for unknown level names', () => {
    setLogLevel('DEBUG');
    expect(getLogLevel()).toBe('debug');

    setLogLevel('chatty');
    expect(getLogLevel()).toBe('info');
  });

  it('filters by module, case-insensitively', () => {
    disableModules('Vocabulary');
    log.warn('vocabulary', 'hidden');
    log.warn('WordPiece', 'shown');

    resetModuleFilters();
    enableModules('IO');
    log.warn('WordPiece', 'hidden');
    log.warn('io', 'shown too');

    expect(getLogHistory().map((entry) => entry.message)).toEqual(['shown', 'shown too']);
  });

  it('bounds the history by the configured size', () => {
    setRuntimeConfig({ debug: { logHistory: { maxLogHistoryEntries: 3 } } });
    for (let i = 0; i < 5; i++) {
      log.warn('Test', `m${i}`);
    }

    expect(getLogHistory().map((entry) => entry.message)).toEqual(['m2', 'm3', 'm4']);
    expect(getLogHistory({ last: 1 })[0].message).toBe('m4');
  });

  it('summarizes state in a snapshot', () => {
    log.warn('Test', 'w');
    log.error('Test', 'e1');
    log.error('Test', 'e2');

    const snapshot = getDebugSnapshot();

    expect(snapshot.logLevel).toBe('info');
    expect(snapshot.errorCount).toBe(2);
    expect(snapshot.warnCount).toBe(1);
    expect(snapshot.recentLogs.map((entry) => entry.message)).toEqual(['w', 'e1', 'e2']);
  });
});
