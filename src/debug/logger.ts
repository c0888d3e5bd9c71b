/**
 * Core Logging Interface
 *
 * @module debug/logger
 */

import { LOG_LEVELS, type LogLevelValue } from './types.js';
import {
  currentLogLevel,
  enabledModules,
  disabledModules,
  logHistory,
  pushHistory,
  shiftHistory,
} from './state.js';
import { getRuntimeConfig } from '../config/runtime.js';

/**
 * Format a log message with timestamp and module tag.
 */
export function formatMessage(module: string, message: string): string {
  const timestamp = performance.now().toFixed(1);
  return `[${timestamp}ms][${module}] ${message}`;
}

/**
 * Store log in history for later retrieval.
 */
export function storeLog(level: string, module: string, message: string, data?: unknown): void {
  pushHistory({
    time: Date.now(),
    perfTime: performance.now(),
    level,
    module,
    message,
    data,
  });

  const maxHistory = getRuntimeConfig().debug.logHistory.maxLogHistoryEntries;
  while (logHistory.length > maxHistory) {
    shiftHistory();
  }
}

/**
 * Check if logging is enabled for a module at a level.
 */
export function shouldLog(module: string, level: LogLevelValue): boolean {
  if (level < currentLogLevel) return false;

  const moduleLower = module.toLowerCase();

  if (enabledModules.size > 0 && !enabledModules.has(moduleLower)) {
    return false;
  }

  if (disabledModules.has(moduleLower)) {
    return false;
  }

  return true;
}

type ConsoleSink = (...args: unknown[]) => void;

function emit(sink: ConsoleSink, level: string, module: string, message: string, data?: unknown): void {
  const formatted = formatMessage(module, message);
  storeLog(level, module, message, data);
  if (data !== undefined) {
    sink(formatted, data);
  } else {
    sink(formatted);
  }
}

/**
 * Main logging interface.
 */
export const log = {
  debug(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.DEBUG)) return;
    emit(console.debug, 'DEBUG', module, message, data);
  },

  verbose(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.VERBOSE)) return;
    emit(console.log, 'VERBOSE', module, message, data);
  },

  info(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.INFO)) return;
    emit(console.log, 'INFO', module, message, data);
  },

  warn(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.WARN)) return;
    emit(console.warn, 'WARN', module, message, data);
  },

  error(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.ERROR)) return;
    emit(console.error, 'ERROR', module, message, data);
  },

  /**
   * Always log regardless of level (for critical messages).
   */
  always(module: string, message: string, data?: unknown): void {
    emit(console.log, 'ALWAYS', module, message, data);
  },
};
