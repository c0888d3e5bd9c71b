/**
 * Debug Module - Log Level and Module Filters
 *
 * @module debug/config
 */

import type { DebugConfigSchema, LogLevelName } from '../config/schema/index.js';
import { LOG_LEVELS, type LogLevelValue } from './types.js';
import {
  currentLogLevel,
  enabledModules,
  disabledModules,
  setCurrentLogLevel,
  setEnabledModules,
  setDisabledModules,
} from './state.js';

const LEVEL_MAP: Record<LogLevelName, LogLevelValue> = {
  debug: LOG_LEVELS.DEBUG,
  verbose: LOG_LEVELS.VERBOSE,
  info: LOG_LEVELS.INFO,
  warn: LOG_LEVELS.WARN,
  error: LOG_LEVELS.ERROR,
  silent: LOG_LEVELS.SILENT,
};

function isLevelName(value: string): value is LogLevelName {
  return Object.hasOwn(LEVEL_MAP, value);
}

/**
 * Set the global log level. Unrecognized names fall back to info.
 */
export function setLogLevel(level: string): void {
  const name = level.toLowerCase();
  setCurrentLogLevel(isLevelName(name) ? LEVEL_MAP[name] : LOG_LEVELS.INFO);
}

/**
 * Get current log level name.
 */
export function getLogLevel(): LogLevelName {
  for (const [name, value] of Object.entries(LEVEL_MAP)) {
    if (value === currentLogLevel && isLevelName(name)) return name;
  }
  return 'info';
}

/**
 * Only log from the given modules (case-insensitive).
 */
export function enableModules(...modules: string[]): void {
  const next = new Set(enabledModules);
  for (const m of modules) next.add(m.toLowerCase());
  setEnabledModules(next);
}

/**
 * Suppress logs from the given modules (case-insensitive).
 */
export function disableModules(...modules: string[]): void {
  const next = new Set(disabledModules);
  for (const m of modules) next.add(m.toLowerCase());
  setDisabledModules(next);
}

export function resetModuleFilters(): void {
  setEnabledModules(new Set());
  setDisabledModules(new Set());
}

/**
 * Apply the debug section of a runtime config.
 */
export function applyDebugConfig(config: DebugConfigSchema): void {
  setLogLevel(config.logLevel.defaultLogLevel);
}
