/**
 * Debug Module Global State
 *
 * @module debug/state
 */

import { LOG_LEVELS, type LogLevelValue, type LogEntry } from './types.js';

export let currentLogLevel: LogLevelValue = LOG_LEVELS.INFO;
export let enabledModules = new Set<string>();
export let disabledModules = new Set<string>();
export let logHistory: LogEntry[] = [];

// Setters, since importers cannot assign to exported bindings
export function setCurrentLogLevel(level: LogLevelValue): void {
  currentLogLevel = level;
}

export function setEnabledModules(modules: Set<string>): void {
  enabledModules = modules;
}

export function setDisabledModules(modules: Set<string>): void {
  disabledModules = modules;
}

export function clearHistory(): void {
  logHistory = [];
}

export function pushHistory(entry: LogEntry): void {
  logHistory.push(entry);
}

export function shiftHistory(): LogEntry | undefined {
  return logHistory.shift();
}
