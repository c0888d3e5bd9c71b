/**
 * Debug Module - Log History and Snapshots
 *
 * @module debug/history
 */

import type { LogEntry, LogHistoryFilter, DebugSnapshot } from './types.js';
import { logHistory, enabledModules, disabledModules, clearHistory } from './state.js';
import { getLogLevel } from './config.js';

/**
 * Get log history for debugging.
 */
export function getLogHistory(filter: LogHistoryFilter = {}): LogEntry[] {
  let history = [...logHistory];

  if (filter.level) {
    const level = filter.level.toUpperCase();
    history = history.filter((h) => h.level === level);
  }

  if (filter.module) {
    const m = filter.module.toLowerCase();
    history = history.filter((h) => h.module.toLowerCase().includes(m));
  }

  if (filter.last) {
    history = history.slice(-filter.last);
  }

  return history;
}

/**
 * Clear log history.
 */
export function clearLogHistory(): void {
  clearHistory();
}

/**
 * Create a snapshot of the logging state for bug reports.
 */
export function getDebugSnapshot(): DebugSnapshot {
  const recent = logHistory.slice(-50);
  return {
    timestamp: new Date().toISOString(),
    logLevel: getLogLevel(),
    enabledModules: [...enabledModules],
    disabledModules: [...disabledModules],
    recentLogs: recent.map((entry) => ({
      time: new Date(entry.time).toISOString(),
      level: entry.level,
      module: entry.module,
      message: entry.message,
    })),
    errorCount: logHistory.filter((h) => h.level === 'ERROR').length,
    warnCount: logHistory.filter((h) => h.level === 'WARN').length,
  };
}
