/**
 * Debug Config Schema
 *
 * Configuration for the debug module: default log level and log history limits.
 *
 * @module config/schema/debug
 */

// =============================================================================
// Log History Config
// =============================================================================

/**
 * Configuration for log history retention.
 *
 * Controls how many log entries are kept in memory for diagnostics.
 */
export interface LogHistoryConfigSchema {
  /** Maximum number of log entries to retain in memory */
  maxLogHistoryEntries: number;
}

/** Default log history configuration */
export const DEFAULT_LOG_HISTORY_CONFIG: LogHistoryConfigSchema = {
  maxLogHistoryEntries: 1000,
};

// =============================================================================
// Log Level Config
// =============================================================================

/** Log level names accepted by setLogLevel() */
export type LogLevelName = 'debug' | 'verbose' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVEL_NAMES: readonly LogLevelName[] = [
  'debug',
  'verbose',
  'info',
  'warn',
  'error',
  'silent',
];

/**
 * Configuration for default log level.
 */
export interface LogLevelConfigSchema {
  /** Default log level (debug, verbose, info, warn, error, silent) */
  defaultLogLevel: LogLevelName;
}

/** Default log level configuration */
export const DEFAULT_LOG_LEVEL_CONFIG: LogLevelConfigSchema = {
  defaultLogLevel: 'info',
};

// =============================================================================
// Complete Debug Config
// =============================================================================

export interface DebugConfigSchema {
  logHistory: LogHistoryConfigSchema;
  logLevel: LogLevelConfigSchema;
}

/** Default debug configuration */
export const DEFAULT_DEBUG_CONFIG: DebugConfigSchema = {
  logHistory: DEFAULT_LOG_HISTORY_CONFIG,
  logLevel: DEFAULT_LOG_LEVEL_CONFIG,
};
