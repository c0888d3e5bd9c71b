/**
 * Debug Module
 *
 * Module-tagged, level-filtered logging with an in-memory history.
 *
 * Usage:
 *   import { log, setLogLevel } from './debug/index.js';
 *   log.info('Vocabulary', 'Built 30522 tokens');
 *   setLogLevel('debug');
 *
 * @module debug
 */

export {
  LOG_LEVELS,
  type LogLevel,
  type LogLevelValue,
  type LogEntry,
  type LogHistoryFilter,
  type DebugSnapshot,
} from './types.js';

export { log, formatMessage, shouldLog } from './logger.js';

export {
  setLogLevel,
  getLogLevel,
  enableModules,
  disableModules,
  resetModuleFilters,
  applyDebugConfig,
} from './config.js';

export { getLogHistory, clearLogHistory, getDebugSnapshot } from './history.js';
