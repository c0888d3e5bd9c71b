/**
 * Runtime Config Registry
 *
 * Stores the active RuntimeConfigSchema for the current process.
 * Call setRuntimeConfig() before building vocabularies or tokenizers to apply
 * overrides; already constructed instances keep the values they were built with.
 *
 * @module config/runtime
 */

import type { RuntimeConfigSchema, RuntimeConfigOverrides } from './schema/index.js';
import { createRuntimeConfig } from './schema/index.js';
import { validateRuntimeConfig } from './validate.js';
import { log, applyDebugConfig } from '../debug/index.js';

let runtimeConfig: RuntimeConfigSchema = createRuntimeConfig();

/**
 * Get the active runtime config (merged with defaults).
 */
export function getRuntimeConfig(): RuntimeConfigSchema {
  return runtimeConfig;
}

/**
 * Set the active runtime config.
 * Accepts partial overrides and merges with defaults. The log level is
 * re-applied from the merged debug section on every call.
 */
export function setRuntimeConfig(overrides?: RuntimeConfigOverrides): RuntimeConfigSchema {
  if (!overrides) {
    return resetRuntimeConfig();
  }

  const merged = createRuntimeConfig(overrides);
  validateRuntimeConfig(merged);

  runtimeConfig = merged;
  applyDebugConfig(merged.debug);
  log.debug('Config', 'Runtime config updated', overrides);
  return runtimeConfig;
}

/**
 * Reset runtime config to defaults.
 */
export function resetRuntimeConfig(): RuntimeConfigSchema {
  runtimeConfig = createRuntimeConfig();
  applyDebugConfig(runtimeConfig.debug);
  return runtimeConfig;
}
