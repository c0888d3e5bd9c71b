/**
 * Config Loader
 *
 * Reads a JSON config file and converts its `runtime` section to
 * RuntimeConfigOverrides. Values of the wrong type are rejected here; ranges
 * are checked by validateRuntimeConfig() when the overrides are applied.
 *
 * @module cli/config/config-loader
 */

import { readFile } from 'fs/promises';
import type { RuntimeConfigOverrides, SplitMode, LogLevelName } from '../../src/config/schema/index.js';
import { LOG_LEVEL_NAMES, SPLIT_MODES } from '../../src/config/schema/index.js';
import { ERROR_CODES, createPiecewiseError } from '../../src/errors/piecewise-error.js';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(path: string, expected: string, value: unknown): never {
  throw createPiecewiseError(
    ERROR_CODES.CONFIG_INVALID,
    `Invalid config at ${path}: expected ${expected}`,
    { path, value }
  );
}

function section(parent: JsonObject, key: string, path: string): JsonObject | undefined {
  const value = parent[key];
  if (value === undefined) return undefined;
  if (!isObject(value)) fail(`${path}${key}`, 'an object', value);
  return value;
}

function optionalNumber(obj: JsonObject, key: string, path: string): number | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') fail(`${path}.${key}`, 'a number', value);
  return value;
}

function optionalString(obj: JsonObject, key: string, path: string): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') fail(`${path}.${key}`, 'a string', value);
  return value;
}

function optionalNullableString(obj: JsonObject, key: string, path: string): string | null | undefined {
  if (obj[key] === null) return null;
  return optionalString(obj, key, path);
}

function optionalStringArray(obj: JsonObject, key: string, path: string): string[] | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) fail(`${path}.${key}`, 'an array of strings', value);
  const strings: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') fail(`${path}.${key}`, 'an array of strings', value);
    strings.push(item);
  }
  return strings;
}

function oneOf<T extends string>(allowed: readonly T[], value: string | undefined, path: string): T | undefined {
  if (value === undefined) return undefined;
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) fail(path, `one of ${allowed.join(', ')}`, value);
  return match;
}

function assignDefined<T extends object, K extends keyof T>(target: T, key: K, value: T[K] | undefined): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

/**
 * Convert parsed JSON (`{ "runtime": { ... } }`) to runtime overrides.
 */
export function parseRuntimeOverrides(raw: unknown): RuntimeConfigOverrides {
  if (!isObject(raw)) fail('$', 'an object', raw);
  const runtime = section(raw, 'runtime', '');
  if (!runtime) return {};

  const overrides: RuntimeConfigOverrides = {};

  const vocabulary = section(runtime, 'vocabulary', 'runtime.');
  if (vocabulary) {
    const p = 'runtime.vocabulary';
    const target: NonNullable<RuntimeConfigOverrides['vocabulary']> = {};
    assignDefined(target, 'minFrequency', optionalNumber(vocabulary, 'minFrequency', p));
    assignDefined(target, 'maxTokens', optionalNumber(vocabulary, 'maxTokens', p));
    assignDefined(target, 'unknownToken', optionalNullableString(vocabulary, 'unknownToken', p));
    assignDefined(target, 'reservedTokens', optionalStringArray(vocabulary, 'reservedTokens', p));
    assignDefined(target, 'defaultUnknownToken', optionalString(vocabulary, 'defaultUnknownToken', p));
    overrides.vocabulary = target;
  }

  const tokenizer = section(runtime, 'tokenizer', 'runtime.');
  if (tokenizer) {
    const p = 'runtime.tokenizer';
    const target: NonNullable<RuntimeConfigOverrides['tokenizer']> = {};
    assignDefined(target, 'unknownPlaceholder', optionalString(tokenizer, 'unknownPlaceholder', p));
    assignDefined(target, 'maxInputChars', optionalNumber(tokenizer, 'maxInputChars', p));
    assignDefined(target, 'continuationPrefix', optionalString(tokenizer, 'continuationPrefix', p));
    const splitMode: SplitMode | undefined = oneOf(
      SPLIT_MODES,
      optionalString(tokenizer, 'splitMode', p),
      `${p}.splitMode`
    );
    assignDefined(target, 'splitMode', splitMode);
    overrides.tokenizer = target;
  }

  const debug = section(runtime, 'debug', 'runtime.');
  if (debug) {
    const logHistory = section(debug, 'logHistory', 'runtime.debug.');
    const logLevel = section(debug, 'logLevel', 'runtime.debug.');
    const target: NonNullable<RuntimeConfigOverrides['debug']> = {};
    if (logHistory) {
      target.logHistory = {};
      assignDefined(
        target.logHistory,
        'maxLogHistoryEntries',
        optionalNumber(logHistory, 'maxLogHistoryEntries', 'runtime.debug.logHistory')
      );
    }
    if (logLevel) {
      const p = 'runtime.debug.logLevel';
      const defaultLogLevel: LogLevelName | undefined = oneOf(
        LOG_LEVEL_NAMES,
        optionalString(logLevel, 'defaultLogLevel', p),
        `${p}.defaultLogLevel`
      );
      target.logLevel = {};
      assignDefined(target.logLevel, 'defaultLogLevel', defaultLogLevel);
    }
    overrides.debug = target;
  }

  return overrides;
}

/**
 * Read and parse a JSON config file.
 */
export async function loadConfigFile(path: string): Promise<RuntimeConfigOverrides> {
  const text = await readFile(path, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw createPiecewiseError(
      ERROR_CODES.CONFIG_INVALID,
      `Config file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { path }
    );
  }
  return parseRuntimeOverrides(raw);
}
