/**
 * Vocabulary Builder
 *
 * Accumulates token occurrences, assigns first-seen indices, prunes by
 * frequency and size, then compacts indices. The accumulator is local to one
 * build call and is discarded once the frozen data is handed over.
 *
 * @module vocabulary/builder
 */

import { getRuntimeConfig } from '../config/runtime.js';
import { log } from '../debug/index.js';
import { ERROR_CODES, createPiecewiseError } from '../errors/piecewise-error.js';
import { PINNED, counted, increment, isBelow, compareDescending, type Frequency } from './frequency.js';
import type { TokenInfo, VocabularyOptions } from './types.js';

/**
 * Immutable result of a build, consumed by the Vocabulary class.
 */
export interface VocabularyData {
  readonly tokens: ReadonlyMap<string, TokenInfo>;
  readonly indexToToken: readonly string[];
  readonly reservedTokens: ReadonlySet<string>;
  readonly unknownToken: string | null;
}

/** Build options with runtime defaults applied */
export interface ResolvedVocabularyOptions {
  sentences: ReadonlyArray<readonly string[]>;
  reservedTokens: Set<string>;
  minFrequency: number;
  maxTokens: number;
  unknownToken: string | null;
}

interface MutableTokenInfo {
  index: number;
  frequency: Frequency;
}

class TokenAccumulator {
  private readonly entries = new Map<string, MutableTokenInfo>();

  constructor(private readonly reserved: ReadonlySet<string>) {}

  add(token: string): void {
    const existing = this.entries.get(token);
    if (existing) {
      existing.frequency = this.reserved.has(token) ? PINNED : increment(existing.frequency);
      return;
    }
    this.entries.set(token, {
      index: this.entries.size,
      frequency: this.reserved.has(token) ? PINNED : counted(1),
    });
  }

  /** Entries in index order (Map insertion order equals index order) */
  list(): Array<[string, MutableTokenInfo]> {
    return [...this.entries];
  }
}

function requireInteger(name: string, value: number): void {
  if (!Number.isInteger(value)) {
    throw createPiecewiseError(
      ERROR_CODES.CONFIG_INVALID,
      `Vocabulary ${name} must be an integer, got ${value}`,
      { [name]: value }
    );
  }
}

/**
 * Apply runtime defaults and check that the options can be satisfied.
 */
export function resolveVocabularyOptions(options: VocabularyOptions = {}): ResolvedVocabularyOptions {
  const defaults = getRuntimeConfig().vocabulary;

  let unknownToken: string | null;
  if (options.unknownToken !== undefined) {
    unknownToken = options.unknownToken;
  } else if (options.requestUnknownToken) {
    unknownToken = defaults.defaultUnknownToken;
  } else {
    unknownToken = defaults.unknownToken;
  }

  const reservedTokens = new Set(options.reservedTokens ?? defaults.reservedTokens);
  if (unknownToken !== null) {
    reservedTokens.add(unknownToken);
  }

  const minFrequency = options.minFrequency ?? defaults.minFrequency;
  const maxTokens = options.maxTokens ?? defaults.maxTokens;
  requireInteger('minFrequency', minFrequency);
  requireInteger('maxTokens', maxTokens);

  if (maxTokens > 0 && maxTokens < reservedTokens.size) {
    throw createPiecewiseError(
      ERROR_CODES.VOCAB_INVALID_CONFIG,
      `The vocabulary maxTokens (${maxTokens}) can not be smaller than the number of reserved tokens (${reservedTokens.size})`,
      { maxTokens, reservedTokens: [...reservedTokens] }
    );
  }

  return {
    sentences: options.sentences ?? [],
    reservedTokens,
    minFrequency,
    maxTokens,
    unknownToken,
  };
}

/**
 * Keep the `limit` most frequent entries. Equal frequencies keep the lower
 * original index.
 */
function keepMostFrequent(
  entries: Array<[string, MutableTokenInfo]>,
  limit: number
): Array<[string, MutableTokenInfo]> {
  return [...entries]
    .sort(([, a], [, b]) => compareDescending(a.frequency, b.frequency) || a.index - b.index)
    .slice(0, limit);
}

/**
 * Run a full build: accumulate, add reserved tokens, prune, compact.
 */
export function assembleVocabularyData(options: VocabularyOptions = {}): VocabularyData {
  const resolved = resolveVocabularyOptions(options);
  const { reservedTokens, minFrequency, maxTokens, unknownToken } = resolved;

  const accumulator = new TokenAccumulator(reservedTokens);
  for (const sentence of resolved.sentences) {
    for (const token of sentence) {
      accumulator.add(token);
    }
  }
  // Reserved tokens not seen in any sentence go after the source tokens
  for (const token of reservedTokens) {
    accumulator.add(token);
  }

  let entries = accumulator.list();
  const initialSize = entries.length;
  let pruned = false;

  if (minFrequency > 1) {
    entries = entries.filter(([, info]) => !isBelow(info.frequency, minFrequency));
    pruned = true;
    log.verbose('Vocabulary', `minFrequency=${minFrequency} kept ${entries.length}/${initialSize} tokens`);
  }

  if (maxTokens > 0 && entries.length > maxTokens) {
    const before = entries.length;
    entries = keepMostFrequent(entries, maxTokens);
    pruned = true;
    log.verbose('Vocabulary', `maxTokens=${maxTokens} kept ${entries.length}/${before} tokens`);
  }

  if (pruned) {
    entries.sort(([, a], [, b]) => a.index - b.index);
  }

  const tokens = new Map<string, TokenInfo>();
  const indexToToken: string[] = [];
  for (const [token, info] of entries) {
    const index = pruned ? indexToToken.length : info.index;
    tokens.set(token, Object.freeze({ index, frequency: info.frequency }));
    indexToToken[index] = token;
  }

  log.debug('Vocabulary', `Built ${tokens.size} tokens`, {
    reserved: reservedTokens.size,
    unknownToken,
    pruned: initialSize - tokens.size,
  });

  return {
    tokens,
    indexToToken: Object.freeze(indexToToken),
    reservedTokens: new Set(reservedTokens),
    unknownToken,
  };
}
