import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { fileURLToPath } from 'url';

import { parseVocabularyText } from '../../src/io/text.js';
import {
  fetchVocabulary,
  loadVocabularyFromFile,
  loadVocabularyWith,
  readVocabularyFile,
} from '../../src/io/node.js';
import { clearLogHistory, getLogHistory } from '../../src/debug/index.js';
import { ERROR_CODES, isPiecewiseError } from '../../src/errors/piecewise-error.js';

const VOCAB_PATH = fileURLToPath(new URL('../fixtures/vocab.txt', import.meta.url));
const MISSING_PATH = fileURLToPath(new URL('../fixtures/does-not-exist.txt', import.meta.url));

describe('io/text', () => {
  it('trims lines and skips blank ones by default', () => {
    expect(parseVocabularyText('a\r\nb\n\n  c  \n')).toEqual(['a', 'b', 'c']);
  });

  it('keeps lines verbatim without trimming', () => {
    expect(parseVocabularyText('a\r\nb\n\n  c  \n', { trim: false })).toEqual(['a', 'b', '', '  c  ']);
  });

  it('reads empty text as no tokens', () => {
    expect(parseVocabularyText('')).toEqual([]);
  });
});

describe('io/node', () => {
  beforeEach(() => {
    clearLogHistory();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('reads a vocabulary file in line order', async () => {
    const tokens = await readVocabularyFile(VOCAB_PATH);

    expect(tokens).toHaveLength(15);
    expect(tokens.slice(0, 4)).toEqual(['[PAD]', '[UNK]', '[CLS]', '[SEP]']);
    expect(tokens[11]).toBe('##r');
  });

  it('reads a missing file as empty and warns', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    const tokens = await readVocabularyFile(MISSING_PATH);

    expect(tokens).toEqual([]);
    const warnings = getLogHistory({ level: 'warn', module: 'IO' });
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toBe(`Vocabulary file not found, reading as empty: ${MISSING_PATH}`);
  });

  it('builds a vocabulary from a file', async () => {
    const vocab = await loadVocabularyFromFile(VOCAB_PATH, { unknownToken: '[UNK]' });

    expect(vocab.size()).toBe(15);
    expect(vocab.getIndex('israel')).toBe(10);
    expect(vocab.getIndex('not-there')).toBe(1);
  });

  it('loads through a custom parser', async () => {
    const tokens = await loadVocabularyWith('x,y,z', (source) => source.split(','));

    expect(tokens).toEqual(['x', 'y', 'z']);
  });

  it('fetches a vocabulary over HTTP', async () => {
    const fetchMock = vi.fn(async () => new Response('hello\n##s\n'));
    vi.stubGlobal('fetch', fetchMock);

    const tokens = await fetchVocabulary('https://example.test/vocab.txt');

    expect(tokens).toEqual(['hello', '##s']);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('fails on a non-OK response', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 404, statusText: 'Not Found' })));

    let caught: unknown = null;
    try {
      await fetchVocabulary('https://example.test/missing.txt');
    } catch (error) {
      caught = error;
    }

    expect(isPiecewiseError(caught, ERROR_CODES.SOURCE_UNREADABLE)).toBe(true);
    expect(caught).toBeInstanceOf(Error);
    expect(caught instanceof Error ? caught.message : '').toBe(
      'Failed to fetch vocabulary https://example.test/missing.txt: 404 Not Found'
    );
  });
});
