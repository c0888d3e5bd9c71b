import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { fileURLToPath } from 'url';

import { parseArgs, runCli } from '../../cli/index.js';
import { resetRuntimeConfig } from '../../src/config/runtime.js';
import { clearLogHistory, getLogHistory } from '../../src/debug/index.js';

const VOCAB_PATH = fileURLToPath(new URL('../fixtures/vocab.txt', import.meta.url));
const CONFIG_PATH = fileURLToPath(new URL('../fixtures/config.json', import.meta.url));

async function run(argv: string[]): Promise<{ code: number; lines: string[] }> {
  const lines: string[] = [];
  const code = await runCli(argv, (line) => lines.push(line));
  return { code, lines };
}

describe('cli', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    clearLogHistory();
  });

  afterEach(() => {
    resetRuntimeConfig();
    vi.restoreAllMocks();
  });

  describe('parseArgs', () => {
    it('reads the command, flags and text', () => {
      const opts = parseArgs(['inspect', '--vocab', 'v.txt', '--max-tokens', '10', '--split', 'whitespace']);

      expect(opts.command).toBe('inspect');
      expect(opts.vocab).toBe('v.txt');
      expect(opts.maxTokens).toBe(10);
      expect(opts.splitMode).toBe('whitespace');
      expect(opts.text).toBeNull();
    });

    it('defaults to tokenize and joins positional text', () => {
      const opts = parseArgs(['--ids', 'make', 'a', 'maker']);

      expect(opts.command).toBe('tokenize');
      expect(opts.ids).toBe(true);
      expect(opts.text).toBe('make a maker');
    });

    it('rejects unknown options and bad integers', () => {
      expect(() => parseArgs(['--frobnicate'])).toThrow('Unknown option: --frobnicate');
      expect(() => parseArgs(['--max-chars', 'ten'])).toThrow("--max-chars expects an integer, got 'ten'");
      expect(() => parseArgs(['--vocab'])).toThrow('Missing value for --vocab');
    });

    it('accepts known log levels and rejects others', () => {
      expect(parseArgs(['--log-level', 'warn']).logLevel).toBe('warn');
      expect(() => parseArgs(['--log-level', 'chatty'])).toThrow(
        "--log-level expects one of debug, verbose, info, warn, error, silent, got 'chatty'"
      );
    });
  });

  describe('runCli', () => {
    it('prints tokens and ids', async () => {
      const { code, lines } = await run([
        'tokenize',
        '--vocab', VOCAB_PATH,
        '--unk', '[UNK]',
        '--ids',
        '[CLS] i want to make a transfer to israel [SEP]',
      ]);

      expect(code).toBe(0);
      expect(lines).toEqual([
        '["[CLS]","i","want","to","make","a","transfer","to","israel","[SEP]"]',
        '[2,4,5,6,7,8,9,6,10,3]',
      ]);
    });

    it('segments unknown words into pieces or a placeholder', async () => {
      const { lines } = await run(['--vocab', VOCAB_PATH, '--unk', '[UNK]', 'unaffable maker makes']);

      expect(lines).toEqual(['["un","##aff","##able","make","##r","[UNK]"]']);
    });

    it('applies a config file', async () => {
      const { lines } = await run(['--vocab', VOCAB_PATH, '--config', CONFIG_PATH, 'a maker']);

      expect(lines).toEqual(['["a","[UNK]"]']);
    });

    it('inspects a vocabulary', async () => {
      const { code, lines } = await run(['inspect', '--vocab', VOCAB_PATH, '--unk', '[UNK]', '--max-tokens', '3']);

      expect(code).toBe(0);
      expect(JSON.parse(lines[0])).toEqual({ size: 3, unknownToken: '[UNK]', reservedTokens: ['[UNK]'] });
    });

    it('prints help', async () => {
      const { code, lines } = await run(['--help']);

      expect(code).toBe(0);
      expect(lines[0].split('\n')[0]).toBe('piecewise - WordPiece tokenizer');
    });

    it('reports failures with exit code 1', async () => {
      const { code, lines } = await run(['inspect']);

      expect(code).toBe(1);
      expect(lines).toEqual([]);
      expect(getLogHistory({ level: 'error', module: 'CLI' })[0].message).toBe('Missing --vocab <file>');
    });
  });
});
