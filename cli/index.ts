#!/usr/bin/env node
/**
 * piecewise CLI - tokenize text against a vocabulary file
 *
 * Usage:
 *   piecewise tokenize --vocab vocab.txt [options] <text...>
 *   piecewise inspect --vocab vocab.txt [options]
 *
 * Examples:
 *   piecewise tokenize --vocab vocab.txt --unk [UNK] --ids "i want to make a transfer"
 *   piecewise inspect --vocab vocab.txt --max-tokens 1000 --unk [UNK]
 */

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';

import type { CLIOptions, Command, OutputSink } from './helpers/types.js';
import { loadConfigFile } from './config/index.js';
import { runTokenize, runInspect } from './runners/commands.js';
import { setRuntimeConfig } from '../src/config/runtime.js';
import { LOG_LEVEL_NAMES, SPLIT_MODES } from '../src/config/schema/index.js';
import { log, setLogLevel } from '../src/debug/index.js';
import { ERROR_CODES, createPiecewiseError } from '../src/errors/piecewise-error.js';

const COMMANDS: readonly Command[] = ['tokenize', 'inspect'];

// ============================================================================
// Argument Parsing
// ============================================================================

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined) {
    throw createPiecewiseError(ERROR_CODES.CONFIG_INVALID, `Missing value for ${flag}`);
  }
  return value;
}

function parseInteger(flag: string, value: string | undefined): number {
  const raw = requireValue(flag, value);
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw createPiecewiseError(ERROR_CODES.CONFIG_INVALID, `${flag} expects an integer, got '${raw}'`);
  }
  return parsed;
}

export function parseArgs(argv: readonly string[]): CLIOptions {
  const opts: CLIOptions = {
    command: 'tokenize',
    vocab: null,
    config: null,
    unknownToken: null,
    maxInputChars: null,
    splitMode: null,
    minFrequency: null,
    maxTokens: null,
    ids: false,
    logLevel: null,
    help: false,
    text: null,
  };

  const tokens = [...argv];
  const positional: string[] = [];

  let arg = tokens.shift();
  while (arg !== undefined) {
    switch (arg) {
      case '--help':
      case '-h':
        opts.help = true;
        break;
      case '--vocab':
      case '-v':
        opts.vocab = requireValue(arg, tokens.shift());
        break;
      case '--config':
        opts.config = requireValue(arg, tokens.shift());
        break;
      case '--unk':
        opts.unknownToken = requireValue(arg, tokens.shift());
        break;
      case '--max-chars':
        opts.maxInputChars = parseInteger(arg, tokens.shift());
        break;
      case '--split': {
        const mode = requireValue(arg, tokens.shift());
        const match = SPLIT_MODES.find((candidate) => candidate === mode);
        if (match === undefined) {
          throw createPiecewiseError(
            ERROR_CODES.CONFIG_INVALID,
            `--split expects one of ${SPLIT_MODES.join(', ')}, got '${mode}'`
          );
        }
        opts.splitMode = match;
        break;
      }
      case '--min-frequency':
        opts.minFrequency = parseInteger(arg, tokens.shift());
        break;
      case '--max-tokens':
        opts.maxTokens = parseInteger(arg, tokens.shift());
        break;
      case '--ids':
        opts.ids = true;
        break;
      case '--log-level': {
        const level = requireValue(arg, tokens.shift());
        const match = LOG_LEVEL_NAMES.find((candidate) => candidate === level);
        if (match === undefined) {
          throw createPiecewiseError(
            ERROR_CODES.CONFIG_INVALID,
            `--log-level expects one of ${LOG_LEVEL_NAMES.join(', ')}, got '${level}'`
          );
        }
        opts.logLevel = match;
        break;
      }
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw createPiecewiseError(ERROR_CODES.CONFIG_INVALID, `Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
    arg = tokens.shift();
  }

  const command = COMMANDS.find((candidate) => candidate === positional[0]);
  if (command !== undefined) {
    opts.command = command;
    positional.shift();
  }
  if (positional.length > 0) {
    opts.text = positional.join(' ');
  }

  return opts;
}

function printHelp(out: OutputSink): void {
  out(`piecewise - WordPiece tokenizer

Usage:
  piecewise tokenize --vocab <file> [options] <text...>
  piecewise inspect --vocab <file> [options]

Options:
  -v, --vocab <file>       Vocabulary file, one token per line
  --config <file>          JSON config file ({ "runtime": { ... } })
  --unk <token>            Unknown token (vocabulary fallback and placeholder)
  --max-chars <n>          Longest word that is segmented
  --split <mode>           Word splitting: space | whitespace
  --min-frequency <n>      Prune tokens seen fewer than n times
  --max-tokens <n>         Keep at most n tokens
  --ids                    Also print token ids
  --log-level <level>      debug | verbose | info | warn | error | silent
  -h, --help               Show this help`);
}

// ============================================================================
// Main
// ============================================================================

/**
 * Run the CLI. Returns the process exit code.
 */
export async function runCli(argv: readonly string[], out: OutputSink = console.log): Promise<number> {
  try {
    const opts = parseArgs(argv);
    if (opts.help) {
      printHelp(out);
      return 0;
    }
    if (opts.config !== null) {
      setRuntimeConfig(await loadConfigFile(opts.config));
    }
    if (opts.logLevel !== null) {
      setLogLevel(opts.logLevel);
    }

    switch (opts.command) {
      case 'tokenize':
        await runTokenize(opts, out);
        break;
      case 'inspect':
        await runInspect(opts, out);
        break;
    }
    return 0;
  } catch (error) {
    log.error('CLI', error instanceof Error ? error.message : String(error));
    return 1;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
