/**
 * CLI command runners
 *
 * @module cli/runners/commands
 */

import { loadVocabularyFromFile } from '../../src/io/node.js';
import { WordPieceTokenizer } from '../../src/tokenizers/wordpiece.js';
import type { Vocabulary } from '../../src/vocabulary/vocabulary.js';
import type { VocabularyOptions } from '../../src/vocabulary/types.js';
import { ERROR_CODES, createPiecewiseError } from '../../src/errors/piecewise-error.js';
import type { CLIOptions, OutputSink } from '../helpers/types.js';

function vocabularyOptions(opts: CLIOptions): Omit<VocabularyOptions, 'sentences'> {
  const options: Omit<VocabularyOptions, 'sentences'> = {};
  if (opts.unknownToken !== null) options.unknownToken = opts.unknownToken;
  if (opts.minFrequency !== null) options.minFrequency = opts.minFrequency;
  if (opts.maxTokens !== null) options.maxTokens = opts.maxTokens;
  return options;
}

async function loadVocabulary(opts: CLIOptions): Promise<Vocabulary> {
  if (opts.vocab === null) {
    throw createPiecewiseError(ERROR_CODES.CONFIG_INVALID, 'Missing --vocab <file>');
  }
  return loadVocabularyFromFile(opts.vocab, vocabularyOptions(opts));
}

/**
 * Print the tokens of `opts.text` as a JSON array, and with --ids their
 * indices on a second line.
 */
export async function runTokenize(opts: CLIOptions, out: OutputSink): Promise<void> {
  if (opts.text === null) {
    throw createPiecewiseError(ERROR_CODES.CONFIG_INVALID, 'Missing text to tokenize');
  }
  const vocabulary = await loadVocabulary(opts);
  const tokenizer = new WordPieceTokenizer(vocabulary, {
    ...(opts.unknownToken !== null ? { unknownPlaceholder: opts.unknownToken } : {}),
    ...(opts.maxInputChars !== null ? { maxInputChars: opts.maxInputChars } : {}),
    ...(opts.splitMode !== null ? { splitMode: opts.splitMode } : {}),
  });

  const tokens = tokenizer.tokenize(opts.text);
  out(JSON.stringify(tokens));
  if (opts.ids) {
    out(JSON.stringify(tokenizer.tokenToIds(tokens)));
  }
}

/**
 * Print vocabulary size and unknown token as JSON.
 */
export async function runInspect(opts: CLIOptions, out: OutputSink): Promise<void> {
  const vocabulary = await loadVocabulary(opts);
  out(JSON.stringify({
    size: vocabulary.size(),
    unknownToken: vocabulary.getUnknownToken(),
    reservedTokens: [...vocabulary.getReservedTokens()],
  }));
}
