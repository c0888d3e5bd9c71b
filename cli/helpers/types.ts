/**
 * CLI Types - Shared type definitions for the piecewise CLI
 */

import type { LogLevelName, SplitMode } from '../../src/config/schema/index.js';

export type Command = 'tokenize' | 'inspect';

export interface CLIOptions {
  command: Command;
  /** Path to a newline-delimited vocabulary file */
  vocab: string | null;
  /** JSON config file with a `runtime` section */
  config: string | null;
  /** Unknown token for the vocabulary and placeholder for the tokenizer */
  unknownToken: string | null;
  maxInputChars: number | null;
  splitMode: SplitMode | null;
  minFrequency: number | null;
  maxTokens: number | null;
  /** Also print token ids */
  ids: boolean;
  logLevel: LogLevelName | null;
  help: boolean;
  /** Text to tokenize (positional arguments joined with spaces) */
  text: string | null;
}

/** Where command output goes; console.log in the binary, a buffer in tests */
export type OutputSink = (line: string) => void;
