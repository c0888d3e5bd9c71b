/**
 * Tokenizers Module
 *
 * @module tokenizers
 */

export { WordPieceTokenizer } from './wordpiece.js';
export { splitWords } from './pretokenize.js';
export type { SplitMode, TokenizerBackend, WordPieceTokenizerOptions } from './types.js';
