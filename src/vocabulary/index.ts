/**
 * Vocabulary Module
 *
 * @module vocabulary
 */

export { Vocabulary, buildVocabulary } from './vocabulary.js';
export { resolveVocabularyOptions, type VocabularyData, type ResolvedVocabularyOptions } from './builder.js';
export { PINNED, counted, isPinned, type Frequency } from './frequency.js';
export type { VocabularyLookup, VocabularyOptions, TokenInfo } from './types.js';
