export { parseVocabularyText, type ReadLinesOptions } from './text.js';
export { readVocabularyFile, fetchVocabulary, loadVocabularyWith, loadVocabularyFromFile } from './node.js';
