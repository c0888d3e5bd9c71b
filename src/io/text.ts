/**
 * Vocabulary Text Parsing
 *
 * @module io/text
 */

export interface ReadLinesOptions {
  /** Trim each line and skip blank ones (default: true) */
  trim?: boolean;
}

const LINE_BREAK = /\r?\n/;

/**
 * Split vocabulary text into lines, one token per line. Line order is the
 * order in which tokens receive indices.
 */
export function parseVocabularyText(text: string, options: ReadLinesOptions = {}): string[] {
  const { trim = true } = options;
  const lines = text.split(LINE_BREAK);
  // A final newline does not start another token
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  if (!trim) {
    return lines;
  }

  const tokens: string[] = [];
  for (const line of lines) {
    const token = line.trim();
    if (token.length > 0) {
      tokens.push(token);
    }
  }
  return tokens;
}
