const WHITESPACE = /\s+/;

/**
 * Splits a line into tokens: maximal runs of non-whitespace characters.
 * No case folding or punctuation handling; the token is the text as written.
 */
export function tokenize(line: string): string[] {
  return line.split(WHITESPACE).filter((w) => w.length > 0);
}
