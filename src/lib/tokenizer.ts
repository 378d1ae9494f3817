/**
 * Text tokenization.
 *
 * Splits text on a set of single-character (code point) delimiters. Empty tokens between
 * consecutive delimiters are dropped, so downstream stages never see "".
 */

export const DEFAULT_DELIMITERS = " ,;.\t\r\n";

/**
 * Lazy token sequence. Every iteration starts again from the beginning of the text.
 */
export class TokenSequence implements Iterable<string> {
  private readonly delimiters: ReadonlySet<string>;

  constructor(
    private readonly text: string,
    delimiters: Iterable<string> = DEFAULT_DELIMITERS,
  ) {
    this.delimiters = new Set(delimiters);
  }

  *[Symbol.iterator](): Iterator<string> {
    let start = 0;
    let index = 0;

    // Walk by code point so delimiters outside the BMP match whole
    for (const char of this.text) {
      if (this.delimiters.has(char)) {
        if (index > start) {
          yield this.text.slice(start, index);
        }
        start = index + char.length;
      }
      index += char.length;
    }

    if (index > start) {
      yield this.text.slice(start, index);
    }
  }

  toArray(): string[] {
    return Array.from(this);
  }
}

/**
 * @example
 * tokenize("wa wow, level; noon", " ;,").toArray(); // ["wa", "wow", "level", "noon"]
 */
export function tokenize(text: string, delimiters: Iterable<string> = DEFAULT_DELIMITERS): TokenSequence {
  return new TokenSequence(text, delimiters);
}
