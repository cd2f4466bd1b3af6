const WHITESPACE = " \t\n\r";

export const DEFAULT_PUNCTUATION = "([ •*,:;?.!/)-−–‐«»„\"“”‘’'`$#@]\u2666\u2665\u2663\u2660\u00A0";

/**
 * Which characters separate tokens, and which tokens are markup.
 *
 * Whitespace is always a delimiter; the punctuation set is configurable.
 */
export class DelimiterPolicy {
  private readonly delimiters: Set<string>;

  constructor(punctuation: string = DEFAULT_PUNCTUATION) {
    this.delimiters = new Set(WHITESPACE + punctuation);
  }

  isDelimiter(ch: string): boolean {
    return this.delimiters.has(ch);
  }

  isWhitespace(ch: string): boolean {
    return WHITESPACE.includes(ch);
  }

  /** True for empty strings and strings made only of delimiters. */
  isSeparator(token: string): boolean {
    for (const ch of token) {
      if (!this.delimiters.has(ch)) return false;
    }
    return true;
  }

  isMarkup(token: string): boolean {
    return token.length >= 2 && token.startsWith("<") && token.endsWith(">");
  }

  /**
   * Index of the `>` closing a markup unit opened at `start`, or -1 when the
   * `<` at `start` does not open one (no `>` before the next whitespace).
   */
  markupEnd(text: string, start: number): number {
    if (text[start] !== "<") return -1;
    for (let i = start + 1; i < text.length; i++) {
      const ch = text.charAt(i);
      if (ch === ">") return i;
      if (this.isWhitespace(ch)) return -1;
    }
    return -1;
  }

  /** Index of the first whitespace character at or after `from`, or the text length. */
  nextWhitespace(text: string, from: number): number {
    for (let i = from; i < text.length; i++) {
      if (this.isWhitespace(text.charAt(i))) return i;
    }
    return text.length;
  }
}

export const defaultDelimiterPolicy = new DelimiterPolicy();
