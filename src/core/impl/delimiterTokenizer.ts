import type { Token } from "../types.js";
import type { TokenizeOptions, Tokenizer } from "../tokenizer.js";
import { DelimiterPolicy, defaultDelimiterPolicy } from "./delimiterPolicy.js";

/**
 * Delimiter-driven tokenizer:
 * - splits on the policy's delimiter characters
 * - cuts `<...>` markup units out of the text; they take a position but are not yielded
 * - optionally lowercases
 * - yields token positions and character offsets into the original text
 */
export class DelimiterTokenizer implements Tokenizer {
  constructor(private readonly policy: DelimiterPolicy = defaultDelimiterPolicy) {}

  *tokenize(text: string, options?: TokenizeOptions): Iterable<Token> {
    const normalizeCase = options?.normalizeCase ?? true;
    const { policy } = this;

    const n = text.length;
    let i = 0;
    let position = 0;

    // a `<` that failed to close rules out markup up to the next whitespace,
    // so later `<` before that point need no rescan
    let noMarkupBefore = 0;
    const markupAt = (at: number): number => {
      if (at < noMarkupBefore || text.charAt(at) !== "<") return -1;
      const close = policy.markupEnd(text, at);
      if (close < 0) noMarkupBefore = policy.nextWhitespace(text, at);
      return close;
    };

    while (i < n) {
      if (policy.isDelimiter(text.charAt(i))) {
        i++;
        continue;
      }

      const close = markupAt(i);
      if (close >= 0) {
        i = close + 1;
        position++;
        continue;
      }

      const start = i;
      i++;
      while (i < n && !policy.isDelimiter(text.charAt(i)) && markupAt(i) < 0) i++;
      const end = i;

      let term = text.slice(start, end);
      if (normalizeCase) term = term.toLowerCase();

      yield { term, position, startOffset: start, endOffset: end };
      position++;
    }
  }
}
