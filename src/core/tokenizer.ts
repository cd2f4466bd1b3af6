import type { Token } from "./types.js";

export interface TokenizeOptions {
  /** If true, lowercase tokens (default true). */
  normalizeCase?: boolean;
}

/**
 * Turns text into a stream of tokens.
 *
 * Contract notes:
 * - should be deterministic for given input+options
 * - offsets always refer to the original text, whatever the normalization
 * - markup units advance positions but are never yielded
 */
export interface Tokenizer {
  tokenize(text: string, options?: TokenizeOptions): Iterable<Token>;
}
