/** Shared core types used by module contracts. */

/** Text of one normalized token; the label of a single trie edge. */
export type TokenText = string;

/** A token produced by a tokenizer. */
export interface Token {
  term: TokenText;
  /** 0-based position within the source (token index, not byte offset). */
  position: number;
  /** Character offsets into the source text, end exclusive. */
  startOffset?: number;
  endOffset?: number;
}

/** An already-tokenized token with an auxiliary label that matching ignores. */
export type TokenPair = readonly [token: string, label: string];

/**
 * Span of a match.
 *
 * In character-offset mode `end` is the offset just past the last matched
 * character; in token-index mode it is the index of the last matched token.
 */
export interface OffsetPosition {
  start: number;
  end: number;
}
