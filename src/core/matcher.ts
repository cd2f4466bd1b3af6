import type { OffsetPosition, TokenPair } from "./types.js";

/**
 * Dictionary matcher over text or token streams.
 *
 * Every occurrence is reported, overlapping and nested ones included.
 */
export interface TermMatcher {
  readonly termCount: number;

  loadTerm(raw: string): number;
  loadTerms(raw: Iterable<string>): number;

  /** Character-offset mode. */
  matchText(text: string): OffsetPosition[];
  /** Token-index mode. */
  matchTokens(tokens: readonly string[]): OffsetPosition[];
  /** Token-index mode over the token half of each pair. */
  matchTokenPairs(pairs: readonly TokenPair[]): OffsetPosition[];
  /** Rebuilds a text from the tokens, then matches it in character-offset mode. */
  matchReconstructed(tokens: readonly string[]): OffsetPosition[];
  matchReconstructedPairs(pairs: readonly TokenPair[]): OffsetPosition[];
}
