import type { Readable } from "node:stream";

import type { OffsetPosition, Token, TokenPair } from "../types.js";
import type { TermTrie } from "../trie.js";
import type { Tokenizer } from "../tokenizer.js";
import type { TermMatcher } from "../matcher.js";
import { TermLoadError, TermMatcherError } from "../errors.js";
import { DelimiterPolicy, defaultDelimiterPolicy } from "./delimiterPolicy.js";
import { DelimiterTokenizer } from "./delimiterTokenizer.js";
import { MemoryTermTrie } from "./memoryTermTrie.js";
import { TermLoader } from "./termLoader.js";
import { scanFrontier } from "./frontierScanner.js";

export const NEWLINE_MARKER = "@newline";

export interface MatcherDeps {
  trie: TermTrie;
  tokenizer: Tokenizer;
  policy: DelimiterPolicy;
}

/**
 * Rebuilds a text from tokens: each token becomes a space followed by its
 * head (the token cut at its first space, else its first tab). The newline
 * marker token contributes nothing. Lossy by construction.
 */
export function reconstructText(tokens: Iterable<string>): string {
  let text = "";
  for (const token of tokens) {
    if (token.trim() === NEWLINE_MARKER) continue;
    let cut = token.indexOf(" ");
    if (cut === -1) cut = token.indexOf("\t");
    text += " " + (cut === -1 ? token : token.slice(0, cut));
  }
  return text;
}

function* tokenHalves(pairs: readonly TokenPair[]): Iterable<string> {
  for (const [token] of pairs) yield token;
}

function isPairList(input: readonly string[] | readonly TokenPair[]): input is readonly TokenPair[] {
  return input.length > 0 && typeof input[0] !== "string";
}

/**
 * Trie-backed dictionary matcher.
 *
 * Load terms first, then match; the trie is only read while matching, so a
 * loaded matcher can serve any number of concurrent calls.
 */
export class FastTermMatcher implements TermMatcher {
  private readonly loader: TermLoader;

  constructor(private readonly deps: MatcherDeps) {
    this.loader = new TermLoader(deps.trie, deps.tokenizer);
  }

  get termCount(): number {
    return this.loader.inserted;
  }

  loadTerm(raw: string): number {
    return this.loader.loadTerm(raw);
  }

  loadTerms(raw: Iterable<string>): number {
    return this.loader.loadTerms(raw);
  }

  loadTermsFromStream(input: Readable): Promise<number> {
    return this.loader.loadStream(input);
  }

  loadTermsFromFile(path: string): Promise<number> {
    return this.loader.loadFile(path);
  }

  match(text: string): OffsetPosition[];
  match(tokens: readonly string[]): OffsetPosition[];
  match(pairs: readonly TokenPair[]): OffsetPosition[];
  match(input: string | readonly string[] | readonly TokenPair[]): OffsetPosition[] {
    if (typeof input === "string") return this.matchText(input);
    if (isPairList(input)) return this.matchTokenPairs(input);
    return this.matchTokens(input);
  }

  matchText(text: string): OffsetPosition[] {
    return scanFrontier(this.deps.trie, this.deps.tokenizer.tokenize(text, { normalizeCase: true }), "offset");
  }

  matchTokens(tokens: Iterable<string>): OffsetPosition[] {
    return scanFrontier(this.deps.trie, this.indexTokens(tokens), "index");
  }

  matchTokenPairs(pairs: readonly TokenPair[]): OffsetPosition[] {
    return this.matchTokens(tokenHalves(pairs));
  }

  matchReconstructed(tokens: Iterable<string>): OffsetPosition[] {
    return this.matchText(reconstructText(tokens));
  }

  matchReconstructedPairs(pairs: readonly TokenPair[]): OffsetPosition[] {
    return this.matchReconstructed(tokenHalves(pairs));
  }

  /** Separator-only and markup elements keep their index but never match. */
  private *indexTokens(tokens: Iterable<string>): Iterable<Token> {
    const { policy } = this.deps;
    let position = 0;
    for (const token of tokens) {
      if (!policy.isSeparator(token) && !policy.isMarkup(token)) {
        yield { term: token.toLowerCase(), position };
      }
      position++;
    }
  }
}

export interface MatcherOptions {
  /** Punctuation characters treated as delimiters besides whitespace. */
  punctuation?: string;
}

export function createFastTermMatcher(options: MatcherOptions = {}): FastTermMatcher {
  const policy = options.punctuation === undefined ? defaultDelimiterPolicy : new DelimiterPolicy(options.punctuation);
  return new FastTermMatcher({
    trie: new MemoryTermTrie(),
    tokenizer: new DelimiterTokenizer(policy),
    policy,
  });
}

/**
 * Builds a matcher loaded from a newline-delimited terms file.
 *
 * A missing or unreadable file surfaces as a `TermSourceUnavailableError`;
 * anything else that goes wrong while loading becomes a `TermLoadError`.
 */
export async function createMatcherFromFile(path: string, options: MatcherOptions = {}): Promise<FastTermMatcher> {
  const matcher = createFastTermMatcher(options);
  try {
    await matcher.loadTermsFromFile(path);
  } catch (err) {
    if (err instanceof TermMatcherError) throw err;
    throw new TermLoadError(`failed to load terms from '${path}'`, { cause: err });
  }
  return matcher;
}
