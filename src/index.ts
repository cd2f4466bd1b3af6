export type { OffsetPosition, TokenText, Token, TokenPair } from "./core/types.js";
export type { TermTrie, TrieNode } from "./core/trie.js";
export type { TokenizeOptions, Tokenizer } from "./core/tokenizer.js";
export type { TermMatcher } from "./core/matcher.js";
export { TermLoadError, TermMatcherError, TermSourceUnavailableError } from "./core/errors.js";
export * from "./core/impl/index.js";
