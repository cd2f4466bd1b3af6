import type { TokenText } from "./types.js";

/**
 * A node of the term trie. Opaque to callers: traversal goes through
 * {@link TermTrie.lookup}.
 */
export interface TrieNode {
  readonly terminal: boolean;
}

/**
 * Prefix tree over token sequences.
 *
 * Contract notes:
 * - edges are labeled by already-normalized tokens
 * - the root is never terminal
 * - lookups never mutate, so a loaded trie can be shared between scans
 */
export interface TermTrie {
  readonly root: TrieNode;

  /** Inserts a token sequence and marks its last node terminal. Empty input is a no-op. */
  insert(tokens: readonly TokenText[]): void;

  lookup(node: TrieNode, token: TokenText): TrieNode | undefined;

  /** True if the exact token sequence was inserted. */
  has(tokens: readonly TokenText[]): boolean;
}
