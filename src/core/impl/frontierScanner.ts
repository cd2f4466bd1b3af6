import type { OffsetPosition, Token } from "../types.js";
import type { TermTrie, TrieNode } from "../trie.js";

/**
 * How a token's span maps onto an {@link OffsetPosition}:
 * - "offset": character offsets, end exclusive
 * - "index": token indices, end inclusive
 */
export type PositionMode = "offset" | "index";

interface Candidate {
  node: TrieNode;
  start: number;
  last: number;
}

function spanOf(tok: Token, mode: PositionMode): { start: number; last: number } {
  return mode === "offset"
    ? { start: tok.startOffset ?? tok.position, last: tok.endOffset ?? tok.position }
    : { start: tok.position, last: tok.position };
}

/**
 * Streams match-eligible tokens through a frontier of partial matches.
 *
 * Tokens must already be normalized; markup and separators are expected to
 * have been dropped by the caller (they advance positions but never match).
 * The frontier is local to each call, so one trie may serve concurrent scans.
 */
export function scanFrontier(trie: TermTrie, tokens: Iterable<Token>, mode: PositionMode): OffsetPosition[] {
  const results: OffsetPosition[] = [];
  let frontier: Candidate[] = [];

  for (const tok of tokens) {
    const { start, last } = spanOf(tok, mode);
    const next: Candidate[] = [];

    // continuation and termination are independent outcomes of one candidate
    for (const cand of frontier) {
      const child = trie.lookup(cand.node, tok.term);
      if (child) next.push({ node: child, start: cand.start, last });
      if (cand.node.terminal) results.push({ start: cand.start, end: cand.last });
    }

    const fresh = trie.lookup(trie.root, tok.term);
    if (fresh) next.push({ node: fresh, start, last });

    frontier = next;
  }

  for (const cand of frontier) {
    if (cand.node.terminal) results.push({ start: cand.start, end: cand.last });
  }

  return results;
}
