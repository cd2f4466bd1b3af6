import type { TokenText } from "../types.js";
import type { TermTrie, TrieNode } from "../trie.js";

class Node implements TrieNode {
  readonly children = new Map<TokenText, Node>();
  terminal = false;
}

export class MemoryTermTrie implements TermTrie {
  readonly root: Node = new Node();

  insert(tokens: readonly TokenText[]): void {
    if (tokens.length === 0) return;

    let cur = this.root;
    for (const token of tokens) {
      let next = cur.children.get(token);
      if (!next) {
        next = new Node();
        cur.children.set(token, next);
      }
      cur = next;
    }

    cur.terminal = true;
  }

  lookup(node: TrieNode, token: TokenText): TrieNode | undefined {
    return node instanceof Node ? node.children.get(token) : undefined;
  }

  has(tokens: readonly TokenText[]): boolean {
    if (tokens.length === 0) return false;

    let cur: TrieNode | undefined = this.root;
    for (const token of tokens) {
      cur = this.lookup(cur, token);
      if (!cur) return false;
    }
    return cur.terminal;
  }
}
