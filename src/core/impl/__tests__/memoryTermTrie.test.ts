import { describe, expect, it } from "vitest";
import type { TokenText } from "../../types.js";
import { MemoryTermTrie } from "../memoryTermTrie.js";

describe("MemoryTermTrie", () => {
  it("marks only full terms terminal", () => {
    const trie = new MemoryTermTrie();
    const term: TokenText[] = ["new", "york"];
    trie.insert(term);

    expect(trie.has(term)).toBe(true);
    expect(trie.has(["new"])).toBe(false);

    trie.insert(["new"]);
    expect(trie.has(["new"])).toBe(true);
    expect(trie.has(["new", "york"])).toBe(true);
  });

  it("shares prefixes between terms", () => {
    const trie = new MemoryTermTrie();
    trie.insert(["new", "york"]);
    trie.insert(["new", "jersey"]);

    const node = trie.lookup(trie.root, "new");
    expect(node).toBeDefined();
    expect(node && trie.lookup(node, "york")?.terminal).toBe(true);
    expect(node && trie.lookup(node, "jersey")?.terminal).toBe(true);
    expect(trie.lookup(trie.root, "york")).toBeUndefined();
  });

  it("ignores empty sequences and never marks the root", () => {
    const trie = new MemoryTermTrie();
    trie.insert([]);
    expect(trie.root.terminal).toBe(false);
    expect(trie.has([])).toBe(false);
  });

  it("accepts duplicate inserts", () => {
    const trie = new MemoryTermTrie();
    trie.insert(["bronx"]);
    trie.insert(["bronx"]);
    expect(trie.has(["bronx"])).toBe(true);
  });
});
