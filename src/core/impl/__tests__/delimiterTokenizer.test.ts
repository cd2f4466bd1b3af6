import { describe, expect, it } from "vitest";
import { DelimiterPolicy } from "../delimiterPolicy.js";
import { DelimiterTokenizer } from "../delimiterTokenizer.js";

describe("DelimiterTokenizer", () => {
  it("splits on whitespace and punctuation with original offsets", () => {
    const tok = new DelimiterTokenizer();
    expect(Array.from(tok.tokenize("The Bronx, NY"))).toEqual([
      { term: "the", position: 0, startOffset: 0, endOffset: 3 },
      { term: "bronx", position: 1, startOffset: 4, endOffset: 9 },
      { term: "ny", position: 2, startOffset: 11, endOffset: 13 },
    ]);
  });

  it("keeps case when asked", () => {
    const tok = new DelimiterTokenizer();
    const terms = Array.from(tok.tokenize("New York", { normalizeCase: false })).map((t) => t.term);
    expect(terms).toEqual(["New", "York"]);
  });

  it("cuts markup out of adjacent words and skips it by default", () => {
    const tok = new DelimiterTokenizer();
    expect(Array.from(tok.tokenize("<tag>bronx</tag>"))).toEqual([
      { term: "bronx", position: 1, startOffset: 5, endOffset: 10 },
    ]);
  });

  it("gives markup a position without yielding it", () => {
    const tok = new DelimiterTokenizer();
    expect(Array.from(tok.tokenize("<Tag>New</tag> York"))).toEqual([
      { term: "new", position: 1, startOffset: 5, endOffset: 8 },
      { term: "york", position: 3, startOffset: 15, endOffset: 19 },
    ]);
  });

  it("still finds markup after an unclosed bracket once whitespace intervenes", () => {
    const tok = new DelimiterTokenizer();
    expect(Array.from(tok.tokenize("x<y <b>z"))).toEqual([
      { term: "x<y", position: 0, startOffset: 0, endOffset: 3 },
      { term: "z", position: 2, startOffset: 7, endOffset: 8 },
    ]);
    expect(Array.from(tok.tokenize("a<b<c<d e>")).map((t) => t.term)).toEqual(["a<b<c<d", "e>"]);
  });

  it("scans a long run of unclosed brackets in linear time", () => {
    const tok = new DelimiterTokenizer();
    const n = 200_000;
    const started = Date.now();
    const tokens = Array.from(tok.tokenize("<".repeat(n) + " bronx"));
    expect(Date.now() - started).toBeLessThan(2000);
    expect(tokens).toEqual([
      { term: "<".repeat(n), position: 0, startOffset: 0, endOffset: n },
      { term: "bronx", position: 1, startOffset: n + 1, endOffset: n + 6 },
    ]);
  });

  it("treats a lone angle bracket as a word character", () => {
    const tok = new DelimiterTokenizer();
    expect(Array.from(tok.tokenize("a < b")).map((t) => t.term)).toEqual(["a", "<", "b"]);
  });

  it("honours a custom punctuation set", () => {
    const tok = new DelimiterTokenizer(new DelimiterPolicy(""));
    expect(Array.from(tok.tokenize("new-york, ny")).map((t) => t.term)).toEqual(["new-york,", "ny"]);
  });

  it("yields nothing for empty or delimiter-only text", () => {
    const tok = new DelimiterTokenizer();
    expect(Array.from(tok.tokenize(""))).toEqual([]);
    expect(Array.from(tok.tokenize(" ,.;\n\t"))).toEqual([]);
  });
});

describe("DelimiterPolicy", () => {
  const policy = new DelimiterPolicy();

  it("classifies separators and markup", () => {
    expect(policy.isSeparator("")).toBe(true);
    expect(policy.isSeparator(" , ")).toBe(true);
    expect(policy.isSeparator("a,")).toBe(false);
    expect(policy.isMarkup("<b>")).toBe(true);
    expect(policy.isMarkup("<")).toBe(false);
    expect(policy.isMarkup("<b")).toBe(false);
  });

  it("finds the end of a markup unit unless whitespace comes first", () => {
    expect(policy.markupEnd("x<br>y", 1)).toBe(4);
    expect(policy.markupEnd("< br>", 0)).toBe(-1);
    expect(policy.markupEnd("<br", 0)).toBe(-1);
    expect(policy.markupEnd("br>", 0)).toBe(-1);
  });
});
