import {
  createFastTermMatcher,
  type FastTermMatcher,
  type MatcherOptions,
} from "../core/impl/index.js";
import type { OffsetPosition, TokenPair } from "../core/types.js";

export type MatchRequest =
  | { kind: "text"; text: string }
  | { kind: "tokens"; tokens: string[]; mode: MatchMode }
  | { kind: "pairs"; pairs: TokenPair[]; mode: MatchMode };

/** How token input is matched: by index, or through a reconstructed text. */
export type MatchMode = "index" | "reconstructed";

export interface MatchHit extends OffsetPosition {
  /** Matched slice of the input, for text requests only. */
  surface?: string;
}

export interface EngineStats {
  terms: number;
  matchRequests: number;
  matchHits: number;
}

export interface Engine {
  loadTerms(terms: string[]): number;
  loadTermsFromFile(path: string): Promise<number>;
  match(req: MatchRequest): MatchHit[];
  stats(): EngineStats;
}

export function createMatcherEngine(options: MatcherOptions = {}): Engine {
  const matcher: FastTermMatcher = createFastTermMatcher(options);
  let matchRequests = 0;
  let matchHits = 0;

  function run(req: MatchRequest): MatchHit[] {
    switch (req.kind) {
      case "text":
        return matcher.matchText(req.text).map((m) => ({ ...m, surface: req.text.slice(m.start, m.end) }));
      case "tokens":
        return req.mode === "index" ? matcher.matchTokens(req.tokens) : matcher.matchReconstructed(req.tokens);
      case "pairs":
        return req.mode === "index" ? matcher.matchTokenPairs(req.pairs) : matcher.matchReconstructedPairs(req.pairs);
    }
  }

  return {
    loadTerms(terms) {
      return matcher.loadTerms(terms);
    },
    loadTermsFromFile(path) {
      return matcher.loadTermsFromFile(path);
    },
    match(req) {
      const hits = run(req);
      matchRequests++;
      matchHits += hits.length;
      return hits;
    },
    stats() {
      return { terms: matcher.termCount, matchRequests, matchHits };
    },
  };
}
