export { DelimiterPolicy, DEFAULT_PUNCTUATION, defaultDelimiterPolicy } from "./delimiterPolicy.js";
export { DelimiterTokenizer } from "./delimiterTokenizer.js";
export { MemoryTermTrie } from "./memoryTermTrie.js";
export { TermLoader } from "./termLoader.js";
export { scanFrontier, type PositionMode } from "./frontierScanner.js";
export {
  FastTermMatcher,
  NEWLINE_MARKER,
  createFastTermMatcher,
  createMatcherFromFile,
  reconstructText,
  type MatcherDeps,
  type MatcherOptions,
} from "./fastTermMatcher.js";
