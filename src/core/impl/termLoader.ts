import { constants, createReadStream } from "node:fs";
import { access, stat } from "node:fs/promises";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";

import type { TokenText } from "../types.js";
import type { TermTrie } from "../trie.js";
import type { Tokenizer } from "../tokenizer.js";
import { TermLoadError, TermSourceUnavailableError } from "../errors.js";

/**
 * Feeds raw term strings into a trie.
 *
 * Loading is not transactional: when a source fails part way, terms read
 * before the failure stay in the trie.
 */
export class TermLoader {
  private count = 0;

  constructor(
    private readonly trie: TermTrie,
    private readonly tokenizer: Tokenizer,
  ) {}

  /** Terms inserted so far, duplicates included. */
  get inserted(): number {
    return this.count;
  }

  /** Returns 1 if the raw string held at least one token, 0 otherwise. */
  loadTerm(raw: string): number {
    if (!raw.trim().length) return 0;

    const tokens: TokenText[] = [];
    for (const tok of this.tokenizer.tokenize(raw.toLowerCase(), { normalizeCase: true })) {
      tokens.push(tok.term);
    }
    if (tokens.length === 0) return 0;

    this.trie.insert(tokens);
    this.count++;
    return 1;
  }

  loadTerms(raw: Iterable<string>): number {
    let count = 0;
    for (const line of raw) count += this.loadTerm(line);
    return count;
  }

  /** Reads newline-delimited UTF-8 terms, one per line. */
  async loadStream(input: Readable): Promise<number> {
    const rl = createInterface({ input, crlfDelay: Infinity });

    let failure: unknown;
    input.once("error", (err) => {
      failure = err;
      rl.close();
    });

    let count = 0;
    try {
      for await (const line of rl) {
        count += this.loadTerm(line);
      }
    } catch (err) {
      throw new TermLoadError("failed while reading terms", { cause: err });
    } finally {
      rl.close();
    }

    if (failure !== undefined) {
      throw new TermLoadError("failed while reading terms", { cause: failure });
    }
    return count;
  }

  async loadFile(path: string): Promise<number> {
    try {
      await access(path, constants.R_OK);
    } catch (err) {
      throw new TermSourceUnavailableError(`cannot read terms file '${path}'`, { cause: err });
    }
    if (!(await stat(path)).isFile()) {
      throw new TermSourceUnavailableError(`terms file '${path}' is not a regular file`);
    }

    return this.loadStream(createReadStream(path));
  }
}
