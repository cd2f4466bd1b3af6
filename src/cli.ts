import { Command } from "commander";

import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { TermMatcherError } from "./core/errors.js";
import { createMatcherFromFile, type FastTermMatcher } from "./core/impl/index.js";
import { createMatcherEngine } from "./http/engine.js";
import { startServer } from "./http/server.js";

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  readStdin(): Promise<string>;
}

async function readProcessStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const c of process.stdin) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  return Buffer.concat(chunks).toString("utf8");
}

const processIO: CliIO = {
  out: (line) => process.stdout.write(line + "\n"),
  err: (line) => process.stderr.write(line + "\n"),
  readStdin: readProcessStdin,
};

export function buildProgram(io: CliIO = processIO): Command {
  const program = new Command();

  /** Load failures print their message and exit with status 1. */
  async function guardLoad<T>(loading: Promise<T>): Promise<T> {
    try {
      return await loading;
    } catch (e) {
      if (e instanceof TermMatcherError) program.error(e.message, { exitCode: 1, code: e.code });
      throw e;
    }
  }

  function load(path: string): Promise<FastTermMatcher> {
    return guardLoad(createMatcherFromFile(path));
  }

  program
    .name("term-matcher")
    .description("Find dictionary terms in text")
    .version("0.1.0")
    .configureOutput({ writeOut: (s) => io.out(s.trimEnd()), writeErr: (s) => io.err(s.trimEnd()) });

  program
    .command("match")
    .description("Print every term occurrence as start, end and matched text")
    .requiredOption("-t, --terms <file>", "newline-delimited terms file")
    .argument("[text...]", "text to scan (stdin when omitted)")
    .action(async (words: string[], options: { terms: string }) => {
      const matcher = await load(options.terms);
      const text = words.length ? words.join(" ") : await io.readStdin();
      for (const m of matcher.matchText(text)) {
        io.out(`${m.start}\t${m.end}\t${text.slice(m.start, m.end)}`);
      }
    });

  program
    .command("count")
    .description("Print the number of terms loaded from a file")
    .requiredOption("-t, --terms <file>", "newline-delimited terms file")
    .action(async (options: { terms: string }) => {
      const matcher = await load(options.terms);
      io.out(String(matcher.termCount));
    });

  program
    .command("serve")
    .description("Start the HTTP matching service")
    .option("-p, --port <n>", "port to listen on", (v) => Number.parseInt(v, 10))
    .option("-t, --terms <file>", "terms file to load before listening")
    .action(async (options: { port?: number; terms?: string }) => {
      const config = loadConfig();
      const log = createLogger(config.logLevel);
      const engine = createMatcherEngine();
      const termsFile = options.terms ?? config.termsFile;
      if (termsFile) {
        const loaded = await guardLoad(engine.loadTermsFromFile(termsFile));
        log.info(`loaded ${loaded} terms from ${termsFile}`);
      }
      const { port } = await startServer({
        port: options.port ?? config.port,
        metricsEnabled: config.metricsEnabled,
        engine,
        logger: log,
      });
      log.info(`listening on :${port}`);
    });

  return program;
}
