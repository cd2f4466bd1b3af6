import "dotenv/config";

import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { TermMatcherError } from "./core/errors.js";
import { createMatcherEngine } from "./http/engine.js";
import { startServer } from "./http/server.js";

const config = loadConfig();
const log = createLogger(config.logLevel);
const engine = createMatcherEngine();

if (config.termsFile) {
  try {
    const loaded = await engine.loadTermsFromFile(config.termsFile);
    log.info(`loaded ${loaded} terms from ${config.termsFile}`);
  } catch (e) {
    if (!(e instanceof TermMatcherError)) throw e;
    log.error(e.message);
    process.exit(1);
  }
}

const { server, port } = await startServer({ port: config.port, metricsEnabled: config.metricsEnabled, engine, logger: log });

function shutdown(): void {
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

log.info(`listening on :${port}`);
