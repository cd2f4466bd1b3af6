import type { LogLevel } from "./config.js";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function createLogger(level: LogLevel = "info"): Logger {
  const enabled = (l: LogLevel) => RANK[l] >= RANK[level];

  return {
    debug(message) {
      if (enabled("debug")) console.debug(`[debug] ${message}`);
    },
    info(message) {
      if (enabled("info")) console.log(`[info] ${message}`);
    },
    warn(message) {
      if (enabled("warn")) console.warn(`[warn] ${message}`);
    },
    error(message, err) {
      if (!enabled("error")) return;
      if (err === undefined) console.error(`[error] ${message}`);
      else console.error(`[error] ${message}`, err);
    },
  };
}
