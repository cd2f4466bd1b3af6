export type LogLevel = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  port: number;
  metricsEnabled: boolean;
  /** Terms file loaded at start-up, if any. */
  termsFile?: string;
  logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(v: string): v is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(v);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = Number(env.PORT ?? 3000);
  const level = (env.LOG_LEVEL ?? "info").toLowerCase();

  return {
    port: Number.isInteger(port) && port >= 0 ? port : 3000,
    metricsEnabled: env.METRICS_ENABLED === "1",
    termsFile: env.TERMS_FILE || undefined,
    logLevel: isLogLevel(level) ? level : "info",
  };
}
