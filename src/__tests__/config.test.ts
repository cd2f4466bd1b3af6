import { afterEach, describe, expect, it, vi } from "vitest";

import { loadConfig } from "../config.js";
import { createLogger } from "../logger.js";

describe("loadConfig", () => {
  it("reads settings from the environment", () => {
    expect(
      loadConfig({ PORT: "8080", METRICS_ENABLED: "1", TERMS_FILE: "/data/terms.txt", LOG_LEVEL: "WARN" }),
    ).toEqual({ port: 8080, metricsEnabled: true, termsFile: "/data/terms.txt", logLevel: "warn" });
  });

  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({ port: 3000, metricsEnabled: false, termsFile: undefined, logLevel: "info" });
    expect(loadConfig({ PORT: "abc", LOG_LEVEL: "loud", TERMS_FILE: "" })).toEqual({
      port: 3000,
      metricsEnabled: false,
      termsFile: undefined,
      logLevel: "info",
    });
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops messages below the configured level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = createLogger("warn");
    logger.info("loaded");
    logger.warn("slow load");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[warn] slow load");
  });
});
