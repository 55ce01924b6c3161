// ---------------------------------------------------------------------------
// Tests for the environment configuration loader.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { loadConfig } from "../../../src/config/config.js";
import { ConfigurationError } from "../../../src/core/errors.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      concurrency: 16,
      browser: {
        headless: true,
        executablePath: undefined,
        maxConcurrentLaunches: 4,
      },
      fetch: {
        readinessMode: "marker",
        readinessTimeoutMs: 15_000,
        settleDelayMs: 4_000,
        navigationTimeoutMs: 30_000,
      },
      logging: {
        level: "info",
        prettyPrint: false,
      },
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      SHELF_SCOUT_CONCURRENCY: "32",
      SHELF_SCOUT_HEADLESS: "false",
      SHELF_SCOUT_MAX_LAUNCHES: "2",
      SHELF_SCOUT_READINESS_MODE: "settle",
      SHELF_SCOUT_READINESS_TIMEOUT_MS: "5000",
      SHELF_SCOUT_SETTLE_DELAY_MS: "0",
      SHELF_SCOUT_NAVIGATION_TIMEOUT_MS: "10000",
      SHELF_SCOUT_LOG_LEVEL: "debug",
      SHELF_SCOUT_LOG_PRETTY: "1",
      CHROMIUM_PATH: "/usr/bin/chromium",
    });

    expect(config).toEqual({
      concurrency: 32,
      browser: {
        headless: false,
        executablePath: "/usr/bin/chromium",
        maxConcurrentLaunches: 2,
      },
      fetch: {
        readinessMode: "settle",
        readinessTimeoutMs: 5_000,
        settleDelayMs: 0,
        navigationTimeoutMs: 10_000,
      },
      logging: { level: "debug", prettyPrint: true },
    });
  });

  it("treats empty variables as unset", () => {
    expect(loadConfig({ SHELF_SCOUT_CONCURRENCY: "" }).concurrency).toBe(16);
  });

  it("ignores unrelated variables", () => {
    expect(loadConfig({ PATH: "/usr/bin", HOME: "/root" }).concurrency).toBe(16);
  });

  it.each([
    ["SHELF_SCOUT_CONCURRENCY", "0"],
    ["SHELF_SCOUT_CONCURRENCY", "many"],
    ["SHELF_SCOUT_HEADLESS", "yes"],
    ["SHELF_SCOUT_READINESS_MODE", "sleep"],
    ["SHELF_SCOUT_LOG_LEVEL", "verbose"],
  ])("rejects %s=%s", (name, value) => {
    expect(() => loadConfig({ [name]: value })).toThrow(ConfigurationError);
  });

  it("names the offending variable", () => {
    expect(() => loadConfig({ SHELF_SCOUT_CONCURRENCY: "-4" })).toThrow(
      /SHELF_SCOUT_CONCURRENCY/,
    );
  });
});
