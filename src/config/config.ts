// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables with sensible defaults.
// ---------------------------------------------------------------------------

import { z } from "zod";

import type { AppConfig } from "../core/types.js";
import { ReadinessMode } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  SHELF_SCOUT_CONCURRENCY: positiveInt.default(16),
  SHELF_SCOUT_HEADLESS: booleanFlag.default("true"),
  SHELF_SCOUT_MAX_LAUNCHES: positiveInt.default(4),
  SHELF_SCOUT_READINESS_MODE: z
    .enum([ReadinessMode.MARKER, ReadinessMode.SETTLE])
    .default(ReadinessMode.MARKER),
  SHELF_SCOUT_READINESS_TIMEOUT_MS: positiveInt.default(15_000),
  SHELF_SCOUT_SETTLE_DELAY_MS: z.coerce.number().int().nonnegative().default(4_000),
  SHELF_SCOUT_NAVIGATION_TIMEOUT_MS: positiveInt.default(30_000),
  SHELF_SCOUT_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  SHELF_SCOUT_LOG_PRETTY: booleanFlag.default("false"),
  CHROMIUM_PATH: z.string().min(1).optional(),
});

/**
 * Load the run configuration from environment variables.
 *
 * Every setting has a hard-coded default so the tool runs with zero
 * configuration. Empty variables count as unset.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== ""),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment configuration: ${details}`);
  }
  const e = parsed.data;

  return {
    concurrency: e.SHELF_SCOUT_CONCURRENCY,

    browser: {
      headless: e.SHELF_SCOUT_HEADLESS,
      executablePath: e.CHROMIUM_PATH,
      maxConcurrentLaunches: e.SHELF_SCOUT_MAX_LAUNCHES,
    },

    fetch: {
      readinessMode: e.SHELF_SCOUT_READINESS_MODE,
      readinessTimeoutMs: e.SHELF_SCOUT_READINESS_TIMEOUT_MS,
      settleDelayMs: e.SHELF_SCOUT_SETTLE_DELAY_MS,
      navigationTimeoutMs: e.SHELF_SCOUT_NAVIGATION_TIMEOUT_MS,
    },

    logging: {
      level: e.SHELF_SCOUT_LOG_LEVEL,
      prettyPrint: e.SHELF_SCOUT_LOG_PRETTY,
    },
  };
}
