// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

/** Re-export pino's Logger type for convenience. */
export type Logger = pino.Logger;

/** stderr, so the progress line on stdout stays intact. */
const STDERR_FD = 2;

/**
 * Create a configured pino logger instance.
 *
 * - JSON output to stderr (pino default format)
 * - Base fields: `service` and `version`
 * - Optional pretty-print via `pino-pretty` transport for interactive runs
 */
export function createLogger(config: LoggingConfig): pino.Logger {
  const baseOptions: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: "shelf-scout",
      version: process.env["APP_VERSION"] ?? "dev",
    },
  };

  if (config.prettyPrint) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname,service,version",
          destination: STDERR_FD,
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(STDERR_FD));
}

/** A logger that drops everything. */
export function createSilentLogger(): pino.Logger {
  return pino({ level: "silent" });
}
