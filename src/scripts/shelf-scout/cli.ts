import { parseArgs } from "node:util";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import type pino from "pino";

import type { SessionFactory } from "../../core/types.js";
import { loadConfig } from "../../config/config.js";
import { createLogger } from "../../logging/logger.js";
import { ShelfScoutError } from "../../core/errors.js";
import { createRuntime, executeRun, planRun } from "../../app.js";
import type { SessionManager } from "../../orchestrator/session-manager.js";
import { writeResultsCsv } from "../../io/result-writer.js";
import { DEFAULT_SHELF } from "../../io/reading-list.js";
import {
  createProgressPrinter,
  formatResultLine,
  printSummary,
} from "./progress.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = join(__dirname, "..", "..", "..");

/** Exit code after SIGINT/SIGTERM (128 + SIGINT). */
export const INTERRUPTED_EXIT_CODE = 130;

const USAGE = `Usage: shelf-scout [options]

  --input <csv>         Goodreads library export (default: goodreads_library_export.csv)
  --output <csv>        Results file (default: results.csv)
  --catalogs <yaml>     Catalog registry (default: config/catalogs.yaml)
  --concurrency <n>     Worker/browser count (default: $SHELF_SCOUT_CONCURRENCY or 16)
  --shelf <name>        Shelf to read (default: ${DEFAULT_SHELF})
  --no-author           Search by title only
  --headed              Show the browser windows
  --readiness <mode>    "marker" (wait for result text) or "settle" (fixed delay)
  --verbose             Print every result as it arrives
  --dry-run             Print the generated searches and exit
  --help                Show this message`;

interface CliOptions {
  inputPath: string;
  outputPath: string;
  catalogsPath: string;
  shelf: string;
  includeAuthor: boolean;
  verbose: boolean;
  dryRun: boolean;
  help: boolean;
  env: Record<string, string | undefined>;
}

function parseCliArgs(
  argv: readonly string[],
  baseEnv: Record<string, string | undefined>,
): CliOptions {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      input: { type: "string" },
      output: { type: "string" },
      catalogs: { type: "string" },
      concurrency: { type: "string" },
      shelf: { type: "string" },
      "no-author": { type: "boolean" },
      headed: { type: "boolean" },
      readiness: { type: "string" },
      verbose: { type: "boolean" },
      "dry-run": { type: "boolean" },
      help: { type: "boolean" },
    },
    strict: true,
  });

  // Flags override the environment; loadConfig validates both alike.
  const env: Record<string, string | undefined> = { ...baseEnv };
  if (values.concurrency !== undefined) env["SHELF_SCOUT_CONCURRENCY"] = values.concurrency;
  if (values.readiness !== undefined) env["SHELF_SCOUT_READINESS_MODE"] = values.readiness;
  if (values.headed === true) env["SHELF_SCOUT_HEADLESS"] = "false";

  return {
    inputPath: values.input ?? "goodreads_library_export.csv",
    outputPath: values.output ?? "results.csv",
    catalogsPath: values.catalogs ?? join(PROJECT_ROOT, "config", "catalogs.yaml"),
    shelf: values.shelf ?? DEFAULT_SHELF,
    includeAuthor: values["no-author"] !== true,
    verbose: values.verbose === true,
    dryRun: values["dry-run"] === true,
    help: values.help === true,
    env,
  };
}

/**
 * Build the SIGINT/SIGTERM handler: close every browser session, then exit
 * with {@link INTERRUPTED_EXIT_CODE} whether or not the close succeeded.
 */
export function createInterruptHandler(
  sessionManager: SessionManager,
  exit: (code: number) => void,
  logger?: pino.Logger,
): () => Promise<void> {
  return async () => {
    console.log("\nInterrupted. Closing browser sessions...");
    try {
      await sessionManager.releaseAll();
    } catch (err) {
      logger?.error({ err }, "failed to close sessions on interrupt");
    }
    exit(INTERRUPTED_EXIT_CODE);
  };
}

export interface CliDependencies {
  /** Browser layer; defaults to Playwright. */
  sessionFactory?: SessionFactory;
  /** Called by the interrupt handler; defaults to `process.exit`. */
  exit?: (code: number) => void;
}

/**
 * Run the CLI and resolve with the process exit code: 0 on success, 1 when
 * the inputs, the configuration or the run itself fail.
 */
export async function runCli(
  argv: readonly string[],
  env: Record<string, string | undefined>,
  deps: CliDependencies = {},
): Promise<number> {
  try {
    await run(argv, env, deps);
    return 0;
  } catch (err) {
    if (err instanceof ShelfScoutError) {
      console.error(`Error: ${err.message}`);
    } else {
      console.error("Fatal error:", err);
    }
    return 1;
  }
}

async function run(
  argv: readonly string[],
  env: Record<string, string | undefined>,
  deps: CliDependencies,
): Promise<void> {
  const opts = parseCliArgs(argv, env);
  if (opts.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig(opts.env);
  const logger = createLogger(config.logging);

  const plan = planRun({
    inputPath: opts.inputPath,
    catalogsPath: opts.catalogsPath,
    shelf: opts.shelf,
    includeAuthor: opts.includeAuthor,
  });
  const enabledCatalogs = plan.catalogs.filter((c) => c.enabled);

  console.log("Shelf Scout - Reading List x Library Availability");
  console.log("=================================================");
  console.log(`  Titles (${opts.shelf}): ${plan.entries.length}`);
  console.log(`  Libraries:     ${enabledCatalogs.map((c) => c.id).join(", ")}`);
  console.log(`  Searches:      ${plan.tasks.length}`);
  console.log(`  Workers:       ${config.concurrency}`);
  console.log(`  Readiness:     ${config.fetch.readinessMode}`);
  console.log();

  if (opts.dryRun) {
    console.log("--- DRY RUN: searches that would run ---");
    for (const task of plan.tasks) {
      console.log(`  ${task.catalogId.padEnd(16)} ${task.searchUrl}`);
    }
    console.log(`\nTotal: ${plan.tasks.length} searches`);
    return;
  }

  if (plan.tasks.length === 0) {
    console.log("Nothing to search.");
    await writeResultsCsv(opts.outputPath, []);
    return;
  }

  const runtime = createRuntime(config, logger, deps.sessionFactory);

  // Close every browser before exiting on Ctrl-C.
  const onInterrupt = createInterruptHandler(
    runtime.sessionManager,
    deps.exit ?? ((code) => process.exit(code)),
    logger,
  );
  process.once("SIGINT", onInterrupt);
  process.once("SIGTERM", onInterrupt);

  const printProgress = createProgressPrinter();
  try {
    const report = await executeRun(plan.tasks, runtime, logger, {
      concurrency: config.concurrency,
      onProgress: printProgress,
      onResult: opts.verbose
        ? (result) => {
            process.stdout.write(`\r${formatResultLine(result)}\n`);
          }
        : undefined,
    });

    await writeResultsCsv(opts.outputPath, report.results);
    printSummary(report.summary, report.durationMs);
    console.log(`\nResults written to ${opts.outputPath}`);
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    process.removeListener("SIGTERM", onInterrupt);
  }
}
