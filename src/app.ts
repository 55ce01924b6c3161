// ---------------------------------------------------------------------------
// Shelf Scout -- application bootstrap (shared by the CLI and tests).
// ---------------------------------------------------------------------------

import type pino from "pino";

import type {
  AppConfig,
  CatalogDefinition,
  PageTextFetcher,
  ProgressObserver,
  ReadingListEntry,
  RunSummary,
  SearchResult,
  SearchTask,
  SessionFactory,
} from "./core/types.js";
import { loadCatalogRegistry } from "./config/catalog-registry.js";
import { loadReadingList } from "./io/reading-list.js";
import { generateTasks } from "./orchestrator/task-generator.js";
import { SessionManager } from "./orchestrator/session-manager.js";
import { WorkerPool } from "./orchestrator/worker-pool.js";
import { ProgressTracker } from "./orchestrator/progress.js";
import { ResultCollector } from "./orchestrator/result-aggregator.js";
import { PlaywrightSessionFactory } from "./adapters/playwright/browser-session.js";
import { PageFetcher } from "./adapters/playwright/page-fetcher.js";

// ── Planning ───────────────────────────────────────────────────────────────

export interface PlanOptions {
  inputPath: string;
  catalogsPath: string;
  shelf?: string;
  includeAuthor?: boolean;
}

export interface RunPlan {
  entries: ReadingListEntry[];
  catalogs: CatalogDefinition[];
  tasks: SearchTask[];
}

/**
 * Read the inputs and build the task set. Input failures throw here, before
 * any browser is started.
 */
export function planRun(options: PlanOptions): RunPlan {
  const entries = loadReadingList(options.inputPath, { shelf: options.shelf });
  const catalogs = loadCatalogRegistry(options.catalogsPath);
  const tasks = generateTasks(entries, catalogs, {
    includeAuthor: options.includeAuthor,
  });
  return { entries, catalogs, tasks };
}

// ── Runtime ────────────────────────────────────────────────────────────────

export interface Runtime {
  sessionManager: SessionManager;
  fetcher: PageTextFetcher;
}

/**
 * Wire the browser layer. `sessionFactory` defaults to Playwright; tests
 * pass an in-process fake.
 */
export function createRuntime(
  config: AppConfig,
  logger: pino.Logger,
  sessionFactory: SessionFactory = new PlaywrightSessionFactory({
    headless: config.browser.headless,
    executablePath: config.browser.executablePath,
  }),
): Runtime {
  return {
    sessionManager: new SessionManager(sessionFactory, logger, {
      maxConcurrentLaunches: config.browser.maxConcurrentLaunches,
    }),
    fetcher: new PageFetcher(logger, config.fetch),
  };
}

// ── Execution ──────────────────────────────────────────────────────────────

export interface ExecuteOptions {
  concurrency: number;
  onProgress?: ProgressObserver;
  onResult?: (result: SearchResult) => void;
}

export interface RunReport {
  results: readonly SearchResult[];
  summary: RunSummary;
  durationMs: number;
}

/**
 * Run every task through the worker pool, tracking progress and collecting
 * results in completion order.
 */
export async function executeRun(
  tasks: readonly SearchTask[],
  runtime: Runtime,
  logger: pino.Logger,
  options: ExecuteOptions,
): Promise<RunReport> {
  const startMs = Date.now();
  const progress = new ProgressTracker(tasks.length);
  const collector = new ResultCollector();
  if (options.onProgress) {
    progress.subscribe(options.onProgress);
  }

  const pool = new WorkerPool({
    concurrency: options.concurrency,
    sessionManager: runtime.sessionManager,
    fetcher: runtime.fetcher,
    logger,
  });

  await pool.run(tasks, (result) => {
    collector.add(result);
    progress.record();
    options.onResult?.(result);
  });

  const summary = collector.summarize();
  const durationMs = Date.now() - startMs;
  logger.info(
    { total: summary.total, errors: summary.errors, durationMs },
    "run completed",
  );

  return { results: collector.results, summary, durationMs };
}
