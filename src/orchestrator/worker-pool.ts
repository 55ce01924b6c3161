// ---------------------------------------------------------------------------
// WorkerPool – bounded set of workers draining a shared task queue.
// ---------------------------------------------------------------------------

import type pino from "pino";

import type {
  PageClassification,
  PageTextFetcher,
  SearchResult,
  SearchTask,
} from "../core/types.js";
import {
  ConfigurationError,
  NavigationError,
  SessionCreationError,
} from "../core/errors.js";
import {
  UNKNOWN_CLASSIFICATION,
  classifyPage,
} from "../domain/availability/classifier.js";
import type { SessionManager } from "./session-manager.js";

export interface WorkerPoolOptions {
  /** Number of concurrent workers; each owns one session. */
  concurrency: number;
  sessionManager: SessionManager;
  fetcher: PageTextFetcher;
  logger: pino.Logger;
}

export type ResultHandler = (result: SearchResult) => void | Promise<void>;

/** Build the immutable result for one task. */
export function buildResult(
  task: SearchTask,
  classification: PageClassification,
  error?: string,
): SearchResult {
  return Object.freeze({
    title: task.title,
    ...(task.author !== undefined ? { author: task.author } : {}),
    catalogId: task.catalogId,
    availability: classification.availability,
    audiobook: classification.audiobook,
    ebook: classification.ebook,
    searchUrl: task.searchUrl,
    ...(error !== undefined ? { error } : {}),
  });
}

/**
 * Runs Fetch → Classify for every task across `concurrency` workers.
 *
 * - Workers pull from one FIFO queue; a worker handles one task at a time.
 * - Each worker uses only its own session from the {@link SessionManager}.
 * - Session and navigation failures become `Unknown` results, so one bad
 *   task never stops the others.
 * - Results reach the handler in completion order, exactly once per task.
 * - All sessions are released when the run ends, however it ends.
 */
export class WorkerPool {
  private readonly concurrency: number;
  private readonly sessionManager: SessionManager;
  private readonly fetcher: PageTextFetcher;
  private readonly logger: pino.Logger;

  constructor(options: WorkerPoolOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new ConfigurationError(
        `Worker pool concurrency must be a positive integer, got ${options.concurrency}`,
      );
    }
    this.concurrency = options.concurrency;
    this.sessionManager = options.sessionManager;
    this.fetcher = options.fetcher;
    this.logger = options.logger;
  }

  /**
   * Process `tasks` and hand each result to `onResult`.
   *
   * If `onResult` (or anything outside the lookup error taxonomy) throws,
   * workers stop claiming tasks, in-flight tasks finish, sessions are
   * released and the first such error is re-thrown.
   */
  async run(tasks: readonly SearchTask[], onResult: ResultHandler): Promise<void> {
    const queue = [...tasks];
    const workerCount = Math.min(this.concurrency, queue.length);
    const failures: unknown[] = [];

    this.logger.info(
      { tasks: queue.length, workers: workerCount },
      "worker pool started",
    );

    const work = async (workerId: number): Promise<void> => {
      const log = this.logger.child({ workerId });
      try {
        for (let task = queue.shift(); task !== undefined; task = queue.shift()) {
          const result = await this.execute(workerId, task, log);
          await onResult(result);
        }
      } catch (error) {
        failures.push(error);
        queue.length = 0;
      }
    };

    try {
      await Promise.all(
        Array.from({ length: workerCount }, (_, workerId) => work(workerId)),
      );
    } finally {
      await this.sessionManager.releaseAll();
    }

    if (failures.length > 0) {
      throw failures[0];
    }
    this.logger.info({ tasks: tasks.length }, "worker pool drained");
  }

  private async execute(
    workerId: number,
    task: SearchTask,
    log: pino.Logger,
  ): Promise<SearchResult> {
    try {
      const session = await this.sessionManager.acquireSession(workerId);
      const text = await this.fetcher.fetchPageText(session, task.searchUrl);
      const result = buildResult(task, classifyPage(text));
      log.debug(
        { catalogId: task.catalogId, url: task.searchUrl, availability: result.availability },
        "task classified",
      );
      return result;
    } catch (error) {
      if (error instanceof SessionCreationError || error instanceof NavigationError) {
        log.warn(
          { catalogId: task.catalogId, url: task.searchUrl, error: error.message },
          "lookup failed, recording Unknown",
        );
        return buildResult(task, UNKNOWN_CLASSIFICATION, error.message);
      }
      throw error;
    }
  }
}
