// ---------------------------------------------------------------------------
// PageFetcher – navigates a worker's session to a search URL, waits for the
// client-side render to finish, and returns the page text.
// ---------------------------------------------------------------------------

import type pino from "pino";

import type {
  BrowserSession,
  FetchConfig,
  PageTextFetcher,
} from "../../core/types.js";
import { ReadinessMode } from "../../core/types.js";
import { NavigationError } from "../../core/errors.js";
import { READINESS_MARKERS } from "../../domain/availability/classifier.js";

/** Max time to wait for page navigation (ms). */
export const DEFAULT_NAVIGATION_TIMEOUT_MS = 30_000;

/** Max time to wait for a result marker after navigation (ms). */
export const DEFAULT_READINESS_TIMEOUT_MS = 15_000;

/** Fixed wait used by the `settle` readiness mode (ms). */
export const DEFAULT_SETTLE_DELAY_MS = 4_000;

export const DEFAULT_FETCH_CONFIG: FetchConfig = {
  readinessMode: ReadinessMode.MARKER,
  readinessTimeoutMs: DEFAULT_READINESS_TIMEOUT_MS,
  settleDelayMs: DEFAULT_SETTLE_DELAY_MS,
  navigationTimeoutMs: DEFAULT_NAVIGATION_TIMEOUT_MS,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class PageFetcher implements PageTextFetcher {
  private readonly config: FetchConfig;

  constructor(
    private readonly logger: pino.Logger,
    config: Partial<FetchConfig> = {},
  ) {
    this.config = { ...DEFAULT_FETCH_CONFIG, ...config };
  }

  /**
   * Load `url` in `session` and return its rendered text.
   *
   * In `marker` mode the page counts as ready once any availability marker
   * is on screen; if none shows up within the readiness timeout the fetch
   * fails with a {@link NavigationError}. In `settle` mode a fixed delay is
   * waited instead.
   */
  async fetchPageText(session: BrowserSession, url: string): Promise<string> {
    const { readinessMode, readinessTimeoutMs, settleDelayMs, navigationTimeoutMs } =
      this.config;

    try {
      await session.navigate(url, navigationTimeoutMs);
    } catch (error) {
      throw new NavigationError(
        `Navigation failed for ${url}: ${errorMessage(error)}`,
        url,
        { cause: error },
      );
    }

    if (readinessMode === ReadinessMode.SETTLE) {
      await sleep(settleDelayMs);
    } else {
      let ready: boolean;
      try {
        ready = await session.waitForAnyText(READINESS_MARKERS, readinessTimeoutMs);
      } catch (error) {
        throw new NavigationError(
          `Lost page while waiting for ${url}: ${errorMessage(error)}`,
          url,
          { cause: error },
        );
      }
      if (!ready) {
        throw new NavigationError(
          `Page did not become ready within ${readinessTimeoutMs}ms: ${url}`,
          url,
        );
      }
    }

    try {
      const text = await session.readText();
      this.logger.debug(
        { workerId: session.workerId, url, length: text.length },
        "page text read",
      );
      return text;
    } catch (error) {
      throw new NavigationError(
        `Could not read page text for ${url}: ${errorMessage(error)}`,
        url,
        { cause: error },
      );
    }
  }
}
