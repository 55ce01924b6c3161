// ---------------------------------------------------------------------------
// Playwright-backed browser sessions.
//
// Every session owns its own Chromium process with a single page; closing the
// session terminates that process. Lazy-imports playwright-core so that tests
// and dry runs never load it.
// ---------------------------------------------------------------------------

import type { Browser, Page } from "playwright-core";

import type { BrowserSession, SessionFactory } from "../../core/types.js";

export interface PlaywrightSessionOptions {
  /** Chromium executable path (optional, uses playwright default). */
  executablePath?: string;
  /** Run in headless mode (default: true). */
  headless?: boolean;
}

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/** Poll interval while waiting for readiness markers (ms). */
const MARKER_POLL_MS = 250;

export class PlaywrightBrowserSession implements BrowserSession {
  private closed = false;

  constructor(
    readonly workerId: number,
    private readonly browser: Browser,
    private readonly page: Page,
  ) {}

  async navigate(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, {
      waitUntil: "domcontentloaded",
      timeout: timeoutMs,
    });
  }

  async waitForAnyText(
    markers: readonly string[],
    timeoutMs: number,
  ): Promise<boolean> {
    // Evaluated in the page, hence a string expression rather than a closure.
    const expression =
      `${JSON.stringify(markers)}.some((m) => ` +
      `document.body !== null && document.body.innerText.includes(m))`;

    try {
      await this.page.waitForFunction(expression, undefined, {
        timeout: timeoutMs,
        polling: MARKER_POLL_MS,
      });
      return true;
    } catch (error) {
      if (error instanceof Error && error.name === "TimeoutError") {
        return false;
      }
      throw error;
    }
  }

  readText(): Promise<string> {
    return this.page.innerText("body");
  }

  /** Terminate the Chromium process. Safe to call more than once. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.browser.close();
  }
}

export class PlaywrightSessionFactory implements SessionFactory {
  private readonly executablePath?: string;
  private readonly headless: boolean;

  constructor(options: PlaywrightSessionOptions = {}) {
    // Allow CHROMIUM_PATH env var to override.
    this.executablePath =
      options.executablePath ?? process.env["CHROMIUM_PATH"];
    this.headless = options.headless ?? true;
  }

  async create(workerId: number): Promise<BrowserSession> {
    const { chromium } = await import("playwright-core");
    const browser = await chromium.launch({
      headless: this.headless,
      executablePath: this.executablePath,
      args: [
        "--no-sandbox",
        "--disable-setuid-sandbox",
        "--disable-dev-shm-usage",
        "--disable-gpu",
      ],
    });

    try {
      const context = await browser.newContext({ userAgent: USER_AGENT });
      const page = await context.newPage();
      return new PlaywrightBrowserSession(workerId, browser, page);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }
}
