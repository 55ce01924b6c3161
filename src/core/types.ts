// ---------------------------------------------------------------------------
// Core types for the Shelf Scout service.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Enums ───────────────────────────────────────────────────────────────────

export const AvailabilityState = {
  AVAILABLE: "Available",
  OWNED: "Owned",
  NOT_FOUND: "NotFound",
  UNKNOWN: "Unknown",
} as const;
export type AvailabilityState =
  (typeof AvailabilityState)[keyof typeof AvailabilityState];

export const ReadinessMode = {
  MARKER: "marker",
  SETTLE: "settle",
} as const;
export type ReadinessMode = (typeof ReadinessMode)[keyof typeof ReadinessMode];

// ── Reading list & catalogs ─────────────────────────────────────────────────

/** One row selected from a reading-list export. */
export interface ReadingListEntry {
  title: string;
  /** Empty string when the export has no author for the row. */
  author: string;
  shelf: string;
}

export interface CatalogDefinition {
  /** Human-readable catalog name; doubles as the "Library Name" column. */
  id: string;
  baseUrl: string;
  enabled: boolean;
}

// ── Tasks & results ─────────────────────────────────────────────────────────

export interface SearchTask {
  readonly catalogId: string;
  readonly searchUrl: string;
  readonly title: string;
  readonly author?: string;
}

export interface PageClassification {
  readonly availability: AvailabilityState;
  readonly audiobook: boolean;
  readonly ebook: boolean;
}

export interface SearchResult extends PageClassification {
  readonly title: string;
  readonly author?: string;
  readonly catalogId: string;
  readonly searchUrl: string;
  /** Set only when the lookup was downgraded from a session or navigation failure. */
  readonly error?: string;
}

// ── Session contract ────────────────────────────────────────────────────────

/**
 * A worker-owned rendering context (one browser tab held open for the
 * worker's lifetime). Never shared between workers.
 */
export interface BrowserSession {
  readonly workerId: number;

  /** Load `url`; rejects on network failure or navigation timeout. */
  navigate(url: string, timeoutMs: number): Promise<void>;

  /**
   * Poll the rendered text until any of `markers` appears.
   * Resolves `false` when `timeoutMs` elapses first.
   */
  waitForAnyText(markers: readonly string[], timeoutMs: number): Promise<boolean>;

  /** Rendered text of the current page. */
  readText(): Promise<string>;

  close(): Promise<void>;
}

export interface SessionFactory {
  create(workerId: number): Promise<BrowserSession>;
}

/** Drives a session to a URL and returns the rendered page text. */
export interface PageTextFetcher {
  fetchPageText(session: BrowserSession, url: string): Promise<string>;
}

// ── Progress ────────────────────────────────────────────────────────────────

export type ProgressObserver = (completed: number, total: number) => void;

export interface RunSummary {
  total: number;
  byAvailability: Record<AvailabilityState, number>;
  byCatalog: Record<string, Record<AvailabilityState, number>>;
  audiobooks: number;
  ebooks: number;
  errors: number;
}

// ── Config types ────────────────────────────────────────────────────────────

export interface AppConfig {
  /** Number of concurrent workers (and browser sessions). */
  concurrency: number;
  browser: BrowserConfig;
  fetch: FetchConfig;
  logging: LoggingConfig;
}

export interface BrowserConfig {
  headless: boolean;
  /** Chromium executable; playwright's default lookup when unset. */
  executablePath?: string;
  /** How many browsers may be launching at the same moment. */
  maxConcurrentLaunches: number;
}

export interface FetchConfig {
  readinessMode: ReadinessMode;
  readinessTimeoutMs: number;
  settleDelayMs: number;
  navigationTimeoutMs: number;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
}
