// ---------------------------------------------------------------------------
// Error hierarchy for the Shelf Scout service.
// ---------------------------------------------------------------------------

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all Shelf Scout domain errors.
 */
export class ShelfScoutError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ShelfScoutError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Lookup errors ───────────────────────────────────────────────────────────
// Caught at the task boundary and recorded as an `Unknown` result.

/** A worker could not obtain its rendering session. */
export class SessionCreationError extends ShelfScoutError {
  public readonly workerId: number;

  constructor(workerId: number, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SessionCreationError";
    this.workerId = workerId;
  }
}

/** A session could not load, or finish rendering, the target URL. */
export class NavigationError extends ShelfScoutError {
  public readonly url: string;

  constructor(message: string, url: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NavigationError";
    this.url = url;
  }
}

// ── Run-aborting errors ─────────────────────────────────────────────────────

/** The reading-list export could not be read or lacks required columns. */
export class ReadingListError extends ShelfScoutError {
  public readonly filePath: string;

  constructor(filePath: string, reason: string, options?: ErrorOptions) {
    super(`Cannot read reading list "${filePath}": ${reason}`, options);
    this.name = "ReadingListError";
    this.filePath = filePath;
  }
}

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends ShelfScoutError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
