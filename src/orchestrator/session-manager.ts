// ---------------------------------------------------------------------------
// SessionManager – explicit per-worker registry of rendering sessions.
//
// Each worker owns exactly one session, created lazily on its first task and
// reused for every later task routed to that worker. Sessions are never
// shared or migrated between workers.
// ---------------------------------------------------------------------------

import pLimit from "p-limit";
import type pino from "pino";

import type { BrowserSession, SessionFactory } from "../core/types.js";
import { SessionCreationError } from "../core/errors.js";

export interface SessionManagerOptions {
  /** Maximum number of sessions being created at the same moment (default: 4). */
  maxConcurrentLaunches?: number;
}

const DEFAULT_MAX_CONCURRENT_LAUNCHES = 4;

export class SessionManager {
  private readonly sessions = new Map<number, BrowserSession>();
  private readonly pending = new Map<number, Promise<BrowserSession>>();
  private readonly launchLimiter: ReturnType<typeof pLimit>;

  constructor(
    private readonly factory: SessionFactory,
    private readonly logger: pino.Logger,
    options: SessionManagerOptions = {},
  ) {
    this.launchLimiter = pLimit(
      options.maxConcurrentLaunches ?? DEFAULT_MAX_CONCURRENT_LAUNCHES,
    );
  }

  /**
   * Return the session owned by `workerId`, creating it on first use.
   *
   * Concurrent first calls for one worker share a single creation. A failed
   * creation is not cached: it surfaces as a {@link SessionCreationError}
   * for the caller's current task, and the next call tries again.
   */
  acquireSession(workerId: number): Promise<BrowserSession> {
    const existing = this.sessions.get(workerId);
    if (existing) return Promise.resolve(existing);

    let creation = this.pending.get(workerId);
    if (!creation) {
      creation = this.createSession(workerId);
      this.pending.set(workerId, creation);
    }
    return creation;
  }

  /**
   * Close every session exactly once and empty the registry.
   *
   * Creations still in flight are awaited first so no browser outlives the
   * pool. Close failures are logged rather than thrown.
   */
  async releaseAll(): Promise<void> {
    if (this.pending.size > 0) {
      await Promise.allSettled([...this.pending.values()]);
    }

    const sessions = [...this.sessions.values()];
    this.sessions.clear();

    await Promise.all(
      sessions.map(async (session) => {
        try {
          await session.close();
          this.logger.debug({ workerId: session.workerId }, "session closed");
        } catch (err) {
          this.logger.warn(
            {
              workerId: session.workerId,
              error: err instanceof Error ? err.message : String(err),
            },
            "failed to close session",
          );
        }
      }),
    );
  }

  /** Number of live sessions. */
  get size(): number {
    return this.sessions.size;
  }

  private async createSession(workerId: number): Promise<BrowserSession> {
    try {
      const session = await this.launchLimiter(() =>
        this.factory.create(workerId),
      );
      this.sessions.set(workerId, session);
      this.logger.debug({ workerId }, "session created");
      return session;
    } catch (err) {
      throw new SessionCreationError(
        workerId,
        `Worker ${workerId} could not create a browser session: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    } finally {
      this.pending.delete(workerId);
    }
  }
}
