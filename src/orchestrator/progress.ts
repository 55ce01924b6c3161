// ---------------------------------------------------------------------------
// Progress tracking for a run: completed/total with observer callbacks.
// ---------------------------------------------------------------------------

import type { ProgressObserver } from "../core/types.js";

export class ProgressTracker {
  private done = 0;
  private readonly observers = new Set<ProgressObserver>();

  constructor(readonly total: number) {}

  /** Register an observer; returns a function that unregisters it. */
  subscribe(observer: ProgressObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  /**
   * Count one completed task (classified or downgraded to `Unknown`) and
   * notify observers. Returns the new completed count.
   */
  record(): number {
    if (this.done >= this.total) {
      throw new RangeError(
        `ProgressTracker: more completions than tasks (${this.total})`,
      );
    }
    this.done++;
    for (const observer of this.observers) {
      observer(this.done, this.total);
    }
    return this.done;
  }

  get completed(): number {
    return this.done;
  }

  get isDone(): boolean {
    return this.done === this.total;
  }
}
