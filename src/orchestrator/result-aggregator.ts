// ---------------------------------------------------------------------------
// Result collection in arrival order, plus end-of-run summarisation.
// ---------------------------------------------------------------------------

import { AvailabilityState } from "../core/types.js";
import type { RunSummary, SearchResult } from "../core/types.js";

function emptyCounts(): Record<AvailabilityState, number> {
  return {
    [AvailabilityState.AVAILABLE]: 0,
    [AvailabilityState.OWNED]: 0,
    [AvailabilityState.NOT_FOUND]: 0,
    [AvailabilityState.UNKNOWN]: 0,
  };
}

/**
 * Collects results as workers finish them. No ordering beyond arrival order
 * is kept or implied.
 */
export class ResultCollector {
  private readonly items: SearchResult[] = [];

  add(result: SearchResult): void {
    this.items.push(result);
  }

  get results(): readonly SearchResult[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  /** Per-state and per-catalog counts for the run summary. */
  summarize(): RunSummary {
    const byAvailability = emptyCounts();
    const byCatalog: Record<string, Record<AvailabilityState, number>> = {};
    let audiobooks = 0;
    let ebooks = 0;
    let errors = 0;

    for (const r of this.items) {
      byAvailability[r.availability]++;

      let catalogCounts = byCatalog[r.catalogId];
      if (!catalogCounts) {
        catalogCounts = emptyCounts();
        byCatalog[r.catalogId] = catalogCounts;
      }
      catalogCounts[r.availability]++;

      if (r.audiobook) audiobooks++;
      if (r.ebook) ebooks++;
      if (r.error !== undefined) errors++;
    }

    return {
      total: this.items.length,
      byAvailability,
      byCatalog,
      audiobooks,
      ebooks,
      errors,
    };
  }
}
