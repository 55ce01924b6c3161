// ---------------------------------------------------------------------------
// Availability classifier: rendered catalog page text → state + format flags.
// ---------------------------------------------------------------------------

import { AvailabilityState } from "../../core/types.js";
import type { PageClassification } from "../../core/types.js";

// ── Markers ─────────────────────────────────────────────────────────────────

/**
 * Availability markers, in priority order. The first one present in the
 * page text decides the state.
 */
export const AVAILABILITY_MARKERS: ReadonlyArray<{
  marker: string;
  state: AvailabilityState;
}> = [
  { marker: "No results.", state: AvailabilityState.NOT_FOUND },
  { marker: "Borrow", state: AvailabilityState.AVAILABLE },
  { marker: "Place Hold", state: AvailabilityState.OWNED },
];

export const AUDIOBOOK_MARKER = "Play Sample";
export const EBOOK_MARKER = "Read Sample";

/** Texts whose presence means a search-result page has finished rendering. */
export const READINESS_MARKERS: readonly string[] = AVAILABILITY_MARKERS.map(
  (m) => m.marker,
);

export const UNKNOWN_CLASSIFICATION: PageClassification = {
  availability: AvailabilityState.UNKNOWN,
  audiobook: false,
  ebook: false,
};

// ── Classification ──────────────────────────────────────────────────────────

/**
 * Classify rendered page text.
 *
 * Availability comes from a fixed-priority, case-sensitive substring search;
 * a page matching none of the markers is `Unknown`. The two format flags are
 * computed independently of the availability branch.
 */
export function classifyPage(text: string): PageClassification {
  const hit = AVAILABILITY_MARKERS.find((m) => text.includes(m.marker));

  return {
    availability: hit ? hit.state : AvailabilityState.UNKNOWN,
    audiobook: text.includes(AUDIOBOOK_MARKER),
    ebook: text.includes(EBOOK_MARKER),
  };
}
