// ---------------------------------------------------------------------------
// Title normalisation for catalog search queries.
// ---------------------------------------------------------------------------

/** First series/subtitle qualifier: a colon or an opening parenthesis. */
const QUALIFIER = /[:(]/;

/**
 * Reduce a reading-list title to a simplified search key.
 *
 * Export titles often carry series and edition annotations that hurt catalog
 * matching, so everything from the first `:` or `(` onwards is dropped.
 *
 * - `Going Postal (Discworld, #33; Moist von Lipwig, #1)` → `Going Postal`
 * - `The First 90 Days: Critical Success Strategies` → `The First 90 Days`
 *
 * Idempotent: the output never contains a qualifier.
 */
export function normalizeTitle(raw: string): string {
  const match = QUALIFIER.exec(raw);
  const head = match ? raw.slice(0, match.index) : raw;
  return head.trim();
}
