// ---------------------------------------------------------------------------
// Task generation: fans the reading list out across every enabled catalog.
// ---------------------------------------------------------------------------

import type {
  CatalogDefinition,
  ReadingListEntry,
  SearchTask,
} from "../core/types.js";
import { normalizeTitle } from "../domain/title/normalize-title.js";

export interface TaskGeneratorOptions {
  /** Append the author to the search query (default: true). */
  includeAuthor?: boolean;
}

/**
 * Build the catalog search URL for a query:
 * `<base>/search/query-<encoded-query>/page-1`.
 */
export function buildSearchUrl(baseUrl: string, query: string): string {
  const base = baseUrl.replace(/\/+$/, "");
  return `${base}/search/query-${encodeURIComponent(query)}/page-1`;
}

/** Normalised title, followed by the author when requested. Empty parts are skipped. */
export function buildQuery(
  entry: ReadingListEntry,
  includeAuthor: boolean,
): string {
  const title = normalizeTitle(entry.title);
  const author = includeAuthor ? entry.author.trim() : "";
  return [title, author].filter((part) => part !== "").join(" ");
}

/**
 * Produce one task per (entry, enabled catalog) pair, iterating entries in
 * input order and catalogs in registry order.
 */
export function generateTasks(
  entries: readonly ReadingListEntry[],
  catalogs: readonly CatalogDefinition[],
  options: TaskGeneratorOptions = {},
): SearchTask[] {
  const includeAuthor = options.includeAuthor ?? true;
  const enabled = catalogs.filter((c) => c.enabled);
  const tasks: SearchTask[] = [];

  for (const entry of entries) {
    const title = normalizeTitle(entry.title);
    const author = entry.author.trim();
    const query = buildQuery(entry, includeAuthor);

    for (const catalog of enabled) {
      tasks.push(
        Object.freeze({
          catalogId: catalog.id,
          searchUrl: buildSearchUrl(catalog.baseUrl, query),
          title,
          ...(author !== "" ? { author } : {}),
        }),
      );
    }
  }

  return tasks;
}
