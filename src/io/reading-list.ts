// ---------------------------------------------------------------------------
// Reading-list importer for Goodreads library exports.
// ---------------------------------------------------------------------------

import { readFileSync } from "node:fs";
import { parse } from "csv-parse/sync";
import { z } from "zod";

import type { ReadingListEntry } from "../core/types.js";
import { ReadingListError } from "../core/errors.js";

export const TITLE_COLUMN = "Title";
export const AUTHOR_COLUMN = "Author";
export const SHELF_COLUMN = "Exclusive Shelf";

export const DEFAULT_SHELF = "to-read";

const RecordsSchema = z.array(z.array(z.string()));

export interface ReadingListOptions {
  /** Only rows on this shelf are kept (default: "to-read"). */
  shelf?: string;
}

/**
 * Parse export CSV text and keep the rows on the requested shelf.
 * `source` names the input in error messages.
 */
export function parseReadingList(
  content: string,
  source: string,
  options: ReadingListOptions = {},
): ReadingListEntry[] {
  const shelf = options.shelf ?? DEFAULT_SHELF;

  let records: string[][];
  try {
    records = RecordsSchema.parse(
      parse(content, {
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
      }),
    );
  } catch (err) {
    throw new ReadingListError(
      source,
      `malformed CSV (${err instanceof Error ? err.message : String(err)})`,
      { cause: err },
    );
  }

  const [header, ...rows] = records;
  if (header === undefined) {
    throw new ReadingListError(source, "file is empty");
  }

  const titleIdx = header.indexOf(TITLE_COLUMN);
  const authorIdx = header.indexOf(AUTHOR_COLUMN);
  const shelfIdx = header.indexOf(SHELF_COLUMN);
  const columns: Record<string, number> = {
    [TITLE_COLUMN]: titleIdx,
    [AUTHOR_COLUMN]: authorIdx,
    [SHELF_COLUMN]: shelfIdx,
  };
  const missing = Object.entries(columns)
    .filter(([, idx]) => idx === -1)
    .map(([name]) => name);
  if (missing.length > 0) {
    throw new ReadingListError(
      source,
      `missing column(s): ${missing.join(", ")}`,
    );
  }

  return rows
    .filter((row) => (row[shelfIdx] ?? "") === shelf)
    .map((row) => ({
      title: row[titleIdx] ?? "",
      author: row[authorIdx] ?? "",
      shelf,
    }))
    .filter((entry) => entry.title.trim() !== "");
}

/**
 * Load a Goodreads export and return the entries on the requested shelf.
 *
 * This is the only run-aborting input: an unreadable file or one without
 * the `Title`, `Author` and `Exclusive Shelf` columns throws
 * {@link ReadingListError} before any task is generated.
 */
export function loadReadingList(
  filePath: string,
  options: ReadingListOptions = {},
): ReadingListEntry[] {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ReadingListError(
      filePath,
      err instanceof Error ? err.message : String(err),
      { cause: err },
    );
  }
  return parseReadingList(content, filePath, options);
}
