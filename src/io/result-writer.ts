// ---------------------------------------------------------------------------
// CSV writer for run results.
// ---------------------------------------------------------------------------

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { stringify } from "csv-stringify/sync";

import type { SearchResult } from "../core/types.js";

export const RESULT_COLUMNS = [
  "Title",
  "Author",
  "Library Name",
  "Availability",
  "Audiobook",
  "Ebook",
  "Search URL",
] as const;

function formatFlag(flag: boolean): string {
  return flag ? "True" : "False";
}

export function resultToRow(result: SearchResult): string[] {
  return [
    result.title,
    result.author ?? "",
    result.catalogId,
    result.availability,
    formatFlag(result.audiobook),
    formatFlag(result.ebook),
    result.searchUrl,
  ];
}

/** Serialize results (header first, one row per result) to CSV text. */
export function formatResultsCsv(results: readonly SearchResult[]): string {
  return stringify([[...RESULT_COLUMNS], ...results.map(resultToRow)]);
}

/** Write the results table once, creating parent directories as needed. */
export async function writeResultsCsv(
  filePath: string,
  results: readonly SearchResult[],
): Promise<void> {
  const dir = path.dirname(filePath);
  if (dir && dir !== ".") {
    await mkdir(dir, { recursive: true });
  }
  await writeFile(filePath, formatResultsCsv(results), "utf-8");
}
