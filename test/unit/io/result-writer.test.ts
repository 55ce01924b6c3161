// ---------------------------------------------------------------------------
// Tests for the results CSV writer.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  formatResultsCsv,
  resultToRow,
  writeResultsCsv,
} from "../../../src/io/result-writer.js";
import type { SearchResult } from "../../../src/core/types.js";

const AVAILABLE: SearchResult = {
  title: "Going Postal",
  author: "Terry Pratchett",
  catalogId: "hawaii",
  availability: "Available",
  audiobook: true,
  ebook: false,
  searchUrl: "https://libby.example.com/library/hawaii/search/query-Going%20Postal/page-1",
};

const NOT_FOUND: SearchResult = {
  title: "Good Omens, Revised",
  catalogId: "utah",
  availability: "NotFound",
  audiobook: false,
  ebook: true,
  searchUrl: "https://libby.example.com/library/beehive/search/query-Good%20Omens/page-1",
};

const HEADER_LINE = "Title,Author,Library Name,Availability,Audiobook,Ebook,Search URL";

describe("resultToRow", () => {
  it("maps fields to the fixed column order", () => {
    expect(resultToRow(AVAILABLE)).toEqual([
      "Going Postal",
      "Terry Pratchett",
      "hawaii",
      "Available",
      "True",
      "False",
      AVAILABLE.searchUrl,
    ]);
  });

  it("writes an empty author when none is known", () => {
    expect(resultToRow(NOT_FOUND)[1]).toBe("");
  });
});

describe("formatResultsCsv", () => {
  it("writes the header and one line per result", () => {
    expect(formatResultsCsv([AVAILABLE, NOT_FOUND]).split("\n")).toEqual([
      HEADER_LINE,
      `Going Postal,Terry Pratchett,hawaii,Available,True,False,${AVAILABLE.searchUrl}`,
      `"Good Omens, Revised",,utah,NotFound,False,True,${NOT_FOUND.searchUrl}`,
      "",
    ]);
  });

  it("writes only the header for no results", () => {
    expect(formatResultsCsv([])).toBe(`${HEADER_LINE}\n`);
  });
});

describe("writeResultsCsv", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "results-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("creates parent directories and writes the file", async () => {
    const file = path.join(dir, "out", "nested", "results.csv");
    await writeResultsCsv(file, [AVAILABLE]);

    expect(fs.readFileSync(file, "utf-8")).toBe(formatResultsCsv([AVAILABLE]));
  });
});
