// ---------------------------------------------------------------------------
// Tests for the CLI progress and result formatting.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import {
  formatDuration,
  formatProgressLine,
  formatResultLine,
} from "../../../src/scripts/shelf-scout/progress.js";

describe("formatDuration", () => {
  it("formats seconds, minutes and hours", () => {
    expect(formatDuration(42.4)).toBe("42s");
    expect(formatDuration(125)).toBe("2m 5s");
    expect(formatDuration(3_725)).toBe("1h 2m");
  });

  it("carries rounded seconds into the next unit", () => {
    expect(formatDuration(59.6)).toBe("1m 0s");
    expect(formatDuration(119.7)).toBe("2m 0s");
    expect(formatDuration(3_599.8)).toBe("1h 0m");
  });
});

describe("formatProgressLine", () => {
  it("renders a half-full bar with an ETA", () => {
    expect(formatProgressLine(5, 10, 10)).toBe(
      "[###############---------------] 5/10 50.0% | ETA: 10s",
    );
  });

  it("renders a full bar for an empty run", () => {
    expect(formatProgressLine(0, 0, 0)).toBe(
      "[##############################] 0/0 100.0% | ETA: 0s",
    );
  });
});

describe("formatResultLine", () => {
  it("lists formats after the state", () => {
    expect(
      formatResultLine({
        title: "Mort",
        catalogId: "north",
        availability: "Available",
        audiobook: true,
        ebook: true,
        searchUrl: "https://x.example.com",
      }),
    ).toBe("north: Mort -> Available [audiobook, ebook]");
  });

  it("appends the error of a downgraded lookup", () => {
    expect(
      formatResultLine({
        title: "Mort",
        catalogId: "south",
        availability: "Unknown",
        audiobook: false,
        ebook: false,
        searchUrl: "https://x.example.com",
        error: "Navigation failed",
      }),
    ).toBe("south: Mort -> Unknown (Navigation failed)");
  });
});
