import type { RunSummary, SearchResult } from "../../core/types.js";
import { AvailabilityState } from "../../core/types.js";

const BAR_WIDTH = 30;

export function formatDuration(seconds: number): string {
  // Round once so 59.6s reads "1m 0s", never "60s".
  const total = Math.round(seconds);
  if (total < 60) return `${total}s`;
  const m = Math.floor(total / 60);
  const s = total % 60;
  if (m < 60) return `${m}m ${s}s`;
  const h = Math.floor(m / 60);
  const rm = m % 60;
  return `${h}h ${rm}m`;
}

export function formatProgressLine(
  completed: number,
  total: number,
  elapsedSeconds: number,
): string {
  const ratio = total === 0 ? 1 : completed / total;
  const filled = Math.round(ratio * BAR_WIDTH);
  const bar = "#".repeat(filled).padEnd(BAR_WIDTH, "-");
  const rate = elapsedSeconds > 0 ? completed / elapsedSeconds : 0;
  const eta = rate > 0 ? (total - completed) / rate : 0;

  return (
    `[${bar}] ${completed}/${total} ${(ratio * 100).toFixed(1)}% | ` +
    `ETA: ${formatDuration(eta)}`
  );
}

export function createProgressPrinter(
  startTime: number = Date.now(),
): (completed: number, total: number) => void {
  return (completed, total) => {
    const elapsed = (Date.now() - startTime) / 1000;
    process.stdout.write(`\r${formatProgressLine(completed, total, elapsed)}`);
  };
}

export function formatResultLine(result: SearchResult): string {
  const formats = [
    result.audiobook ? "audiobook" : null,
    result.ebook ? "ebook" : null,
  ].filter((f): f is string => f !== null);
  const suffix = result.error !== undefined ? ` (${result.error})` : "";

  return (
    `${result.catalogId}: ${result.title} -> ${result.availability}` +
    (formats.length > 0 ? ` [${formats.join(", ")}]` : "") +
    suffix
  );
}

export function printSummary(summary: RunSummary, durationMs: number): void {
  const elapsed = durationMs / 1000;
  const counts = summary.byAvailability;

  console.log("\n\n=== Search Complete ===");
  console.log(`  Lookups:        ${summary.total}`);
  console.log(`  Available:      ${counts[AvailabilityState.AVAILABLE]}`);
  console.log(`  Owned (hold):   ${counts[AvailabilityState.OWNED]}`);
  console.log(`  Not found:      ${counts[AvailabilityState.NOT_FOUND]}`);
  console.log(`  Unknown:        ${counts[AvailabilityState.UNKNOWN]}`);
  console.log(`  Lookup errors:  ${summary.errors}`);
  console.log(`  Audiobooks:     ${summary.audiobooks}`);
  console.log(`  Ebooks:         ${summary.ebooks}`);
  console.log(`  Duration:       ${formatDuration(elapsed)}`);

  for (const [catalogId, c] of Object.entries(summary.byCatalog)) {
    console.log(
      `  ${catalogId.padEnd(16)} available ${c[AvailabilityState.AVAILABLE]}, ` +
        `owned ${c[AvailabilityState.OWNED]}, ` +
        `not found ${c[AvailabilityState.NOT_FOUND]}, ` +
        `unknown ${c[AvailabilityState.UNKNOWN]}`,
    );
  }
}
