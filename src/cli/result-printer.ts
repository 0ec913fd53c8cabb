import { describeSummary } from '../review/result-aggregator.js';
import type { RunSummary } from '../review/review.types.js';
import { sanitize } from '../report/report-sink.js';

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${remainingSeconds}s`;
}

function sanitizeLine(text: string): string {
  return sanitize(text).replace(/[\r\n]+/g, ' ');
}

/** Failures go to stderr after every unit has been attempted. */
export function printSummary(summary: RunSummary): void {
  if (summary.total === 0) {
    console.log('No files found to review');
    return;
  }
  if (summary.failed > 0) {
    console.error(`\nEncountered ${summary.failed} errors during review:`);
    for (const line of summary.failures) {
      console.error(`- ${sanitizeLine(line)}`);
    }
    console.error(`\n${describeSummary(summary)}`);
  } else {
    console.log(`\n${describeSummary(summary)}`);
  }
  console.log(
    `--- Total review time: ${formatDuration(summary.durationMs)} (${summary.durationMs}ms) ---`,
  );
}

/** Parse a positive integer CLI value, naming the flag in the error. */
export function parsePositiveInt(raw: string, flag: string): number {
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${flag} must be a positive integer, got "${raw}"`);
  }
  return value;
}
