import type { ReportSink } from '../report/report-sink.js';
import { AdmissionGate } from './admission-gate.js';
import type {
  ReviewFailure,
  ReviewOutcome,
  ReviewUnit,
  RunSummary,
} from './review.types.js';

export function formatReviewBlock(unit: ReviewUnit, text: string): string {
  return (
    `\n=== Review for ${unit.path} ===\n` +
    `File size: ${unit.size} bytes\n` +
    `Review:\n${text}\n\n`
  );
}

export function formatFailureLine(unit: ReviewUnit, outcome: ReviewFailure): string {
  const line = `failed to review ${unit.path}: ${outcome.reason}`;
  if (outcome.kind !== 'exhausted' || outcome.attempts.length < 2) {
    return line;
  }
  const details = outcome.attempts
    .map((a) => `${a.endpoint}: ${a.failure.reason}`)
    .join('; ');
  return `${line} (${details})`;
}

/**
 * Collects outcomes from concurrent tasks. All state changes and sink writes
 * happen under one mutex, so each unit's block reaches the sink whole.
 */
export class ResultAggregator {
  private readonly mutex = new AdmissionGate(1);
  private readonly startMs = Date.now();
  private succeeded = 0;
  private readonly failures: string[] = [];

  constructor(private readonly sink: ReportSink) {}

  async record(unit: ReviewUnit, outcome: ReviewOutcome): Promise<void> {
    await this.mutex.run(async () => {
      if (outcome.status === 'success') {
        await this.sink.write(formatReviewBlock(unit, outcome.text));
        this.succeeded++;
      } else {
        this.failures.push(formatFailureLine(unit, outcome));
      }
    });
  }

  summarize(): RunSummary {
    const failed = this.failures.length;
    return {
      total: this.succeeded + failed,
      succeeded: this.succeeded,
      failed,
      failures: [...this.failures],
      allSucceeded: failed === 0,
      durationMs: Date.now() - this.startMs,
    };
  }
}

export function describeSummary(summary: RunSummary): string {
  if (summary.allSucceeded) {
    return `Review completed successfully for ${summary.total} files`;
  }
  return `review completed with ${summary.failed} of ${summary.total} files failed`;
}
