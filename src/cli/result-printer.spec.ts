import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { formatDuration, parsePositiveInt, printSummary } from './result-printer.js';
import type { RunSummary } from '../review/review.types.js';

describe('formatDuration', () => {
  it('should format seconds only', () => {
    expect(formatDuration(5000)).toBe('5s');
  });

  it('should format minutes and seconds', () => {
    expect(formatDuration(125000)).toBe('2m 5s');
  });

  it('should format zero', () => {
    expect(formatDuration(0)).toBe('0s');
  });
});

describe('parsePositiveInt', () => {
  it('should accept positive integers', () => {
    expect(parsePositiveInt(' 8 ', '--concurrency')).toBe(8);
  });

  it('should name the flag when rejecting a value', () => {
    expect(() => parsePositiveInt('0', '--concurrency')).toThrow(
      '--concurrency must be a positive integer, got "0"',
    );
    expect(() => parsePositiveInt('1.5', '--timeout')).toThrow('--timeout');
    expect(() => parsePositiveInt('abc', '--max-size')).toThrow('--max-size');
  });
});

describe('printSummary', () => {
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should report an empty run', () => {
    printSummary({
      total: 0,
      succeeded: 0,
      failed: 0,
      failures: [],
      allSucceeded: true,
      durationMs: 0,
    });
    expect(log.mock.calls).toEqual([['No files found to review']]);
    expect(error).not.toHaveBeenCalled();
  });

  it('should print a success line and the total time', () => {
    printSummary({
      total: 4,
      succeeded: 4,
      failed: 0,
      failures: [],
      allSucceeded: true,
      durationMs: 61500,
    });
    expect(log.mock.calls).toEqual([
      ['\nReview completed successfully for 4 files'],
      ['--- Total review time: 1m 1s (61500ms) ---'],
    ]);
    expect(error).not.toHaveBeenCalled();
  });

  it('should list failures on stderr, one line each', () => {
    const summary: RunSummary = {
      total: 3,
      succeeded: 1,
      failed: 2,
      failures: [
        'failed to review a.ts: empty content',
        'failed to review b.ts: API error: bad\ninput',
      ],
      allSucceeded: false,
      durationMs: 1200,
    };
    printSummary(summary);
    expect(error.mock.calls).toEqual([
      ['\nEncountered 2 errors during review:'],
      ['- failed to review a.ts: empty content'],
      ['- failed to review b.ts: API error: bad input'],
      ['\nreview completed with 2 of 3 files failed'],
    ]);
    expect(log.mock.calls).toEqual([['--- Total review time: 1s (1200ms) ---']]);
  });
});
