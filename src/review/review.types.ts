/** One piece of content submitted for review. Produced by the scanner, never mutated. */
export interface ReviewUnit {
  readonly path: string;
  readonly size: number;
  readonly content: string;
}

/** URL of one chat-completion endpoint. */
export type Endpoint = string;

export type AttemptFailureKind =
  | 'transport'
  | 'status'
  | 'decode'
  | 'application'
  | 'empty-result';

export interface AttemptFailure {
  kind: AttemptFailureKind;
  reason: string;
  retryable: boolean;
  status?: number;
}

/** Result of exactly one request against one endpoint. */
export type AttemptResult =
  | { ok: true; text: string }
  | { ok: false; failure: AttemptFailure };

export interface EndpointFailure {
  endpoint: Endpoint;
  failure: AttemptFailure;
}

export type OutcomeFailureKind =
  | 'validation'
  | 'no-endpoints'
  | 'exhausted'
  | 'canceled'
  | 'internal';

export interface ReviewSuccess {
  status: 'success';
  text: string;
  endpoint: Endpoint;
  /** Number of endpoints tried, including the one that answered. */
  attempts: number;
  durationMs: number;
}

export interface ReviewFailure {
  status: 'failure';
  kind: OutcomeFailureKind;
  reason: string;
  attempts: EndpointFailure[];
  durationMs: number;
}

export type ReviewOutcome = ReviewSuccess | ReviewFailure;

export interface UnitOutcome {
  unit: ReviewUnit;
  outcome: ReviewOutcome;
}

export interface RunSummary {
  total: number;
  succeeded: number;
  failed: number;
  /** One line per failed unit, in the order they were recorded. */
  failures: string[];
  allSucceeded: boolean;
  durationMs: number;
}

export interface RunResult {
  summary: RunSummary;
  outcomes: UnitOutcome[];
}
