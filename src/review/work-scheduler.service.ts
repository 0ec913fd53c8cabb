import { Inject, Injectable, ConsoleLogger } from '@nestjs/common';
import { AdmissionGate, GateAbortedError } from './admission-gate.js';
import { validateContent } from './content-validator.js';
import { EndpointPool } from './endpoint-pool.js';
import { sanitizeErrorMessage } from './error-utils.js';
import { FailoverDispatcher } from './failover-dispatcher.service.js';
import type {
  ReviewFailure,
  ReviewOutcome,
  ReviewUnit,
  UnitOutcome,
} from './review.types.js';

export interface RunAllOptions {
  /** Maximum number of units in their remote-call phase at once. */
  concurrency: number;
  pool: EndpointPool;
  /** Configured size ceiling, re-checked before content validation. */
  maxUnitSize: number;
  signal?: AbortSignal;
  /** Called once per unit, after its gate slot has been released. */
  onOutcome?: (unit: ReviewUnit, outcome: ReviewOutcome) => Promise<void>;
  /** Supply a gate to observe it; a fresh one is created otherwise. */
  gate?: AdmissionGate;
}

function failure(
  kind: ReviewFailure['kind'],
  reason: string,
  startMs: number,
): ReviewFailure {
  return {
    status: 'failure',
    kind,
    reason,
    attempts: [],
    durationMs: Date.now() - startMs,
  };
}

@Injectable()
export class WorkScheduler {
  constructor(
    @Inject(ConsoleLogger) private readonly logger: ConsoleLogger,
    @Inject(FailoverDispatcher) private readonly dispatcher: FailoverDispatcher,
  ) {
    this.logger.setContext(WorkScheduler.name);
  }

  /**
   * Launch one task per unit and wait for all of them. Results come back in
   * completion order, exactly one per input unit.
   */
  async runAll(
    units: readonly ReviewUnit[],
    options: RunAllOptions,
  ): Promise<UnitOutcome[]> {
    const gate = options.gate ?? new AdmissionGate(options.concurrency);
    const completed: UnitOutcome[] = [];

    const runOne = async (unit: ReviewUnit): Promise<void> => {
      const outcome = await this.reviewUnit(unit, gate, options);
      completed.push({ unit, outcome });
      if (options.onOutcome) {
        await options.onOutcome(unit, outcome);
      }
    };

    await Promise.all(units.map(runOne));
    return completed;
  }

  private async reviewUnit(
    unit: ReviewUnit,
    gate: AdmissionGate,
    options: RunAllOptions,
  ): Promise<ReviewOutcome> {
    const startMs = Date.now();
    if (unit.size > options.maxUnitSize) {
      return failure(
        'validation',
        `file size exceeds maximum allowed size of ${options.maxUnitSize} bytes`,
        startMs,
      );
    }
    const validation = validateContent(unit.content);
    if (!validation.valid) {
      return failure('validation', validation.reason, startMs);
    }

    try {
      await gate.acquire(options.signal);
    } catch (error) {
      if (error instanceof GateAbortedError) {
        return failure('canceled', 'review canceled', startMs);
      }
      throw error;
    }
    try {
      this.logger.log(`Reviewing: ${unit.path}`);
      return await this.dispatcher.review(unit, options.pool, {
        signal: options.signal,
      });
    } catch (error) {
      const msg = sanitizeErrorMessage(error);
      this.logger.error(`Unexpected fault while reviewing ${unit.path}: ${msg}`);
      return failure('internal', `unexpected error: ${msg}`, startMs);
    } finally {
      gate.release();
    }
  }
}
