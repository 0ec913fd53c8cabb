import { Inject, Injectable, ConsoleLogger } from '@nestjs/common';
import { ChatCompletionClient } from './chat-completion.client.js';
import { EndpointPool } from './endpoint-pool.js';
import type {
  EndpointFailure,
  ReviewOutcome,
  ReviewUnit,
} from './review.types.js';

export interface DispatchOptions {
  signal?: AbortSignal;
}

@Injectable()
export class FailoverDispatcher {
  constructor(
    @Inject(ConsoleLogger) private readonly logger: ConsoleLogger,
    @Inject(ChatCompletionClient) private readonly client: ChatCompletionClient,
  ) {
    this.logger.setContext(FailoverDispatcher.name);
  }

  /**
   * Try each endpoint at most once, starting from the pool's rotating offset.
   * The first success wins; the remaining endpoints are not contacted.
   */
  async review(
    unit: ReviewUnit,
    pool: EndpointPool,
    options: DispatchOptions = {},
  ): Promise<ReviewOutcome> {
    const startMs = Date.now();
    const endpoints = pool.effectiveEndpoints();
    if (endpoints.length === 0) {
      return {
        status: 'failure',
        kind: 'no-endpoints',
        reason: 'no endpoints configured',
        attempts: [],
        durationMs: Date.now() - startMs,
      };
    }

    const n = endpoints.length;
    const start = pool.nextStartIndex();
    const failures: EndpointFailure[] = [];

    for (let i = 0; i < n; i++) {
      if (options.signal?.aborted) {
        return {
          status: 'failure',
          kind: 'canceled',
          reason: 'review canceled',
          attempts: failures,
          durationMs: Date.now() - startMs,
        };
      }
      const endpoint = endpoints[(start + i) % n];
      const result = await this.client.attempt(endpoint, unit, {
        signal: options.signal,
      });
      if (result.ok) {
        return {
          status: 'success',
          text: result.text,
          endpoint,
          attempts: i + 1,
          durationMs: Date.now() - startMs,
        };
      }
      failures.push({ endpoint, failure: result.failure });
      if (i < n - 1) {
        this.logger.warn(
          `${unit.path}: ${endpoint} failed (${result.failure.reason}), trying next endpoint`,
        );
      }
    }

    return {
      status: 'failure',
      kind: 'exhausted',
      reason: n === 1 ? failures[0].failure.reason : `all ${n} endpoints failed`,
      attempts: failures,
      durationMs: Date.now() - startMs,
    };
  }
}
