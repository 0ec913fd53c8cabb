import type { ApiConfig } from '../config/config.types.js';
import type { Endpoint } from './review.types.js';

/**
 * Equivalent chat-completion endpoints with a rotating start offset.
 *
 * One pool belongs to one run. The counter advances once per `nextStartIndex()`
 * call, i.e. once per dispatched unit, however many endpoints that unit ends
 * up trying.
 */
export class EndpointPool {
  private readonly endpoints: readonly Endpoint[];
  private counter = 0;

  constructor(endpoints: readonly Endpoint[]) {
    this.endpoints = [...endpoints];
  }

  /** Explicit list when present, otherwise the single legacy `url`. */
  static fromConfig(api: Pick<ApiConfig, 'url' | 'endpoints'>): EndpointPool {
    if (api.endpoints.length > 0) {
      return new EndpointPool(api.endpoints);
    }
    return new EndpointPool(api.url !== '' ? [api.url] : []);
  }

  effectiveEndpoints(): readonly Endpoint[] {
    return this.endpoints;
  }

  get size(): number {
    return this.endpoints.length;
  }

  /** Total number of start indices handed out so far. */
  get issued(): number {
    return this.counter;
  }

  nextStartIndex(): number {
    const n = this.endpoints.length;
    if (n === 0) {
      throw new Error('Endpoint pool is empty');
    }
    // Synchronous read-modify-write: no await between read and write, so
    // concurrent tasks on the event loop cannot interleave here.
    this.counter += 1;
    return (this.counter - 1) % n;
  }
}
