interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export class GateAbortedError extends Error {
  constructor() {
    super('Admission canceled while waiting for a slot');
    this.name = 'GateAbortedError';
  }
}

/**
 * Counting semaphore with FIFO waiters.
 *
 * A released slot is handed straight to the oldest waiter, so a late caller
 * can never overtake a queued one. Capacity 1 makes it a mutex.
 */
export class AdmissionGate {
  private activeCount = 0;
  private peakCount = 0;
  private readonly queue: Waiter[] = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Gate capacity must be a positive integer, got ${capacity}`);
    }
  }

  get active(): number {
    return this.activeCount;
  }

  get waiting(): number {
    return this.queue.length;
  }

  /** Highest number of slots ever held at once. */
  get peak(): number {
    return this.peakCount;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new GateAbortedError();
    }
    if (this.activeCount < this.capacity) {
      this.take();
      return;
    }
    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          const idx = this.queue.indexOf(waiter);
          if (idx !== -1) this.queue.splice(idx, 1);
          reject(new GateAbortedError());
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.queue.push(waiter);
    });
  }

  release(): void {
    if (this.activeCount === 0) {
      throw new Error('Gate released more times than acquired');
    }
    const next = this.queue.shift();
    if (!next) {
      this.activeCount--;
      return;
    }
    // Slot passes directly to the next waiter; the active count is unchanged.
    if (next.signal && next.onAbort) {
      next.signal.removeEventListener('abort', next.onAbort);
    }
    next.resolve();
  }

  /** Run `fn` while holding one slot; the slot is released on every exit path. */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private take(): void {
    this.activeCount++;
    if (this.activeCount > this.peakCount) {
      this.peakCount = this.activeCount;
    }
  }
}
