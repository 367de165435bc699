/**
 * Caps the number of concurrently running async tasks.
 *
 * Used for outbound calls to spokes so a large fleet never opens an
 * unbounded number of sockets at once. Waiters are served FIFO.
 */
export class ConcurrencyLimiter {
  private readonly limit: number;
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError('Concurrency limit must be a positive integer');
    }
    this.limit = limit;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  get running(): number {
    return this.active;
  }

  get pending(): number {
    return this.waiting.length;
  }

  private acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // slot handed over; active count unchanged
      next();
      return;
    }
    this.active--;
  }
}
