/**
 * Connection Limiter
 *
 * Optional cap on concurrently served connections. With a limit of 0 every
 * connection is admitted at once; otherwise connections beyond the limit
 * wait in FIFO order until a slot is released.
 *
 * @module proxy/connection-limiter
 */

export interface LimiterStats {
  active: number;
  queued: number;
  maxConcurrent: number;
}

export class ConnectionLimiter {
  private readonly maxConcurrent: number;
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  /**
   * @param maxConcurrent - Slots available; 0 disables the cap
   */
  constructor(maxConcurrent: number = 0) {
    this.maxConcurrent = maxConcurrent;
  }

  get unbounded(): boolean {
    return this.maxConcurrent <= 0;
  }

  /**
   * Resolve once the caller may proceed
   */
  acquire(): Promise<void> {
    if (this.unbounded || this.active < this.maxConcurrent) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  /**
   * Free a slot and admit the next waiter, if any
   */
  release(): void {
    if (this.active > 0) {
      this.active--;
    }
    const next = this.waiting.shift();
    if (next) {
      next();
    }
  }

  getStats(): LimiterStats {
    return {
      active: this.active,
      queued: this.waiting.length,
      maxConcurrent: this.maxConcurrent,
    };
  }
}
