// SPDX-License-Identifier: Apache-2.0

/**
 * Counting semaphore. Waiters are served in arrival order; a released permit goes straight to
 * the oldest waiter.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly permits: number) {
    if (!Number.isSafeInteger(permits) || permits < 1) {
      throw new Error(`Semaphore needs at least one permit, got ${permits}.`);
    }
    this.available = permits;
  }

  /**
   * Permits currently held.
   */
  get inUse(): number {
    return this.permits - this.available;
  }

  /**
   * Callers waiting for a permit.
   */
  get pending(): number {
    return this.waiters.length;
  }

  public acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  public release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else if (this.available < this.permits) {
      this.available++;
    }
  }

  /**
   * Runs `task` while holding a permit.
   */
  public async use<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
