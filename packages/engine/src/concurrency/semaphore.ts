import { InvalidConcurrencyLimitError } from "../errors";

/**
 * Counting gate. A released slot is handed straight to the oldest waiter, so
 * the number of holders never exceeds `capacity`.
 */
export class Semaphore {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new InvalidConcurrencyLimitError(capacity);
    }
  }

  get available(): number {
    return this.capacity - this.active;
  }

  acquire(): Promise<void> {
    if (this.active < this.capacity) {
      this.active += 1;
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }

    if (this.active === 0) {
      throw new Error("Semaphore released more times than it was acquired.");
    }
    this.active -= 1;
  }

  async use<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
