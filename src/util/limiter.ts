export class ConcurrencyLimiter {
  private capacity: number;
  private active = 0;
  private waiting: Array<() => void> = [];

  constructor(limit = 4) {
    this.capacity = Math.max(1, Math.floor(limit));
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.take();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private take(): Promise<void> {
    if (this.active < this.capacity) {
      this.active += 1;
      return Promise.resolve();
    }
    return new Promise((r) => this.waiting.push(r));
  }

  private release(): void {
    // Hand the slot straight to the next waiter so `active` never dips and refills.
    const next = this.waiting.shift();
    if (next) next();
    else this.active -= 1;
  }
}
