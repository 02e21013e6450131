/**
 * FIFO mutual exclusion for async critical sections. Callers queue in arrival
 * order; a section that throws still releases the lock.
 */
export class ExclusiveSection {
  private held = false;
  private queue: Array<() => void> = [];

  get pending(): number {
    return this.queue.length;
  }

  get locked(): boolean {
    return this.held;
  }

  private acquire(): Promise<void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push(resolve);
    });
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
      return;
    }
    this.held = false;
  }

  async run<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
