/**
 * Fixed-size permit pool bounding concurrent access to a shared resource.
 * Waiters are served in FIFO order.
 */
export class PermitPool {
  private permits: number;
  private readonly queue: Array<() => void> = [];

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Permit pool size must be a positive integer, got ${size}`);
    }
    this.permits = size;
  }

  get available(): number {
    return this.permits;
  }

  get waiting(): number {
    return this.queue.length;
  }

  /**
   * Resolves with a release function once a permit is free. Calling the
   * release function more than once has no effect.
   */
  async acquire(): Promise<() => void> {
    if (this.permits > 0) {
      this.permits--;
      return this.releaser();
    }

    return new Promise((resolve) => {
      this.queue.push(() => {
        this.permits--;
        resolve(this.releaser());
      });
    });
  }

  /**
   * Run `task` while holding a permit. The permit is released however the
   * task settles.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.release();
    };
  }

  private release(): void {
    this.permits++;
    const next = this.queue.shift();
    if (next) {
      next();
    }
  }
}
