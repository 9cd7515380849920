/**
 * FIFO async mutex. Backends whose mutations span an `await` (read-modify-write
 * against a store) run them through `runExclusive` so interleaved callers see
 * each mutation whole.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get locked(): boolean {
    return this.pending > 0;
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending += 1;

    try {
      await previous;
      return await fn();
    } finally {
      this.pending -= 1;
      release();
    }
  }
}
