/**
 * SerialQueue: async mutual exclusion by promise chaining.
 *
 * Tasks passed to `run()` execute one at a time in submission order, even when
 * they await I/O. A rejected task does not poison the chain for later tasks.
 *
 * Usage:
 *   const lock = new SerialQueue();
 *   const backend = await lock.run(async () => ensureBackend());
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle(),
    );
    return result;
  }

  /** Number of tasks queued or running. */
  get size(): number {
    return this.pending;
  }

  /** Resolves once every task submitted so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }

  private settle(): void {
    this.pending--;
  }
}
