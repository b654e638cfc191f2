/**
 * Many-producer, single-consumer queue between pollers and the evaluator.
 *
 * Producers never wait. The consumer receives everything pushed since its
 * last read as one batch, so a burst of updates costs one evaluation.
 */
export class UpdateChannel<T> {
  private pending: T[] = [];
  private waiter: ((batch: T[] | null) => void) | null = null;
  private closed = false;

  push(item: T): boolean {
    if (this.closed) return false;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve([item]);
      return true;
    }

    this.pending.push(item);
    return true;
  }

  /** Resolves with the next batch, or null once closed and drained. */
  next(): Promise<T[] | null> {
    if (this.pending.length > 0) {
      const batch = this.pending;
      this.pending = [];
      return Promise.resolve(batch);
    }
    if (this.closed) return Promise.resolve(null);
    if (this.waiter) {
      return Promise.reject(new Error("UpdateChannel supports a single consumer"));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(null);
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  size(): number {
    return this.pending.length;
  }
}
