/**
 * Unbounded FIFO queue with a blocking pop.
 *
 * pop() waits while the queue is empty. close() hands the undelivered items
 * back to the caller; pending and future pops then resolve with `undefined`.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly takers: Array<(item: T | undefined) => void> = [];
  private closed = false;

  push(item: T): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed queue');
    }

    const taker = this.takers.shift();
    if (taker) {
      taker(item);
      return;
    }
    this.items.push(item);
  }

  pop(): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise<T | undefined>((resolve) => {
      this.takers.push(resolve);
    });
  }

  /**
   * Stop accepting items and wake every blocked pop().
   * Returns whatever was still queued.
   */
  close(): T[] {
    this.closed = true;
    const remaining = this.items.splice(0, this.items.length);
    for (const taker of this.takers.splice(0, this.takers.length)) {
      taker(undefined);
    }
    return remaining;
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
