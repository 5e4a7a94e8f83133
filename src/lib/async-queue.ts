/**
 * DealRelay — Async Queue
 *
 * Unbounded FIFO with a pull-based async iterator. Producers push from
 * callbacks or loops; one consumer drains with `for await`.
 * After `close()` the consumer sees the buffered items and then ends;
 * after `fail()` it sees the buffered items and then the error.
 */

interface Waiter<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: unknown) => void;
}

export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: { error: unknown } | null = null;

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Returns false when the queue no longer accepts items.
   */
  push(item: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ done: false, value: item });
    } else {
      this.items.push(item);
    }
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.settleWaiters();
  }

  fail(error: unknown): void {
    if (this.closed) return;
    this.failure = { error };
    this.closed = true;
    this.settleWaiters();
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      return { done: false, value };
    }
    if (this.failure) throw this.failure.error;
    if (this.closed) return { done: true, value: undefined };

    return new Promise<IteratorResult<T, undefined>>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { done: true, value: undefined };
      },
    };
  }

  private settleWaiters(): void {
    // Waiters only exist while the buffer is empty
    for (const waiter of this.waiters.splice(0)) {
      if (this.failure) {
        waiter.reject(this.failure.error);
      } else {
        waiter.resolve({ done: true, value: undefined });
      }
    }
  }
}
