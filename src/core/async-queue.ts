/**
 * Unbounded FIFO handoff between a producer and an async consumer.
 *
 * `push` never waits, so it is safe to call from a broker delivery callback.
 * `close` stops further writes; readers still drain what was already queued
 * and then see end-of-stream.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  readonly #items: T[] = [];
  readonly #waiters: ((result: IteratorResult<T, undefined>) => void)[] = [];
  #closed = false;

  /**
   * Returns false (and drops the item) once the queue is closed
   */
  push(item: T): boolean {
    if (this.#closed) {
      return false;
    }

    const waiter = this.#waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
    } else {
      this.#items.push(item);
    }
    return true;
  }

  close(): void {
    if (this.#closed) return;
    this.#closed = true;

    // Waiters only exist while the buffer is empty
    for (const waiter of this.#waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.#items.length > 0) {
      const [item] = this.#items.splice(0, 1);
      return Promise.resolve({ value: item, done: false });
    }

    if (this.#closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => this.#waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
    };
  }

  get size(): number {
    return this.#items.length;
  }

  get closed(): boolean {
    return this.#closed;
  }
}
