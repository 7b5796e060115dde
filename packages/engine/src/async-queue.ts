/**
 * Unbounded single-consumer async queue.
 *
 * push() never blocks; iteration waits for the next item and finishes once
 * end() has been called and everything queued before it has been read.
 */

export class AsyncQueue<T> implements AsyncIterable<T> {
  private items: Array<{ value: T }> = [];
  private waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private ended = false;

  /** Returns false if the queue has already ended */
  push(value: T): boolean {
    if (this.ended) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
    } else {
      this.items.push({ value });
    }
    return true;
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isEnded(): boolean {
    return this.ended;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const item = this.items.shift();
    if (item) {
      return Promise.resolve({ value: item.value, done: false });
    }
    if (this.ended) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise(resolve => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
