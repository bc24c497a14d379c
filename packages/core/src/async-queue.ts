/**
 * Unbounded FIFO with async consumers. `close()` ends iteration once drained.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(r: IteratorResult<T, undefined>) => void> = [];
  private _closed = false;

  get closed(): boolean {
    return this._closed;
  }

  get size(): number {
    return this.items.length;
  }

  /** Returns false once closed. */
  push(item: T): boolean {
    if (this._closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) waiter({ value: item, done: false });
    else this.items.push(item);
    return true;
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    for (const w of this.waiters.splice(0)) w({ value: undefined, done: true });
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.items.length > 0) {
      const value = this.items[0];
      this.items.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this._closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise(resolve => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}
