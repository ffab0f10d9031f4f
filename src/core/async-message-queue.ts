/**
 * AsyncMessageQueue<T>: unbounded async iterable queue.
 *
 * Backs the in-process channel transport and the in-memory room
 * subscriptions. Items are handed to waiting consumers in the order they
 * started waiting; once finished, queued items are still delivered and then
 * every consumer sees the end of the stream.
 */

type Waiter<T> = (result: IteratorResult<T, undefined>) => void;

export class AsyncMessageQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private finished = false;

  /** Ignored after finish(). */
  enqueue(item: T): void {
    if (this.finished) return;
    const waiter = this.waiters.shift();
    if (waiter) waiter({ done: false, value: item });
    else this.items.push(item);
  }

  finish(): void {
    if (this.finished) return;
    this.finished = true;
    for (const waiter of this.waiters.splice(0)) waiter({ done: true, value: undefined });
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /** Items queued and not yet taken. */
  get size(): number {
    return this.items.length;
  }

  private take(): Promise<IteratorResult<T, undefined>> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      return Promise.resolve({ done: false, value: item });
    }
    if (this.finished) return Promise.resolve({ done: true, value: undefined });
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.take() };
  }
}
