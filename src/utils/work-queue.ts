import { AppError } from '../common/AppError.js';

/**
 * Work Queue
 *
 * FIFO of pending items shared by the workers of a {@link WorkerPool}.
 * Every enqueued item is counted as unfinished until it has been dequeued
 * and then acknowledged; `waitUntilDrained()` settles when that count is zero.
 *
 * Operations run to completion between awaits, so two workers can never
 * dequeue the same entry.
 */
export class WorkQueue<T> {
  private pending: T[] = [];
  private head = 0;
  private inFlight = new Map<T, number>();
  private unfinishedCount = 0;
  private drainWaiters: Array<() => void> = [];

  /**
   * Builds a one-shot batch queue holding `items` in order.
   */
  static from<T>(items: Iterable<T>): WorkQueue<T> {
    const queue = new WorkQueue<T>();
    for (const item of items) {
      queue.enqueue(item);
    }
    return queue;
  }

  enqueue(item: T): void {
    this.pending.push(item);
    this.unfinishedCount++;
  }

  /**
   * Removes and returns the oldest pending item.
   * Returns undefined when nothing is pending.
   */
  dequeue(): T | undefined {
    if (this.head >= this.pending.length) {
      return undefined;
    }

    const item = this.pending[this.head];
    this.head++;

    // Compact once the consumed prefix dominates the backing array.
    if (this.head > 64 && this.head * 2 > this.pending.length) {
      this.pending = this.pending.slice(this.head);
      this.head = 0;
    }

    this.inFlight.set(item, (this.inFlight.get(item) ?? 0) + 1);
    return item;
  }

  /**
   * Marks one previously dequeued `item` as fully processed.
   * @throws {AppError} QUEUE_ACK_WITHOUT_DEQUEUE if `item` is not in flight.
   */
  acknowledge(item: T): void {
    const count = this.inFlight.get(item);
    if (count === undefined) {
      throw new AppError(
        `Cannot acknowledge an item that was not dequeued: ${String(item)}`,
        { errorCode: 'QUEUE_ACK_WITHOUT_DEQUEUE', isOperational: false }
      );
    }

    if (count === 1) {
      this.inFlight.delete(item);
    } else {
      this.inFlight.set(item, count - 1);
    }

    this.unfinishedCount--;
    if (this.unfinishedCount === 0) {
      const waiters = this.drainWaiters;
      this.drainWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }

  /**
   * Resolves once every enqueued item has been dequeued and acknowledged.
   */
  waitUntilDrained(): Promise<void> {
    if (this.unfinishedCount === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  /** Number of items waiting to be dequeued. */
  get size(): number {
    return this.pending.length - this.head;
  }

  /** Items enqueued but not yet acknowledged. */
  get unfinished(): number {
    return this.unfinishedCount;
  }
}
