/**
 * AsyncMessageQueue<T>: FIFO queue with one consumer and explicit backpressure.
 *
 * Usage:
 *   const queue = new AsyncMessageQueue<LogMessage>({ capacity: 1000, backpressure: "block" });
 *   await queue.enqueue(msg);            // producer side; waits for room when full and blocking
 *   queue.offer(msg);                    // producer side; never waits
 *   queue.close();                       // no more items accepted, queued items stay readable
 *
 *   for (;;) {                           // consumer side
 *     const msg = queue.tryDequeue();
 *     if (msg === undefined) {
 *       if (queue.isClosed) break;
 *       await queue.waitForItem();
 *       continue;
 *     }
 *     ...
 *   }
 *
 * Dequeuing is synchronous so the consumer can act on an item in the same turn it takes it.
 */

export type Backpressure = "block" | "drop";

export type EnqueueResult = "queued" | "dropped" | "closed";

export interface AsyncMessageQueueOptions {
  /** Maximum queued items. Defaults to Infinity. */
  capacity?: number;
  /** What `enqueue` does when the queue is full. Defaults to "block". */
  backpressure?: Backpressure;
}

export class AsyncMessageQueue<T> {
  private readonly items: T[] = [];
  private readonly capacity: number;
  private readonly backpressure: Backpressure;
  private itemWaiters: Array<() => void> = [];
  private spaceWaiters: Array<() => void> = [];
  private closed = false;

  constructor(options: AsyncMessageQueueOptions = {}) {
    this.capacity = options.capacity ?? Number.POSITIVE_INFINITY;
    this.backpressure = options.backpressure ?? "block";
  }

  /** Add an item without waiting. A full queue reports "dropped" regardless of backpressure. */
  offer(item: T): EnqueueResult {
    if (this.closed) return "closed";
    if (this.items.length >= this.capacity) return "dropped";

    this.items.push(item);
    const waiters = this.itemWaiters;
    this.itemWaiters = [];
    for (const wake of waiters) wake();
    return "queued";
  }

  /** Add an item, waiting for room first when the queue is full and backpressure is "block". */
  async enqueue(item: T): Promise<EnqueueResult> {
    while (!this.closed && this.isFull && this.backpressure === "block") {
      await new Promise<void>((resolve) => {
        this.spaceWaiters.push(resolve);
      });
    }
    return this.offer(item);
  }

  /** Remove and return the oldest item, or undefined when the queue is empty. */
  tryDequeue(): T | undefined {
    if (this.items.length === 0) return undefined;
    const item = this.items.shift();
    this.spaceWaiters.shift()?.();
    return item;
  }

  /** Resolves once an item is available or the queue has been closed. */
  waitForItem(): Promise<void> {
    if (this.items.length > 0 || this.closed) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.itemWaiters.push(resolve);
    });
  }

  /** Stop accepting items. Already queued items remain available to `tryDequeue`. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const waiters = [...this.itemWaiters, ...this.spaceWaiters];
    this.itemWaiters = [];
    this.spaceWaiters = [];
    for (const wake of waiters) wake();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  get size(): number {
    return this.items.length;
  }
}
