/**
 * DispatchPipeline: single-consumer queue between log call sites and severity strategies.
 *
 * The consumer task starts with the pipeline and runs until the queue is closed and empty.
 * Messages are written in strict FIFO order. A failed write is reported and the consumer
 * moves on to the next message.
 *
 * Every dequeue (by the consumer or by `drainRemaining`) hands the message to `write` in the
 * same turn, and `write` requests the sink lock before its first await. The lock is FIFO, so
 * the consumer and a shutdown drain running side by side still write in queue order.
 */

import type { Logger } from "../interfaces/logger.js";
import type { LogMessage } from "../types/log-message.js";
import {
  AsyncMessageQueue,
  type AsyncMessageQueueOptions,
  type EnqueueResult,
} from "./async-message-queue.js";

export type MessageWriter = (message: LogMessage) => Promise<void>;

export interface DispatchPipelineOptions extends AsyncMessageQueueOptions {
  diagnostics: Logger;
}

export class DispatchPipeline {
  /** Resolves when the consumer task has exited. */
  readonly finished: Promise<void>;

  private readonly queue: AsyncMessageQueue<LogMessage>;
  private readonly diagnostics: Logger;
  private pending = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    options: DispatchPipelineOptions,
    private readonly write: MessageWriter,
  ) {
    this.queue = new AsyncMessageQueue({
      capacity: options.capacity,
      backpressure: options.backpressure,
    });
    this.diagnostics = options.diagnostics;
    this.finished = this.consume();
  }

  /**
   * Queue a message. "closed" means the caller must write it directly;
   * "dropped" means a full "drop" queue discarded it (already reported).
   */
  async enqueue(message: LogMessage): Promise<EnqueueResult> {
    this.pending++;
    const result = await this.queue.enqueue(message);
    if (result === "queued") return result;

    if (result === "dropped") {
      this.diagnostics.warn("Log queue full, message dropped", {
        severity: message.severity.name,
      });
    }
    this.settle();
    return result;
  }

  /** Resolves once every message submitted so far has been written or refused. */
  idle(): Promise<void> {
    if (this.pending === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Stop accepting messages. Queued messages are still written. */
  close(): void {
    this.queue.close();
  }

  /** Write whatever is still queued on the calling context. Returns the number written. */
  async drainRemaining(): Promise<number> {
    let drained = 0;
    let message = this.queue.tryDequeue();
    while (message !== undefined) {
      await this.process(message);
      drained++;
      message = this.queue.tryDequeue();
    }
    return drained;
  }

  /** Messages submitted but not yet written or refused. */
  get backlog(): number {
    return this.pending;
  }

  private async consume(): Promise<void> {
    for (;;) {
      const message = this.queue.tryDequeue();
      if (message === undefined) {
        if (this.queue.isClosed) return;
        await this.queue.waitForItem();
        continue;
      }
      await this.process(message);
    }
  }

  private async process(message: LogMessage): Promise<void> {
    try {
      await this.write(message);
    } catch (error) {
      this.diagnostics.error("Log consumer error", { severity: message.severity.name, error });
    } finally {
      this.settle();
    }
  }

  private settle(): void {
    this.pending--;
    if (this.pending > 0) return;

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const wake of waiters) wake();
  }
}
