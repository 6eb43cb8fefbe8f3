/**
 * ShutdownCoordinator: drains the pipeline under a deadline and releases every resource.
 *
 * 1. mark the engine as shutting down (new submissions bypass the queue)
 * 2. close the queue
 * 3. wait up to `timeoutMs` for the consumer to exit (0 gives up at once; past the
 *    largest timer delay, including Infinity, waits without a deadline)
 * 4. on timeout, print a warning and drain the rest on the calling context
 * 5. stop the rotation clock; wait for direct writes in flight
 * 6. close sinks under the lock
 * 7. abort the engine-owned controller
 *
 * A second call resolves at once. The shared-cache case releases only this engine's holds.
 */

import { MAX_TIMER_MS } from "../config/config-schema.js";
import type { Logger } from "../interfaces/logger.js";
import { Ansi } from "../utils/ansi.js";
import type { DispatchPipeline } from "./dispatch-pipeline.js";
import type { RotationClock } from "./rotation-clock.js";
import type { SeverityStrategy } from "./severity-strategy.js";
import type { SinkCache } from "./sink-cache.js";

export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;

export const SHUTDOWN_TIMEOUT_WARNING =
  "WARNING: Logger shutdown timed out, some logs may be lost.";

export interface ShutdownDeps {
  pipeline: DispatchPipeline;
  rotation: RotationClock | null;
  sinks: SinkCache;
  /** When false the cache is shared; only this engine's strategies give their sinks back. */
  ownsSinkCache: boolean;
  strategies: () => Iterable<SeverityStrategy>;
  stdout: (text: string) => void;
  diagnostics: Logger;
  controller: AbortController;
}

export class ShutdownCoordinator {
  private started = false;
  private readonly directWrites = new Set<Promise<void>>();

  constructor(private readonly deps: ShutdownDeps) {}

  get isShuttingDown(): boolean {
    return this.started;
  }

  /** Register a write issued outside the queue so step 5 can wait for it. */
  track(write: Promise<void>): Promise<void> {
    this.directWrites.add(write);
    return write.finally(() => {
      this.directWrites.delete(write);
    });
  }

  async shutdown(timeoutMs: number = DEFAULT_SHUTDOWN_TIMEOUT_MS): Promise<void> {
    if (this.started) return;
    this.started = true;

    const { pipeline, diagnostics } = this.deps;
    pipeline.close();

    if (!(await settlesWithin(pipeline.finished, timeoutMs))) {
      this.deps.stdout(`${Ansi.BOLD_YELLOW}${SHUTDOWN_TIMEOUT_WARNING}${Ansi.RESET}`);
      const drained = await pipeline.drainRemaining();
      diagnostics.debug?.("Drained log queue after timeout", { drained, timeoutMs });
    }

    await this.deps.rotation?.stop();
    await Promise.all([...this.directWrites]);

    await this.deps.sinks.withLock(async () => {
      if (!this.deps.ownsSinkCache) {
        for (const strategy of this.deps.strategies()) await strategy.releaseSink();
        return;
      }

      const failures = await this.deps.sinks.closeAll();
      for (const strategy of this.deps.strategies()) strategy.detach();
      for (const { path, error } of failures) {
        diagnostics.warn("Failed to close log sink", { path, error });
      }
    });

    this.deps.controller.abort();
  }
}

async function settlesWithin(promise: Promise<void>, timeoutMs: number): Promise<boolean> {
  if (!(timeoutMs > 0)) return false;
  if (timeoutMs > MAX_TIMER_MS) {
    await promise;
    return true;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const settled = await Promise.race([
    promise.then(() => true),
    new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    }),
  ]);
  if (timer !== undefined) clearTimeout(timer);
  return settled;
}
