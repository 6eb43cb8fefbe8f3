import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";
import { DEFAULT_SHUTDOWN_TIMEOUT_MS } from "./shutdown-coordinator.js";

export interface Shutdownable {
  shutdown(timeoutMs?: number): Promise<void>;
}

export interface ShutdownHookOptions {
  logger?: Logger;
  /** Deadline handed to `shutdown` (default: 5000) */
  timeoutMs?: number;
  /** Exit with status 1 if shutdown has not finished after this long (default: timeoutMs + 5000) */
  forceExitMs?: number;
  signals?: readonly NodeJS.Signals[];
}

/** Shut the logger down, then exit with `status` whether or not shutdown succeeded. */
export async function gracefulExit(
  target: Shutdownable,
  status = 0,
  timeoutMs = DEFAULT_SHUTDOWN_TIMEOUT_MS,
  logger: Logger = noopLogger,
): Promise<void> {
  try {
    await target.shutdown(timeoutMs);
  } catch (err) {
    logger.error("Logger shutdown failed", { error: err });
  } finally {
    process.exit(status);
  }
}

/**
 * Register SIGTERM and SIGINT handlers that shut the logger down before exiting.
 * Force-exits after `forceExitMs` if shutdown stalls. Returns a function that removes the handlers.
 */
export function installShutdownHooks(
  target: Shutdownable,
  options: ShutdownHookOptions = {},
): () => void {
  const logger = options.logger ?? noopLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
  const forceExitMs = options.forceExitMs ?? timeoutMs + 5000;
  const signals = options.signals ?? ["SIGTERM", "SIGINT"];
  let shuttingDown = false;

  const handler = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;

    const forceTimer = setTimeout(() => {
      process.exit(1);
    }, forceExitMs);
    forceTimer.unref();

    target
      .shutdown(timeoutMs)
      .catch((err) => {
        logger.error("Logger shutdown failed", { signal, error: err });
      })
      .finally(() => {
        clearTimeout(forceTimer);
        process.exit(0);
      });
  };

  for (const signal of signals) process.on(signal, handler);
  return () => {
    for (const signal of signals) process.off(signal, handler);
  };
}
