import type { Logger } from "../interfaces/logger.js";

/** Discards diagnostics. Pass as `diagnostics` to keep an engine from reporting its own failures. */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export const noopLogger: Logger = new NoopLogger();
