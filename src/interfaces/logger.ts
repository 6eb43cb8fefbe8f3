/**
 * Diagnostic logger interface.
 * The engine reports its own failures (write errors, dropped messages, sweep errors)
 * through this interface; ConsoleLogger and StructuredLogger implement it.
 * @module
 */

/** Structured logger with optional debug level. */
export interface Logger {
  debug?(msg: string, ctx?: Record<string, unknown>): void;
  info(msg: string, ctx?: Record<string, unknown>): void;
  warn(msg: string, ctx?: Record<string, unknown>): void;
  error(msg: string, ctx?: Record<string, unknown>): void;
}
