/**
 * logroll public API barrel.
 *
 * Re-exports the engine, its collaborators' interfaces, the bundled adapters and the
 * formatting helpers that make up the public surface area of the `logroll` package.
 * @module
 */

// Adapters
export type { ConsoleLoggerOptions } from "./adapters/console-logger.js";
export { ConsoleLogger } from "./adapters/console-logger.js";
export { NodeFileSystem } from "./adapters/node-file-system.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, StructuredLogger } from "./adapters/structured-logger.js";
// Config
export { engineOptionsSchema, MAX_TIMER_MS } from "./config/config-schema.js";
// Core
export type { Backpressure, EnqueueResult } from "./core/async-message-queue.js";
export { DEFAULT_SEVERITIES } from "./core/default-severities.js";
export type { DefaultSeverity } from "./core/default-severities.js";
export type { ShutdownHookOptions, Shutdownable } from "./core/graceful-exit.js";
export { gracefulExit, installShutdownHooks } from "./core/graceful-exit.js";
export { LogEngine } from "./core/log-engine.js";
export { Mutex } from "./core/mutex.js";
export type { RotationClockState } from "./core/rotation-clock.js";
export type {
  SeverityDefinition,
  StrategyVariant,
  WriteOptions,
} from "./core/severity-strategy.js";
export { SeverityStrategy } from "./core/severity-strategy.js";
export {
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
  SHUTDOWN_TIMEOUT_WARNING,
} from "./core/shutdown-coordinator.js";
export { SinkCache } from "./core/sink-cache.js";
// Errors
export {
  ConfigError,
  errorMessage,
  LogrollError,
  SinkError,
  serializeError,
  toLogrollError,
} from "./errors.js";
// Interfaces
export type { Clock } from "./interfaces/clock.js";
export { systemClock } from "./interfaces/clock.js";
export type { AppendSink, DirectoryEntry, FileSystem } from "./interfaces/file-system.js";
export type { Logger } from "./interfaces/logger.js";
// Types
export type {
  EngineOptions,
  MessageFormatter,
  QueueOptions,
  ResolvedConfig,
  RotationOptions,
} from "./types/config.js";
export { DEFAULT_CONFIG, defaultMessageFormat, resolveConfig } from "./types/config.js";
export type { LogMessage } from "./types/log-message.js";
export { createLogMessage } from "./types/log-message.js";
// Utils
export type { AnsiColor } from "./utils/ansi.js";
export { Ansi, MARKER, MARKER_CODES, toDisplay, toPlain } from "./utils/ansi.js";
export type { DateFormat, TimeZoneMode } from "./utils/date-format.js";
export {
  createDateFormat,
  DEFAULT_DATE_PATTERN,
  DEFAULT_TIME_PATTERN,
} from "./utils/date-format.js";
export { stringifyContent } from "./utils/stringify-content.js";
