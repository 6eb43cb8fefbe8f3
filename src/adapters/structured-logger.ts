import { serializeError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

const RESERVED_KEYS = new Set(["time", "level", "logger", "msg"]);

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  /** Engine name stamped on every line */
  logger?: string;
  clock?: () => Date;
}

/**
 * JSON-lines diagnostics. Writes to stderr unless given a writer.
 * Errors in the context are expanded with their code, sink path and cause.
 */
export class StructuredLogger implements Logger {
  private readonly writer: (line: string) => void;
  private readonly level: LogLevel;
  private readonly logger: string | undefined;
  private readonly clock: () => Date;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.DEBUG;
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, msg, ctx);
  }

  private emit(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (level < this.level) return;

    const entry: Record<string, unknown> = {
      time: this.clock().toISOString(),
      level: LEVEL_NAMES[level],
    };
    if (this.logger) entry.logger = this.logger;
    entry.msg = msg;

    for (const [key, value] of Object.entries(ctx ?? {})) {
      if (RESERVED_KEYS.has(key)) continue;
      entry[key] = value instanceof Error ? serializeError(value) : value;
    }

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch {
      // Circular or BigInt context
      line = JSON.stringify({
        time: entry.time,
        level: entry.level,
        msg,
        serializationError: true,
      });
    }
    this.writer(line);
  }
}
