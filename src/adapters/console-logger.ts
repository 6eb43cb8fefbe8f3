/**
 * Human-readable diagnostics on stderr, one line per event:
 *
 *   [api] WARN Log queue full, message dropped severity=INFO
 *
 * Stdout stays reserved for echoed log entries. The engine uses this logger by default,
 * tagged with its name and showing info and above.
 */

import type { Logger } from "../interfaces/logger.js";
import { stringifyContent } from "../utils/stringify-content.js";
import { LEVEL_NAMES, LogLevel } from "./structured-logger.js";

export interface ConsoleLoggerOptions {
  level?: LogLevel; // default: INFO
  writer?: (line: string) => void;
}

export class ConsoleLogger implements Logger {
  private readonly writer: (line: string) => void;
  private readonly level: LogLevel;

  constructor(
    private readonly tag = "logroll",
    options: ConsoleLoggerOptions = {},
  ) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.INFO;
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
    const label = LEVEL_NAMES[level].toUpperCase();
    this.writer(`[${this.tag}] ${label} ${msg}${formatContext(ctx)}`);
  }
}

function formatContext(ctx: Record<string, unknown> | undefined): string {
  if (!ctx) return "";
  const pairs = Object.entries(ctx)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);
  return pairs.length > 0 ? ` ${pairs.join(" ")}` : "";
}

function formatValue(value: unknown): string {
  const text = stringifyContent(value);
  return /[\s"]/.test(text) ? JSON.stringify(text) : text;
}
