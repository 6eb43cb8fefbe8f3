import { join } from "node:path";
import { ConsoleLogger } from "../adapters/console-logger.js";
import { NodeFileSystem } from "../adapters/node-file-system.js";
import { engineOptionsSchema } from "../config/config-schema.js";
import type { Backpressure } from "../core/async-message-queue.js";
import type { SinkCache } from "../core/sink-cache.js";
import { ConfigError } from "../errors.js";
import { type Clock, systemClock } from "../interfaces/clock.js";
import type { FileSystem } from "../interfaces/file-system.js";
import type { Logger } from "../interfaces/logger.js";
import {
  createDateFormat,
  type DateFormat,
  DEFAULT_DATE_PATTERN,
  DEFAULT_TIME_PATTERN,
  type TimeZoneMode,
} from "../utils/date-format.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_TIME_ZONE: TimeZoneMode = "utc";
const DEFAULT_BACKPRESSURE: Backpressure = "block";

/** Builds one log entry from its parts. Lines of the entry are joined with "\n". */
export type MessageFormatter = (
  time: string,
  coloredSeverity: string,
  loggerName: string,
  lines: readonly string[],
) => string;

export interface RotationOptions {
  enabled?: boolean; // default: true
  retentionMs?: number; // default: 30 days
  sweepIntervalMs?: number; // default: 1 day
}

export interface QueueOptions {
  capacity?: number; // default: Infinity
  backpressure?: Backpressure; // default: "block"
}

/** Engine options; every field is optional. */
export interface EngineOptions {
  /** Logger name printed on every line (default: "logroll") */
  name?: string;

  /** Period key → directory (default: `logs/<key>`) */
  directory?: (periodKey: string) => string;
  /** Directory + lower-case severity → file (default: `<directory>/<severity>.log`) */
  file?: (directory: string, severity: string) => string;
  message?: MessageFormatter;
  timeFormat?: string; // default: "HH:mm:ss.SSS"
  /** Pattern for the period key; also used to parse directory names during sweeps. */
  dateFormat?: string; // default: "dd.MM.yyyy"
  timeZone?: TimeZoneMode; // default: "utc"

  rotation?: RotationOptions;
  queue?: QueueOptions;

  fileSystem?: FileSystem;
  clock?: Clock;
  /** Receives the engine's own failures (default: ConsoleLogger tagged with the name) */
  diagnostics?: Logger;
  /** Console echo target (default: process.stdout) */
  stdout?: (text: string) => void;
  /** Share open handles (and their lock) with other engines writing the same files. */
  sinkCache?: SinkCache;
  /** Aborting this signal shuts the engine down. The engine never aborts it. */
  signal?: AbortSignal;
}

/** Fully resolved configuration with defaults applied. */
export interface ResolvedConfig {
  name: string;
  directory: (periodKey: string) => string;
  file: (directory: string, severity: string) => string;
  message: MessageFormatter;
  time: DateFormat;
  date: DateFormat;
  timeZone: TimeZoneMode;
  rotation: Required<RotationOptions>;
  queue: Required<QueueOptions>;
  fileSystem: FileSystem;
  clock: Clock;
  diagnostics: Logger;
  stdout: (text: string) => void;
  sinkCache: SinkCache | undefined;
  signal: AbortSignal | undefined;
}

export const defaultMessageFormat: MessageFormatter = (
  time,
  coloredSeverity,
  loggerName,
  lines,
) => {
  const prefix = `[${time}] - ${coloredSeverity} - ${loggerName} - `;
  const entries = lines.length === 0 ? [""] : lines;
  return entries.map((line) => prefix + line.replaceAll("\n", `\n${prefix}`)).join("\n");
};

export const DEFAULT_CONFIG = {
  name: "logroll",
  directory: (periodKey: string) => join("logs", periodKey),
  file: (directory: string, severity: string) => join(directory, `${severity}.log`),
  message: defaultMessageFormat,
  timeFormat: DEFAULT_TIME_PATTERN,
  dateFormat: DEFAULT_DATE_PATTERN,
  timeZone: DEFAULT_TIME_ZONE,
  rotation: {
    enabled: true,
    retentionMs: 30 * DAY_MS,
    sweepIntervalMs: DAY_MS,
  },
  queue: {
    capacity: Number.POSITIVE_INFINITY,
    backpressure: DEFAULT_BACKPRESSURE,
  },
};

export function resolveConfig(options: EngineOptions = {}): ResolvedConfig {
  const validation = engineOptionsSchema.safeParse(options);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`, {
      cause: validation.error,
    });
  }

  const { sinkCache } = options;
  if (sinkCache && options.fileSystem && options.fileSystem !== sinkCache.fileSystem) {
    throw new ConfigError(
      "Invalid configuration: fileSystem must be the shared sink cache's filesystem",
    );
  }

  const name = options.name ?? DEFAULT_CONFIG.name;
  const timeZone = options.timeZone ?? DEFAULT_CONFIG.timeZone;

  return {
    name,
    directory: options.directory ?? DEFAULT_CONFIG.directory,
    file: options.file ?? DEFAULT_CONFIG.file,
    message: options.message ?? DEFAULT_CONFIG.message,
    time: createDateFormat(options.timeFormat ?? DEFAULT_CONFIG.timeFormat, timeZone),
    date: createDateFormat(options.dateFormat ?? DEFAULT_CONFIG.dateFormat, timeZone),
    timeZone,
    rotation: {
      enabled: options.rotation?.enabled ?? DEFAULT_CONFIG.rotation.enabled,
      retentionMs: options.rotation?.retentionMs ?? DEFAULT_CONFIG.rotation.retentionMs,
      sweepIntervalMs: options.rotation?.sweepIntervalMs ?? DEFAULT_CONFIG.rotation.sweepIntervalMs,
    },
    queue: {
      capacity: options.queue?.capacity ?? DEFAULT_CONFIG.queue.capacity,
      backpressure: options.queue?.backpressure ?? DEFAULT_CONFIG.queue.backpressure,
    },
    fileSystem: sinkCache?.fileSystem ?? options.fileSystem ?? new NodeFileSystem(),
    clock: options.clock ?? systemClock,
    diagnostics: options.diagnostics ?? new ConsoleLogger(name),
    stdout: options.stdout ?? ((text) => process.stdout.write(`${text}\n`)),
    sinkCache,
    signal: options.signal,
  };
}
