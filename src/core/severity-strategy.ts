/**
 * SeverityStrategy: formats and persists messages for one severity.
 *
 * Each strategy tracks the period key it last wrote to and the sink for that period.
 * When a message belongs to a new period the strategy releases its old sink and acquires
 * the file for the new one. Rotation, console echo and the file append all run under the
 * sink cache lock, so writes from every severity are serialized.
 */

import type { AppendSink } from "../interfaces/file-system.js";
import { ConfigError } from "../errors.js";
import type { ResolvedConfig } from "../types/config.js";
import { Ansi, toDisplay, toPlain } from "../utils/ansi.js";
import { stringifyContent } from "../utils/stringify-content.js";
import type { SinkCache } from "./sink-cache.js";

export type StrategyVariant = "default" | "stack-trace";

export interface SeverityDefinition {
  /** Label printed on each line; its lower-case form names the file. */
  name: string;
  /** ANSI sequence wrapped around the label on the console. */
  color: string;
  variant?: StrategyVariant;
}

export type StrategyConfig = Pick<
  ResolvedConfig,
  "name" | "directory" | "file" | "message" | "time" | "date" | "stdout" | "diagnostics"
>;

export interface WriteOptions {
  /** Give the sink back to the cache once the write is done (used after shutdown). */
  release?: boolean;
}

const STACK_BEGIN = `----------- ${Ansi.BOLD_RED}STACKTRACE BEGIN${Ansi.RESET} -----------`;
const STACK_END = `-----------  ${Ansi.BOLD_RED}STACKTRACE END${Ansi.RESET}  -----------`;

export class SeverityStrategy {
  readonly name: string;
  readonly color: string;
  readonly variant: StrategyVariant;

  private currentPeriodKey: string | null = null;
  private currentPath: string | null = null;
  private sink: AppendSink | null = null;

  constructor(
    definition: SeverityDefinition,
    private readonly config: StrategyConfig,
    private readonly sinks: SinkCache,
  ) {
    if (definition.name.trim().length === 0) {
      throw new ConfigError("Severity name must not be blank");
    }
    this.name = definition.name;
    this.color = definition.color;
    this.variant = definition.variant ?? "default";
  }

  /** Period key of the file currently open for this severity, if any. */
  get periodKey(): string | null {
    return this.currentPeriodKey;
  }

  /** Path of the file currently open for this severity, if any. */
  get path(): string | null {
    return this.currentPath;
  }

  /** Target file for a period key. */
  pathFor(periodKey: string): string {
    return this.config.file(this.config.directory(periodKey), this.name.toLowerCase());
  }

  /** Convert submitted values into message lines. */
  toLines(content: readonly unknown[]): string[] {
    if (this.variant === "default") return content.map(stringifyContent);

    const lines: string[] = [];
    for (const value of content) {
      if (value instanceof Error) {
        lines.push(...this.describeError(value));
      } else {
        lines.push(stringifyContent(value));
      }
    }
    return lines;
  }

  /** Format an entry with the coloured label; `&` markers are left untranslated. */
  render(timestamp: Date, lines: readonly string[]): string {
    return this.config.message(
      this.config.time.format(timestamp),
      `${this.color}${this.name}${Ansi.RESET}`,
      this.config.name,
      lines,
    );
  }

  /**
   * Persist one entry. Formatting and I/O failures are reported to diagnostics, never rejected.
   * The lock is requested before the first await, so calls are written in call order.
   */
  async write(
    timestamp: Date,
    echoToConsole: boolean,
    lines: readonly string[],
    options: WriteOptions = {},
  ): Promise<void> {
    const periodKey = this.config.date.format(timestamp);

    await this.sinks.withLock(async () => {
      try {
        const display = toDisplay(this.render(timestamp, lines));
        const plain = toPlain(display);
        const sink = await this.rotateIfNeeded(periodKey);
        if (echoToConsole) this.config.stdout(display);
        sink.write(`${plain}\n`);
        await sink.flush();
      } catch (error) {
        this.config.diagnostics.error("Log write error", {
          severity: this.name,
          path: this.currentPath,
          error,
        });
      }

      if (options.release) await this.releaseSink();
    });
  }

  /** Release this strategy's sink. The caller must hold the sink cache lock. */
  async releaseSink(): Promise<void> {
    const path = this.currentPath;
    this.currentPeriodKey = null;
    this.currentPath = null;
    this.sink = null;
    if (path === null) return;

    try {
      await this.sinks.release(path);
    } catch (error) {
      this.config.diagnostics.warn("Failed to close log sink", {
        severity: this.name,
        path,
        error,
      });
    }
  }

  /** Forget the current sink without closing it; used after the cache closed every handle. */
  detach(): void {
    this.currentPeriodKey = null;
    this.currentPath = null;
    this.sink = null;
  }

  private async rotateIfNeeded(periodKey: string): Promise<AppendSink> {
    if (this.sink && this.currentPeriodKey === periodKey) return this.sink;

    await this.releaseSink();

    const path = this.pathFor(periodKey);
    const sink = await this.sinks.acquire(path);
    this.currentPeriodKey = periodKey;
    this.currentPath = path;
    this.sink = sink;
    return sink;
  }

  private describeError(error: Error): string[] {
    const lines = [STACK_BEGIN, `From (Logger Name): ${this.config.name}`];
    lines.push(`Exception: ${error.name}`);
    lines.push(`Message: ${error.message || "N/A"}`);
    lines.push(`At: ${firstFrame(error) ?? "N/A"}`);

    const seen = new Set<unknown>([error]);
    let cause = error.cause;
    while (cause !== undefined && cause !== null && !seen.has(cause)) {
      seen.add(cause);
      if (cause instanceof Error) {
        lines.push(`Caused by: ${cause.name}`);
        lines.push(`Message: ${cause.message || "N/A"}`);
        cause = cause.cause;
      } else {
        lines.push(`Caused by: ${stringifyContent(cause)}`);
        break;
      }
    }

    lines.push(STACK_END);
    return lines;
  }
}

function firstFrame(error: Error): string | null {
  const frame = error.stack?.split("\n").find((line) => line.trimStart().startsWith("at "));
  return frame ? frame.trim().slice(3) : null;
}
