/**
 * LogEngine: the embeddable logging core.
 *
 * Call sites submit content for a severity; the engine wraps it in a LogMessage and queues it
 * for the consumer task, which writes it through the severity's strategy. Once shutdown has
 * begun, submissions bypass the queue and are written directly.
 *
 * Usage:
 *   const log = new LogEngine({ name: "api" });
 *   void log.info("listening on", port);
 *   await log.shutdown();
 */

import { resolve } from "node:path";
import { ConfigError } from "../errors.js";
import { type EngineOptions, type ResolvedConfig, resolveConfig } from "../types/config.js";
import { createLogMessage, type LogMessage } from "../types/log-message.js";
import { DEFAULT_SEVERITIES } from "./default-severities.js";
import { DispatchPipeline } from "./dispatch-pipeline.js";
import { gracefulExit } from "./graceful-exit.js";
import { RotationClock } from "./rotation-clock.js";
import { type SeverityDefinition, SeverityStrategy } from "./severity-strategy.js";
import { DEFAULT_SHUTDOWN_TIMEOUT_MS, ShutdownCoordinator } from "./shutdown-coordinator.js";
import { SinkCache } from "./sink-cache.js";

export class LogEngine {
  readonly config: ResolvedConfig;
  readonly sinks: SinkCache;

  readonly DEBUG: SeverityStrategy;
  readonly INFO: SeverityStrategy;
  readonly WARN: SeverityStrategy;
  readonly ERROR: SeverityStrategy;
  readonly FATAL: SeverityStrategy;
  readonly STACKTRACE: SeverityStrategy;

  private readonly strategies = new Map<string, SeverityStrategy>();
  private readonly controller = new AbortController();
  private readonly pipeline: DispatchPipeline;
  private readonly rotation: RotationClock | null;
  private readonly coordinator: ShutdownCoordinator;
  private readonly onCallerAbort = () => {
    void this.shutdown();
  };

  constructor(options: EngineOptions = {}) {
    this.config = resolveConfig(options);
    const { config } = this;

    this.sinks = config.sinkCache ?? new SinkCache(config.fileSystem);

    this.DEBUG = this.registerSeverity(DEFAULT_SEVERITIES.debug);
    this.INFO = this.registerSeverity(DEFAULT_SEVERITIES.info);
    this.WARN = this.registerSeverity(DEFAULT_SEVERITIES.warn);
    this.ERROR = this.registerSeverity(DEFAULT_SEVERITIES.error);
    this.FATAL = this.registerSeverity(DEFAULT_SEVERITIES.fatal);
    this.STACKTRACE = this.registerSeverity(DEFAULT_SEVERITIES.stackTrace);

    this.pipeline = new DispatchPipeline(
      { ...config.queue, diagnostics: config.diagnostics },
      (message) => this.persist(message),
    );

    this.rotation = config.rotation.enabled
      ? new RotationClock({
          fileSystem: config.fileSystem,
          clock: config.clock,
          date: config.date,
          directory: config.directory,
          retentionMs: config.rotation.retentionMs,
          sweepIntervalMs: config.rotation.sweepIntervalMs,
          sinks: this.sinks,
          diagnostics: config.diagnostics,
          signal: this.controller.signal,
        })
      : null;

    this.coordinator = new ShutdownCoordinator({
      pipeline: this.pipeline,
      rotation: this.rotation,
      sinks: this.sinks,
      ownsSinkCache: config.sinkCache === undefined,
      strategies: () => this.strategies.values(),
      stdout: config.stdout,
      diagnostics: config.diagnostics,
      controller: this.controller,
    });

    void this.prepareToday();
    this.rotation?.start();

    if (config.signal?.aborted) {
      void this.shutdown();
    } else {
      config.signal?.addEventListener("abort", this.onCallerAbort, { once: true });
    }
  }

  /** Aborted once shutdown has closed every sink. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isShuttingDown(): boolean {
    return this.coordinator.isShuttingDown;
  }

  /** Add a severity. Names are unique regardless of case. */
  registerSeverity(definition: SeverityDefinition): SeverityStrategy {
    const key = definition.name.trim().toUpperCase();
    if (this.strategies.has(key)) {
      throw new ConfigError(`Severity already registered: ${definition.name}`);
    }
    const strategy = new SeverityStrategy(definition, this.config, this.sinks);
    this.strategies.set(key, strategy);
    return strategy;
  }

  severity(name: string): SeverityStrategy | undefined {
    return this.strategies.get(name.trim().toUpperCase());
  }

  /** Queue content for a severity. Resolves once the message is queued, not written. */
  async submit(
    severity: SeverityStrategy | string,
    echoToConsole: boolean,
    ...content: unknown[]
  ): Promise<void> {
    return this.log(this.createMessage(severity, echoToConsole, content));
  }

  /** Write content for a severity immediately, bypassing the queue. Resolves once written. */
  async submitSync(
    severity: SeverityStrategy | string,
    echoToConsole: boolean,
    ...content: unknown[]
  ): Promise<void> {
    return this.logSync(this.createMessage(severity, echoToConsole, content));
  }

  async log(message: LogMessage): Promise<void> {
    if (this.coordinator.isShuttingDown) return this.writeDirect(message);

    const result = await this.pipeline.enqueue(message);
    if (result === "closed") await this.writeDirect(message);
  }

  logSync(message: LogMessage): Promise<void> {
    return this.writeDirect(message);
  }

  debug(...content: unknown[]): Promise<void> {
    return this.submit(this.DEBUG, true, ...content);
  }

  info(...content: unknown[]): Promise<void> {
    return this.submit(this.INFO, true, ...content);
  }

  warn(...content: unknown[]): Promise<void> {
    return this.submit(this.WARN, true, ...content);
  }

  error(...content: unknown[]): Promise<void> {
    return this.submit(this.ERROR, true, ...content);
  }

  fatal(...content: unknown[]): Promise<void> {
    return this.submit(this.FATAL, true, ...content);
  }

  /** Errors among the content are expanded into a stack-trace block. */
  stackTrace(...content: unknown[]): Promise<void> {
    return this.submit(this.STACKTRACE, true, ...content);
  }

  debugSync(...content: unknown[]): Promise<void> {
    return this.submitSync(this.DEBUG, true, ...content);
  }

  infoSync(...content: unknown[]): Promise<void> {
    return this.submitSync(this.INFO, true, ...content);
  }

  warnSync(...content: unknown[]): Promise<void> {
    return this.submitSync(this.WARN, true, ...content);
  }

  errorSync(...content: unknown[]): Promise<void> {
    return this.submitSync(this.ERROR, true, ...content);
  }

  fatalSync(...content: unknown[]): Promise<void> {
    return this.submitSync(this.FATAL, true, ...content);
  }

  /** Resolves once every message queued so far has been written. */
  flush(): Promise<void> {
    return this.pipeline.idle();
  }

  async shutdown(timeoutMs: number = DEFAULT_SHUTDOWN_TIMEOUT_MS): Promise<void> {
    this.config.signal?.removeEventListener("abort", this.onCallerAbort);
    await this.coordinator.shutdown(timeoutMs);
  }

  /** Shut down, then exit the process with `status` even if shutdown fails. */
  exitProcess(status = 0, timeoutMs: number = DEFAULT_SHUTDOWN_TIMEOUT_MS): Promise<void> {
    return gracefulExit(this, status, timeoutMs, this.config.diagnostics);
  }

  private createMessage(
    severity: SeverityStrategy | string,
    echoToConsole: boolean,
    content: readonly unknown[],
  ): LogMessage {
    const strategy = typeof severity === "string" ? this.requireSeverity(severity) : severity;
    const lines = strategy.toLines(content);
    return createLogMessage(strategy, lines, echoToConsole, this.config.clock.now());
  }

  private requireSeverity(name: string): SeverityStrategy {
    const strategy = this.severity(name);
    if (!strategy) throw new ConfigError(`Unknown severity: ${name}`);
    return strategy;
  }

  private persist(message: LogMessage, release = false): Promise<void> {
    return message.severity.write(message.createdAt, message.echoToConsole, message.lines, {
      release,
    });
  }

  /** Writes issued once shutdown has begun give their sink back, so nothing stays open. */
  private writeDirect(message: LogMessage): Promise<void> {
    return this.coordinator.track(this.persist(message, this.coordinator.isShuttingDown));
  }

  private async prepareToday(): Promise<void> {
    const periodKey = this.config.date.format(this.config.clock.now());
    const directory = resolve(this.config.directory(periodKey));
    await this.sinks.withLock(async () => {
      try {
        if (!(await this.config.fileSystem.exists(directory))) {
          await this.config.fileSystem.createDirectories(directory);
        }
      } catch (error) {
        this.config.diagnostics.error("Failed to create log directory", { directory, error });
      }
    });
  }
}
