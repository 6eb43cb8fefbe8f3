/**
 * RotationClock: periodic retention sweep over dated log directories.
 *
 * stopped → running → stopping → stopped. While running it sweeps once on start and then
 * every `sweepIntervalMs`. A sweep lists the log root (the parent of today's directory) and
 * deletes every directory whose name parses as a date older than `now - retentionMs`.
 * Names that do not parse are not rotation candidates. A directory that still holds an open
 * sink is kept until a later sweep finds it released. `stop()` cancels the pending timer
 * and waits for a sweep in flight.
 */

import { dirname, resolve } from "node:path";
import type { Clock } from "../interfaces/clock.js";
import type { DirectoryEntry, FileSystem } from "../interfaces/file-system.js";
import type { Logger } from "../interfaces/logger.js";
import type { DateFormat } from "../utils/date-format.js";
import type { SinkCache } from "./sink-cache.js";

export type RotationClockState = "stopped" | "running" | "stopping";

export interface RotationClockDeps {
  fileSystem: FileSystem;
  clock: Clock;
  date: DateFormat;
  directory: (periodKey: string) => string;
  retentionMs: number;
  sweepIntervalMs: number;
  sinks: SinkCache;
  diagnostics: Logger;
  /** Aborting stops the clock. */
  signal?: AbortSignal;
}

export class RotationClock {
  private current: RotationClockState = "stopped";
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(private readonly deps: RotationClockDeps) {
    deps.signal?.addEventListener(
      "abort",
      () => {
        void this.stop();
      },
      { once: true },
    );
  }

  get state(): RotationClockState {
    return this.current;
  }

  start(): void {
    if (this.current !== "stopped" || this.deps.signal?.aborted) return;
    this.current = "running";
    this.tick();
  }

  stop(): Promise<void> {
    if (this.current === "stopped") return Promise.resolve();
    if (this.stopping) return this.stopping;

    this.current = "stopping";
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    this.stopping = (async () => {
      if (this.inFlight) await this.inFlight;
      this.current = "stopped";
      this.stopping = null;
    })();
    return this.stopping;
  }

  /** Delete expired period directories. Returns the deleted paths. */
  sweep(now: Date = this.deps.clock.now()): Promise<string[]> {
    const { fileSystem, date, diagnostics, sinks } = this.deps;
    const threshold = now.getTime() - this.deps.retentionMs;
    const todayKey = date.format(now);
    const root = dirname(resolve(this.deps.directory(todayKey)));

    return sinks.withLock(async () => {
      const deleted: string[] = [];
      let entries: DirectoryEntry[];
      try {
        entries = await fileSystem.list(root);
      } catch (error) {
        diagnostics.error("Log rotation sweep failed", { root, error });
        return deleted;
      }

      for (const entry of entries) {
        if (!entry.isDirectory || entry.name === todayKey) continue;

        const dirDate = date.parse(entry.name);
        if (!dirDate || dirDate.getTime() >= threshold) continue;
        if (sinks.hasUnder(entry.path)) {
          diagnostics.debug?.("Kept expired log directory with open sinks", { path: entry.path });
          continue;
        }

        try {
          await fileSystem.deleteRecursively(entry.path);
          deleted.push(entry.path);
        } catch (error) {
          diagnostics.error("Failed to delete expired log directory", { path: entry.path, error });
        }
      }
      return deleted;
    });
  }

  private tick(): void {
    if (this.current !== "running") return;

    this.inFlight = this.sweep()
      .then((deleted) => {
        if (deleted.length > 0) {
          this.deps.diagnostics.debug?.("Removed expired log directories", { deleted });
        }
      })
      .finally(() => {
        this.inFlight = null;
        this.schedule();
      });
  }

  private schedule(): void {
    if (this.current !== "running") return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick();
    }, this.deps.sweepIntervalMs);
    this.timer.unref();
  }
}
