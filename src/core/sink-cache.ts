/**
 * SinkCache: open append sinks keyed by absolute path.
 *
 * Several severities may resolve to the same file; they share one handle, counted per holder.
 * A handle is flushed and closed when its last holder releases it.
 *
 * All methods except `withLock` expect the caller to hold the cache's mutex; the engine takes
 * it around every write, rotation, sweep and shutdown step that touches shared handles.
 */

import { dirname, resolve, sep } from "node:path";
import type { AppendSink, FileSystem } from "../interfaces/file-system.js";
import { Mutex } from "./mutex.js";

interface CacheEntry {
  sink: AppendSink;
  holders: number;
}

export class SinkCache {
  readonly fileSystem: FileSystem;
  private readonly mutex = new Mutex();
  private readonly entries = new Map<string, CacheEntry>();

  constructor(fileSystem: FileSystem) {
    this.fileSystem = fileSystem;
  }

  withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.mutex.runExclusive(fn);
  }

  /** Return the sink for `path`, opening it (and creating its directory) on first use. */
  async acquire(path: string): Promise<AppendSink> {
    const key = resolve(path);
    const existing = this.entries.get(key);
    if (existing) {
      existing.holders++;
      return existing.sink;
    }

    const directory = dirname(key);
    if (!(await this.fileSystem.exists(directory))) {
      await this.fileSystem.createDirectories(directory);
    }
    const sink = await this.fileSystem.openAppendSink(key);
    this.entries.set(key, { sink, holders: 1 });
    return sink;
  }

  /** Drop one hold on `path`; the last release flushes, closes and forgets the handle. */
  async release(path: string): Promise<void> {
    const key = resolve(path);
    const entry = this.entries.get(key);
    if (!entry) return;

    entry.holders--;
    if (entry.holders > 0) return;

    try {
      await entry.sink.close();
    } finally {
      this.entries.delete(key);
    }
  }

  /**
   * Flush and close every open sink. Failures do not stop the remaining closes;
   * they are returned so the caller can report them.
   */
  async closeAll(): Promise<Array<{ path: string; error: unknown }>> {
    const failures: Array<{ path: string; error: unknown }> = [];
    const entries = [...this.entries.entries()];
    this.entries.clear();

    for (const [path, entry] of entries) {
      try {
        await entry.sink.close();
      } catch (error) {
        failures.push({ path, error });
      }
    }
    return failures;
  }

  has(path: string): boolean {
    return this.entries.has(resolve(path));
  }

  /** Whether any open sink lives inside `directory`. */
  hasUnder(directory: string): boolean {
    const prefix = resolve(directory) + sep;
    for (const key of this.entries.keys()) {
      if (key.startsWith(prefix)) return true;
    }
    return false;
  }

  holders(path: string): number {
    return this.entries.get(resolve(path))?.holders ?? 0;
  }

  get size(): number {
    return this.entries.size;
  }
}
