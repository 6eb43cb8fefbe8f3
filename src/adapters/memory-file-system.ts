import { posix } from "node:path";
import { SinkError } from "../errors.js";
import type { AppendSink, DirectoryEntry, FileSystem } from "../interfaces/file-system.js";

/**
 * In-memory FileSystem for tests and ephemeral use.
 * Paths are POSIX and resolved against "/".
 *
 * Test hooks:
 * - `holdWrites()` parks every flush until the returned release function is called.
 * - `failWrites(predicate)` makes flushes to matching paths throw a SinkError.
 */
export class MemoryFileSystem implements FileSystem {
  private files = new Map<string, string>();
  private directories = new Set<string>(["/"]);
  private writeFailure: ((path: string) => boolean) | null = null;
  private writeGate: Promise<void> | null = null;
  private closeCounts = new Map<string, number>();
  private openCounts = new Map<string, number>();

  private normalize(path: string): string {
    return posix.resolve("/", path);
  }

  async exists(path: string): Promise<boolean> {
    const key = this.normalize(path);
    return this.directories.has(key) || this.files.has(key);
  }

  async createDirectories(path: string): Promise<void> {
    let current = this.normalize(path);
    while (!this.directories.has(current)) {
      if (this.files.has(current)) {
        throw new Error(`Not a directory: ${current}`);
      }
      this.directories.add(current);
      current = posix.dirname(current);
    }
  }

  async list(path: string): Promise<DirectoryEntry[]> {
    const key = this.normalize(path);
    if (!this.directories.has(key)) return [];

    const entries: DirectoryEntry[] = [];
    for (const dir of this.directories) {
      if (dir !== key && posix.dirname(dir) === key) {
        entries.push({ name: posix.basename(dir), path: dir, isDirectory: true });
      }
    }
    for (const file of this.files.keys()) {
      if (posix.dirname(file) === key) {
        entries.push({ name: posix.basename(file), path: file, isDirectory: false });
      }
    }
    return entries.sort((a, b) => a.name.localeCompare(b.name));
  }

  async deleteRecursively(path: string): Promise<void> {
    const key = this.normalize(path);
    const prefix = key === "/" ? "/" : `${key}/`;
    for (const dir of [...this.directories]) {
      if (dir === key || dir.startsWith(prefix)) this.directories.delete(dir);
    }
    for (const file of [...this.files.keys()]) {
      if (file === key || file.startsWith(prefix)) this.files.delete(file);
    }
    this.directories.add("/");
  }

  async openAppendSink(path: string): Promise<AppendSink> {
    const key = this.normalize(path);
    if (!this.directories.has(posix.dirname(key))) {
      throw new SinkError(`Failed to open ${key}: parent directory does not exist`, key);
    }
    if (!this.files.has(key)) this.files.set(key, "");
    this.openCounts.set(key, (this.openCounts.get(key) ?? 0) + 1);
    return new MemoryAppendSink(key, this);
  }

  // ── Sink callbacks ──

  /** @internal */
  async commit(path: string, data: string): Promise<void> {
    while (this.writeGate) await this.writeGate;
    if (this.writeFailure?.(path)) {
      throw new SinkError(`Failed to write ${path}: injected failure`, path);
    }
    this.files.set(path, (this.files.get(path) ?? "") + data);
  }

  /** @internal */
  recordClose(path: string): void {
    this.closeCounts.set(path, (this.closeCounts.get(path) ?? 0) + 1);
  }

  // ── Test helpers ──

  readFile(path: string): string | undefined {
    return this.files.get(this.normalize(path));
  }

  /** Lines of a file without the trailing empty line. */
  readLines(path: string): string[] {
    const content = this.readFile(path);
    if (!content) return [];
    return content.split("\n").slice(0, -1);
  }

  async writeFile(path: string, content: string): Promise<void> {
    const key = this.normalize(path);
    await this.createDirectories(posix.dirname(key));
    this.files.set(key, content);
  }

  failWrites(predicate: ((path: string) => boolean) | null): void {
    this.writeFailure = predicate;
  }

  holdWrites(): () => void {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.writeGate = gate;
    return () => {
      if (this.writeGate === gate) this.writeGate = null;
      release();
    };
  }

  /** Number of times a sink for `path` was opened. */
  openCount(path: string): number {
    return this.openCounts.get(this.normalize(path)) ?? 0;
  }

  /** Number of times a sink for `path` was closed. */
  closeCount(path: string): number {
    return this.closeCounts.get(this.normalize(path)) ?? 0;
  }

  get filePaths(): string[] {
    return [...this.files.keys()].sort();
  }
}

class MemoryAppendSink implements AppendSink {
  private pending: string[] = [];
  private closed = false;

  constructor(
    readonly path: string,
    private readonly fs: MemoryFileSystem,
  ) {}

  write(text: string): void {
    if (this.closed) throw new SinkError(`Sink is closed: ${this.path}`, this.path);
    this.pending.push(text);
  }

  async flush(): Promise<void> {
    if (this.pending.length === 0) return;
    const data = this.pending.join("");
    this.pending = [];
    await this.fs.commit(this.path, data);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.fs.recordClose(this.path);
    await this.flush();
  }
}
