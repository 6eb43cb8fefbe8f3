import type { FileHandle } from "node:fs/promises";
import { access, mkdir, open, readdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { errorMessage, SinkError } from "../errors.js";
import type { AppendSink, DirectoryEntry, FileSystem } from "../interfaces/file-system.js";

/**
 * Append sink over a Node file handle opened with flag "a".
 * Writes are buffered in memory and handed to the OS in a single append per flush,
 * so one flushed message is never split by another writer of the same handle.
 */
class NodeAppendSink implements AppendSink {
  private pending: string[] = [];
  private closed = false;

  constructor(
    readonly path: string,
    private readonly handle: FileHandle,
  ) {}

  write(text: string): void {
    if (this.closed) throw new SinkError(`Sink is closed: ${this.path}`, this.path);
    this.pending.push(text);
  }

  async flush(): Promise<void> {
    if (this.pending.length === 0) return;
    const data = this.pending.join("");
    this.pending = [];
    try {
      await this.handle.appendFile(data, "utf-8");
    } catch (err) {
      throw new SinkError(`Failed to write ${this.path}: ${errorMessage(err)}`, this.path, {
        cause: err,
      });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.flush();
    } finally {
      await this.handle.close();
    }
  }
}

/** FileSystem backed by node:fs/promises. */
export class NodeFileSystem implements FileSystem {
  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  async createDirectories(path: string): Promise<void> {
    await mkdir(path, { recursive: true });
  }

  async list(path: string): Promise<DirectoryEntry[]> {
    try {
      const entries = await readdir(path, { withFileTypes: true });
      return entries.map((entry) => ({
        name: entry.name,
        path: join(path, entry.name),
        isDirectory: entry.isDirectory(),
      }));
    } catch (err) {
      // Missing root: nothing to list yet
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
      throw err;
    }
  }

  async deleteRecursively(path: string): Promise<void> {
    await rm(path, { recursive: true, force: true });
  }

  async openAppendSink(path: string): Promise<AppendSink> {
    try {
      return new NodeAppendSink(path, await open(path, "a"));
    } catch (err) {
      throw new SinkError(`Failed to open ${path}: ${errorMessage(err)}`, path, { cause: err });
    }
  }
}
