/**
 * Filesystem provider consumed by the engine.
 * NodeFileSystem backs it with node:fs; MemoryFileSystem keeps everything in process for tests.
 * @module
 */

/** One child of a listed directory. */
export interface DirectoryEntry {
  name: string;
  /** Full path of the entry (parent joined with name). */
  path: string;
  isDirectory: boolean;
}

/**
 * Open, buffered, append-mode file handle.
 * `write` only buffers; nothing reaches the file until `flush`.
 */
export interface AppendSink {
  readonly path: string;
  write(text: string): void;
  flush(): Promise<void>;
  /** Flushes pending text, then releases the handle. Further writes are rejected. */
  close(): Promise<void>;
}

export interface FileSystem {
  exists(path: string): Promise<boolean>;
  /** Creates the directory and any missing parents. No-op when it already exists. */
  createDirectories(path: string): Promise<void>;
  /** Lists direct children. Returns an empty list when the directory does not exist. */
  list(path: string): Promise<DirectoryEntry[]>;
  deleteRecursively(path: string): Promise<void>;
  openAppendSink(path: string): Promise<AppendSink>;
}
