import { describe, expect, it } from "vitest";
import { MemoryFileSystem } from "../adapters/memory-file-system.js";
import { SinkCache } from "../core/sink-cache.js";
import { ConfigError } from "../errors.js";
import { DEFAULT_CONFIG, defaultMessageFormat, resolveConfig } from "../types/config.js";

describe("config validation", () => {
  it("accepts an empty config", () => {
    const config = resolveConfig();
    expect(config.name).toBe("logroll");
  });

  it("applies defaults for omitted fields", () => {
    const config = resolveConfig({ name: "billing" });
    expect(config.rotation).toEqual(DEFAULT_CONFIG.rotation);
    expect(config.queue.capacity).toBe(Number.POSITIVE_INFINITY);
    expect(config.queue.backpressure).toBe("block");
    expect(config.timeZone).toBe("utc");
    expect(config.time.pattern).toBe("HH:mm:ss.SSS");
    expect(config.date.pattern).toBe("dd.MM.yyyy");
  });

  it("merges partial rotation options", () => {
    const config = resolveConfig({ rotation: { enabled: false } });
    expect(config.rotation.enabled).toBe(false);
    expect(config.rotation.retentionMs).toBe(DEFAULT_CONFIG.rotation.retentionMs);
  });

  it("uses the default directory layout", () => {
    const config = resolveConfig();
    expect(config.file(config.directory("19.10.2026"), "info")).toBe("logs/19.10.2026/info.log");
  });

  it("rejects a blank name", () => {
    expect(() => resolveConfig({ name: "   " })).toThrow(ConfigError);
    expect(() => resolveConfig({ name: "" })).toThrow("Invalid configuration");
  });

  it("rejects a non-positive queue capacity", () => {
    expect(() => resolveConfig({ queue: { capacity: 0 } })).toThrow("Invalid configuration");
    expect(() => resolveConfig({ queue: { capacity: -5 } })).toThrow("Invalid configuration");
  });

  it("rejects a fractional queue capacity", () => {
    expect(() => resolveConfig({ queue: { capacity: 2.5 } })).toThrow("Invalid configuration");
  });

  it("accepts an explicit Infinity capacity", () => {
    expect(resolveConfig({ queue: { capacity: Infinity } }).queue.capacity).toBe(Infinity);
  });

  it("rejects a non-positive retention", () => {
    expect(() => resolveConfig({ rotation: { retentionMs: 0 } })).toThrow("Invalid configuration");
    expect(() => resolveConfig({ rotation: { retentionMs: -1 } })).toThrow("Invalid configuration");
  });

  it("rejects a sweep interval setTimeout cannot represent", () => {
    expect(() => resolveConfig({ rotation: { sweepIntervalMs: 2 ** 31 } })).toThrow(
      "Invalid configuration",
    );
  });

  it("rejects an unknown backpressure mode", () => {
    expect(() =>
      resolveConfig({ queue: { backpressure: "spill" as unknown as "drop" } }),
    ).toThrow("Invalid configuration");
  });

  it("rejects a non-function directory", () => {
    expect(() =>
      resolveConfig({ directory: "logs" as unknown as (key: string) => string }),
    ).toThrow("Invalid configuration");
  });

  it("takes the filesystem from a shared sink cache", () => {
    const fs = new MemoryFileSystem();
    const config = resolveConfig({ sinkCache: new SinkCache(fs) });
    expect(config.fileSystem).toBe(fs);
  });

  it("rejects a filesystem other than the shared sink cache's", () => {
    const sinkCache = new SinkCache(new MemoryFileSystem());
    expect(() => resolveConfig({ sinkCache, fileSystem: new MemoryFileSystem() })).toThrow(
      ConfigError,
    );
  });

  it("accepts the shared sink cache's own filesystem", () => {
    const fs = new MemoryFileSystem();
    const config = resolveConfig({ sinkCache: new SinkCache(fs), fileSystem: fs });
    expect(config.fileSystem).toBe(fs);
  });
});

describe("defaultMessageFormat", () => {
  it("prefixes a single line", () => {
    expect(defaultMessageFormat("04:05:06.007", "INFO", "api", ["ready"])).toBe(
      "[04:05:06.007] - INFO - api - ready",
    );
  });

  it("repeats the prefix for each line and embedded newline", () => {
    expect(defaultMessageFormat("t", "WARN", "api", ["a", "b\nc"])).toBe(
      "[t] - WARN - api - a\n[t] - WARN - api - b\n[t] - WARN - api - c",
    );
  });

  it("writes a bare prefix for an empty entry", () => {
    expect(defaultMessageFormat("t", "INFO", "api", [])).toBe("[t] - INFO - api - ");
  });
});
