import { describe, expect, it, vi } from "vitest";
import { MemoryFileSystem } from "../adapters/memory-file-system.js";
import { ConfigError } from "../errors.js";
import { defaultMessageFormat } from "../types/config.js";
import { Ansi } from "../utils/ansi.js";
import { createDateFormat } from "../utils/date-format.js";
import { type StrategyConfig, SeverityStrategy } from "./severity-strategy.js";
import { SinkCache } from "./sink-cache.js";

const OCT_19 = new Date(Date.UTC(2026, 9, 19, 8, 30, 15, 42));
const OCT_20 = new Date(Date.UTC(2026, 9, 20, 0, 0, 1, 0));

function setup(overrides: Partial<StrategyConfig> = {}) {
  const fs = new MemoryFileSystem();
  const sinks = new SinkCache(fs);
  const stdout: string[] = [];
  const diagnostics = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const config: StrategyConfig = {
    name: "test",
    directory: (key) => `/logs/${key}`,
    file: (directory, severity) => `${directory}/${severity}.log`,
    message: defaultMessageFormat,
    time: createDateFormat("HH:mm:ss.SSS"),
    date: createDateFormat("dd.MM.yyyy"),
    stdout: (text) => {
      stdout.push(text);
    },
    diagnostics,
    ...overrides,
  };
  return { fs, sinks, stdout, diagnostics, config };
}

describe("SeverityStrategy", () => {
  it("rejects a blank name", () => {
    const { config, sinks } = setup();
    expect(() => new SeverityStrategy({ name: "  ", color: Ansi.RED }, config, sinks)).toThrow(
      ConfigError,
    );
  });

  it("names the file after the lower-case severity", () => {
    const { config, sinks } = setup();
    const info = new SeverityStrategy({ name: "INFO", color: Ansi.CYAN }, config, sinks);
    expect(info.pathFor("19.10.2026")).toBe("/logs/19.10.2026/info.log");
  });

  it("echoes the coloured entry and appends the plain entry", async () => {
    const { config, sinks, fs, stdout } = setup();
    const info = new SeverityStrategy({ name: "INFO", color: Ansi.CYAN }, config, sinks);

    await info.write(OCT_19, true, ["hello &2world"]);

    expect(stdout).toEqual([
      `[08:30:15.042] - ${Ansi.CYAN}INFO${Ansi.RESET} - test - hello ${Ansi.GREEN}world`,
    ]);
    expect(fs.readLines("/logs/19.10.2026/info.log")).toEqual([
      "[08:30:15.042] - INFO - test - hello world",
    ]);
  });

  it("does not echo when asked not to", async () => {
    const { config, sinks, fs, stdout } = setup();
    const info = new SeverityStrategy({ name: "INFO", color: Ansi.CYAN }, config, sinks);

    await info.write(OCT_19, false, ["quiet"]);

    expect(stdout).toEqual([]);
    expect(fs.readLines("/logs/19.10.2026/info.log")).toEqual([
      "[08:30:15.042] - INFO - test - quiet",
    ]);
  });

  it("repeats the prefix on every line of a multi-line entry", async () => {
    const { config, sinks, fs } = setup();
    const warn = new SeverityStrategy({ name: "WARN", color: Ansi.YELLOW }, config, sinks);

    await warn.write(OCT_19, false, ["a", "b\nc"]);

    expect(fs.readLines("/logs/19.10.2026/warn.log")).toEqual([
      "[08:30:15.042] - WARN - test - a",
      "[08:30:15.042] - WARN - test - b",
      "[08:30:15.042] - WARN - test - c",
    ]);
  });

  it("moves to a new file when the period changes", async () => {
    const { config, sinks, fs } = setup();
    const info = new SeverityStrategy({ name: "INFO", color: Ansi.CYAN }, config, sinks);

    await info.write(OCT_19, false, ["first"]);
    expect(info.periodKey).toBe("19.10.2026");

    await info.write(OCT_20, false, ["second"]);

    expect(info.periodKey).toBe("20.10.2026");
    expect(info.path).toBe("/logs/20.10.2026/info.log");
    expect(fs.closeCount("/logs/19.10.2026/info.log")).toBe(1);
    expect(sinks.has("/logs/19.10.2026/info.log")).toBe(false);
    expect(fs.readLines("/logs/20.10.2026/info.log")).toEqual([
      "[00:00:01.000] - INFO - test - second",
    ]);
  });

  it("shares one handle between severities writing the same file", async () => {
    const { config, sinks, fs } = setup({ file: (directory) => `${directory}/all.log` });
    const info = new SeverityStrategy({ name: "INFO", color: Ansi.CYAN }, config, sinks);
    const error = new SeverityStrategy({ name: "ERROR", color: Ansi.RED }, config, sinks);

    await Promise.all([info.write(OCT_19, false, ["one"]), error.write(OCT_19, false, ["two"])]);

    expect(fs.openCount("/logs/19.10.2026/all.log")).toBe(1);
    expect(sinks.holders("/logs/19.10.2026/all.log")).toBe(2);
    expect(fs.readLines("/logs/19.10.2026/all.log")).toEqual([
      "[08:30:15.042] - INFO - test - one",
      "[08:30:15.042] - ERROR - test - two",
    ]);

    await sinks.withLock(() => info.releaseSink());
    expect(fs.closeCount("/logs/19.10.2026/all.log")).toBe(0);
  });

  it("gives the sink back after a write with release", async () => {
    const { config, sinks, fs } = setup();
    const info = new SeverityStrategy({ name: "INFO", color: Ansi.CYAN }, config, sinks);

    await info.write(OCT_19, false, ["late"], { release: true });

    expect(info.path).toBeNull();
    expect(sinks.size).toBe(0);
    expect(fs.closeCount("/logs/19.10.2026/info.log")).toBe(1);
    expect(fs.readLines("/logs/19.10.2026/info.log")).toHaveLength(1);
  });

  it("reports write failures without rejecting", async () => {
    const { config, sinks, fs, diagnostics } = setup();
    const error = new SeverityStrategy({ name: "ERROR", color: Ansi.RED }, config, sinks);
    fs.failWrites(() => true);

    await expect(error.write(OCT_19, false, ["lost"])).resolves.toBeUndefined();

    expect(diagnostics.error).toHaveBeenCalledWith(
      "Log write error",
      expect.objectContaining({ severity: "ERROR", path: "/logs/19.10.2026/error.log" }),
    );
  });

  it("reports a throwing formatter without rejecting", async () => {
    const { config, sinks, diagnostics } = setup({
      message: () => {
        throw new Error("bad format");
      },
    });
    const info = new SeverityStrategy({ name: "INFO", color: Ansi.CYAN }, config, sinks);

    await info.write(OCT_19, false, ["x"]);

    expect(diagnostics.error).toHaveBeenCalledWith(
      "Log write error",
      expect.objectContaining({ severity: "INFO" }),
    );
  });

  describe("toLines", () => {
    it("stringifies values for the default variant", () => {
      const { config, sinks } = setup();
      const info = new SeverityStrategy({ name: "INFO", color: Ansi.CYAN }, config, sinks);

      expect(info.toLines(["a", 1, new TypeError("bad"), { a: 1 }, null])).toEqual([
        "a",
        "1",
        "TypeError: bad",
        '{"a":1}',
        "null",
      ]);
    });

    it("expands errors and their causes for the stack-trace variant", () => {
      const { config, sinks } = setup();
      const trace = new SeverityStrategy(
        { name: "STACKTRACE", color: Ansi.BOLD_RED, variant: "stack-trace" },
        config,
        sinks,
      );
      const root = new RangeError("disk full");
      const error = new Error("write failed", { cause: root });

      const lines = trace.toLines(["context", error]);

      expect(lines[0]).toBe("context");
      expect(lines[1]).toBe(
        `----------- ${Ansi.BOLD_RED}STACKTRACE BEGIN${Ansi.RESET} -----------`,
      );
      expect(lines.slice(2, 5)).toEqual([
        "From (Logger Name): test",
        "Exception: Error",
        "Message: write failed",
      ]);
      expect(lines[5]).toMatch(/^At: .+/);
      expect(lines[5]).not.toBe("At: N/A");
      expect(lines.slice(6)).toEqual([
        "Caused by: RangeError",
        "Message: disk full",
        `-----------  ${Ansi.BOLD_RED}STACKTRACE END${Ansi.RESET}  -----------`,
      ]);
    });

    it("stops at a cause cycle and fills in missing details", () => {
      const { config, sinks } = setup();
      const trace = new SeverityStrategy(
        { name: "STACKTRACE", color: Ansi.BOLD_RED, variant: "stack-trace" },
        config,
        sinks,
      );
      const a = new Error("");
      const b = new Error("b", { cause: a });
      a.cause = b;
      a.stack = undefined;

      const lines = trace.toLines([a]);

      expect(lines.slice(1, -1)).toEqual([
        "From (Logger Name): test",
        "Exception: Error",
        "Message: N/A",
        "At: N/A",
        "Caused by: Error",
        "Message: b",
      ]);
    });
  });
});
