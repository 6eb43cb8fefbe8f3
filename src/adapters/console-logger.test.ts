import { describe, expect, it } from "vitest";
import { SinkError } from "../errors.js";
import { ConsoleLogger } from "./console-logger.js";
import { LogLevel } from "./structured-logger.js";

function capture(tag?: string, level?: LogLevel) {
  const lines: string[] = [];
  const logger = new ConsoleLogger(tag, {
    level,
    writer: (line) => {
      lines.push(line);
    },
  });
  return { logger, lines };
}

describe("ConsoleLogger", () => {
  it("tags lines with the default name and the level", () => {
    const { logger, lines } = capture();

    logger.info("started");

    expect(lines).toEqual(["[logroll] INFO started"]);
  });

  it("uses a custom tag", () => {
    const { logger, lines } = capture("billing");

    logger.warn("slow disk");

    expect(lines).toEqual(["[billing] WARN slow disk"]);
  });

  it("hides debug output by default", () => {
    const { logger, lines } = capture();

    logger.debug("noise");
    logger.error("broken");

    expect(lines).toEqual(["[logroll] ERROR broken"]);
  });

  it("shows debug output when the level allows it", () => {
    const { logger, lines } = capture("api", LogLevel.DEBUG);

    logger.debug("Drained log queue after timeout", { drained: 3 });

    expect(lines).toEqual(["[api] DEBUG Drained log queue after timeout drained=3"]);
  });

  it("renders context as key=value pairs, quoting values with spaces", () => {
    const { logger, lines } = capture();

    logger.error("Log write error", {
      severity: "ERROR",
      path: "/logs/19.10.2026/error.log",
      error: new SinkError("disk full", "/logs/19.10.2026/error.log"),
      skipped: undefined,
    });

    expect(lines).toEqual([
      '[logroll] ERROR Log write error severity=ERROR path=/logs/19.10.2026/error.log error="SinkError: disk full"',
    ]);
  });

  it("serializes object context as JSON", () => {
    const { logger, lines } = capture();

    logger.info("Removed expired log directories", { deleted: ["/logs/a"] });

    expect(lines).toEqual([
      '[logroll] INFO Removed expired log directories deleted="[\\"/logs/a\\"]"',
    ]);
  });
});
