import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { gracefulExit, installShutdownHooks, type Shutdownable } from "./graceful-exit.js";

function target(shutdown: Shutdownable["shutdown"]) {
  return { shutdown: vi.fn(shutdown) };
}

describe("graceful exit", () => {
  let registeredHandlers: Map<string, (signal: NodeJS.Signals) => void>;
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.useFakeTimers();
    registeredHandlers = new Map();

    vi.spyOn(process, "on").mockImplementation(((event: string, handler: never) => {
      registeredHandlers.set(event, handler);
      return process;
    }) as never);
    vi.spyOn(process, "off").mockImplementation(((event: string) => {
      registeredHandlers.delete(event);
      return process;
    }) as never);

    exitSpy = vi.spyOn(process, "exit").mockImplementation((() => undefined) as never);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  describe("gracefulExit", () => {
    it("shuts down with the deadline, then exits with the status", async () => {
      const logger = target(async () => {});

      await gracefulExit(logger, 2, 750);

      expect(logger.shutdown).toHaveBeenCalledWith(750);
      expect(exitSpy).toHaveBeenCalledWith(2);
    });

    it("exits even when shutdown throws", async () => {
      const diagnostics = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const logger = target(async () => {
        throw new Error("stuck");
      });

      await gracefulExit(logger, 1, 100, diagnostics);

      expect(diagnostics.error).toHaveBeenCalledWith(
        "Logger shutdown failed",
        expect.objectContaining({ error: expect.any(Error) }),
      );
      expect(exitSpy).toHaveBeenCalledWith(1);
    });
  });

  describe("installShutdownHooks", () => {
    it("registers SIGTERM and SIGINT handlers", () => {
      installShutdownHooks(target(async () => {}));

      expect(registeredHandlers.has("SIGTERM")).toBe(true);
      expect(registeredHandlers.has("SIGINT")).toBe(true);
    });

    it("shuts down and exits 0 when a signal arrives", async () => {
      const logger = target(async () => {});
      installShutdownHooks(logger, { timeoutMs: 1_000 });

      registeredHandlers.get("SIGTERM")?.("SIGTERM");
      await vi.advanceTimersByTimeAsync(0);

      expect(logger.shutdown).toHaveBeenCalledWith(1_000);
      expect(exitSpy).toHaveBeenCalledWith(0);
    });

    it("still exits 0 when shutdown fails", async () => {
      const diagnostics = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const logger = target(async () => {
        throw new Error("stuck");
      });
      installShutdownHooks(logger, { logger: diagnostics });

      registeredHandlers.get("SIGINT")?.("SIGINT");
      await vi.advanceTimersByTimeAsync(0);

      expect(diagnostics.error).toHaveBeenCalledWith(
        "Logger shutdown failed",
        expect.objectContaining({ signal: "SIGINT" }),
      );
      expect(exitSpy).toHaveBeenCalledWith(0);
    });

    it("force-exits with 1 when shutdown stalls", async () => {
      const logger = target(() => new Promise(() => {}));
      installShutdownHooks(logger, { timeoutMs: 1_000, forceExitMs: 3_000 });

      registeredHandlers.get("SIGTERM")?.("SIGTERM");
      await vi.advanceTimersByTimeAsync(2_999);
      expect(exitSpy).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(exitSpy).toHaveBeenCalledWith(1);
    });

    it("ignores a second signal", async () => {
      const logger = target(() => new Promise(() => {}));
      installShutdownHooks(logger);

      registeredHandlers.get("SIGTERM")?.("SIGTERM");
      registeredHandlers.get("SIGINT")?.("SIGINT");
      await vi.advanceTimersByTimeAsync(0);

      expect(logger.shutdown).toHaveBeenCalledOnce();
    });

    it("returns a function that removes the handlers", () => {
      const uninstall = installShutdownHooks(target(async () => {}));

      uninstall();

      expect(registeredHandlers.size).toBe(0);
    });
  });
});
