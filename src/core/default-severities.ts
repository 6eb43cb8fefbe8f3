import { Ansi } from "../utils/ansi.js";
import type { SeverityDefinition } from "./severity-strategy.js";

/** Severities every engine registers at construction. */
export const DEFAULT_SEVERITIES = {
  debug: { name: "DEBUG", color: Ansi.GREEN },
  info: { name: "INFO", color: Ansi.CYAN },
  warn: { name: "WARN", color: Ansi.YELLOW },
  error: { name: "ERROR", color: Ansi.RED },
  fatal: { name: "FATAL", color: Ansi.BOLD_RED },
  stackTrace: { name: "STACKTRACE", color: Ansi.BOLD_RED, variant: "stack-trace" },
} as const satisfies Record<string, SeverityDefinition>;

export type DefaultSeverity = keyof typeof DEFAULT_SEVERITIES;
