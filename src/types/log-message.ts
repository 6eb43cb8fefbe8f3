import type { SeverityStrategy } from "../core/severity-strategy.js";

/** One submitted log entry. Frozen at creation and consumed exactly once. */
export interface LogMessage {
  readonly severity: SeverityStrategy;
  /** One entry may span several lines. */
  readonly lines: readonly string[];
  readonly echoToConsole: boolean;
  readonly createdAt: Date;
}

export function createLogMessage(
  severity: SeverityStrategy,
  lines: readonly string[],
  echoToConsole = true,
  createdAt: Date = new Date(),
): LogMessage {
  return Object.freeze({
    severity,
    lines: Object.freeze([...lines]),
    echoToConsole,
    createdAt: new Date(createdAt.getTime()),
  });
}
