export class LogrollError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LogrollError";
    this.code = code;
  }
}

// ── Domain errors ──

/** Thrown at construction when the engine options fail validation. */
export class ConfigError extends LogrollError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

/** Raised by filesystem providers when a sink cannot be opened, written or closed. */
export class SinkError extends LogrollError {
  readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, "SINK", options);
    this.name = "SinkError";
    this.path = path;
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to LogrollError (preserves cause chain). */
export function toLogrollError(value: unknown): LogrollError {
  if (value instanceof LogrollError) return value;
  if (value instanceof Error) return new LogrollError(value.message, "UNKNOWN", { cause: value });
  return new LogrollError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}

/** Plain-object view of an error for structured diagnostics, following `cause` a few levels. */
export function serializeError(value: unknown, depth = 0): Record<string, unknown> {
  if (!(value instanceof Error)) return { message: errorMessage(value) };

  const serialized: Record<string, unknown> = { name: value.name, message: value.message };
  if (value instanceof LogrollError) serialized.code = value.code;
  if (value instanceof SinkError) serialized.path = value.path;
  if (value.cause !== undefined && depth < 3) {
    serialized.cause = serializeError(value.cause, depth + 1);
  }
  serialized.stack = value.stack;
  return serialized;
}
