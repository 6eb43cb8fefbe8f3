import { z } from "zod";

/** Largest delay setTimeout honours; longer delays fire immediately. */
export const MAX_TIMER_MS = 2_147_483_647;

const fn = z
  .unknown()
  .refine((v) => v === undefined || typeof v === "function", "must be a function")
  .optional();

const instance = z
  .unknown()
  .refine((v) => v === undefined || (typeof v === "object" && v !== null), "must be an object")
  .optional();

const pattern = z.string().min(1, "must not be empty");

export const engineOptionsSchema = z.object({
  name: z
    .string()
    .refine((v) => v.trim().length > 0, "logger name must not be blank")
    .optional(),

  // Layout and formatting
  directory: fn,
  file: fn,
  message: fn,
  timeFormat: pattern.optional(),
  dateFormat: pattern.optional(),
  timeZone: z.enum(["utc", "local"]).optional(),

  // Retention
  rotation: z
    .object({
      enabled: z.boolean().optional(),
      retentionMs: z.number().positive("retention must be positive").optional(),
      sweepIntervalMs: z.number().int().positive().max(MAX_TIMER_MS).optional(),
    })
    .optional(),

  // Dispatch queue
  queue: z
    .object({
      capacity: z
        .number()
        .positive("queue capacity must be greater than 0")
        .refine(
          (v) => v === Number.POSITIVE_INFINITY || Number.isInteger(v),
          "queue capacity must be an integer or Infinity",
        )
        .optional(),
      backpressure: z.enum(["block", "drop"]).optional(),
    })
    .optional(),

  // Collaborators
  fileSystem: instance,
  clock: instance,
  diagnostics: instance,
  stdout: fn,
  sinkCache: instance,
  signal: instance,
});
