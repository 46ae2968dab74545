/**
 * Parse options.
 *
 * Callers may narrow or widen the bounds of individual fields (for example a
 * different year window) and supply their own pino logger. Options are
 * validated with zod before any input is read; invalid options fail with a
 * `config` ScheduleError.
 */

import type { Logger } from "pino";
import { z } from "zod";
import {
  type BoundsTable,
  DEFAULT_BOUNDS,
  type FieldBounds,
  SCHEDULE_FIELDS,
  type ScheduleField,
} from "./bounds.js";
import { ScheduleError } from "./error.js";
import { MAX_NUMBER } from "./lexer.js";
import { parserLogger } from "./logging.js";

const fieldBoundsSchema = z
  .object({
    min: z
      .number()
      .int()
      .nonnegative("min must be a non-negative integer")
      .max(MAX_NUMBER, `min must not exceed ${MAX_NUMBER}`),
    max: z
      .number()
      .int()
      .nonnegative("max must be a non-negative integer")
      .max(MAX_NUMBER, `max must not exceed ${MAX_NUMBER}`),
  })
  .strict()
  .refine((b) => b.min <= b.max, { message: "min must not exceed max" });

const boundsOverridesSchema = z
  .object({
    year: fieldBoundsSchema,
    month: fieldBoundsSchema,
    day: fieldBoundsSchema,
    dayOfWeek: fieldBoundsSchema,
    hour: fieldBoundsSchema,
    minute: fieldBoundsSchema,
    second: fieldBoundsSchema,
    millisecond: fieldBoundsSchema,
  })
  .partial()
  .strict();

const loggerSchema = z.custom<Logger>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "debug" in value &&
    typeof value.debug === "function",
  { message: "logger must be a pino logger" },
);

export const parseOptionsSchema = z
  .object({
    bounds: boundsOverridesSchema.optional(),
    logger: loggerSchema.optional(),
  })
  .strict();

export type ParseOptions = z.infer<typeof parseOptionsSchema>;

export interface ResolvedOptions {
  bounds: BoundsTable;
  logger: Logger;
}

const DEFAULT_OPTIONS: ResolvedOptions = {
  bounds: DEFAULT_BOUNDS,
  logger: parserLogger,
};

export function resolveOptions(options?: ParseOptions): ResolvedOptions {
  if (options === undefined) {
    return DEFAULT_OPTIONS;
  }

  const result = parseOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => {
        const path = issue.path.join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      })
      .join("; ");
    throw ScheduleError.config(`invalid parse options: ${issues}`);
  }

  const bounds: Record<ScheduleField, FieldBounds> = { ...DEFAULT_BOUNDS };
  const overrides = result.data.bounds ?? {};
  for (const field of SCHEDULE_FIELDS) {
    const override = overrides[field];
    if (override) {
      bounds[field] = { min: override.min, max: override.max };
    }
  }

  return {
    bounds: Object.freeze(bounds),
    logger: result.data.logger ?? parserLogger,
  };
}
