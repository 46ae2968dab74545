// schedule-format — Public API

import type { ScheduleDate, ScheduleEntries, ScheduleFormat, ScheduleTime } from "./ast.js";
import { type ParseOptions, resolveOptions } from "./config.js";
import { ScheduleError } from "./error.js";
import { tokenize } from "./lexer.js";
import { Parser } from "./parser.js";

export type ParseResult =
  | { ok: true; value: ScheduleFormat }
  | { ok: false; error: ScheduleError };

/**
 * Parse a schedule string such as `"2023.05.15 3 10:20:30.500"`.
 * The whole input must be consumed; throws `ScheduleError` otherwise.
 */
export function parse(input: string, options?: ParseOptions): ScheduleFormat {
  const { bounds, logger } = resolveOptions(options);
  const tokens = tokenize(input);

  if (tokens.length === 0) {
    throw ScheduleError.syntax("empty schedule", { start: 0, end: 0 }, input);
  }

  const parser = new Parser(tokens, input, bounds, logger);
  return parser.parseSchedule();
}

/** Like `parse`, but returns the failure instead of throwing it. */
export function tryParse(input: string, options?: ParseOptions): ParseResult {
  try {
    return { ok: true, value: parse(input, options) };
  } catch (err) {
    if (err instanceof ScheduleError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

export class Schedule {
  private data: ScheduleFormat;

  private constructor(data: ScheduleFormat) {
    this.data = data;
  }

  /** Parse a schedule string. */
  static parse(input: string, options?: ParseOptions): Schedule {
    return new Schedule(parse(input, options));
  }

  /** Check if an input string is a valid schedule. */
  static validate(input: string, options?: ParseOptions): boolean {
    return tryParse(input, options).ok;
  }

  get date(): ScheduleDate {
    return this.data.date;
  }

  get dayOfWeek(): ScheduleEntries {
    return this.data.dayOfWeek;
  }

  get time(): ScheduleTime {
    return this.data.time;
  }

  /** Get the underlying parsed structure. */
  get format(): ScheduleFormat {
    return this.data;
  }
}

export type {
  Interval,
  ScheduleDate,
  ScheduleEntries,
  ScheduleEntry,
  ScheduleFormat,
  ScheduleTime,
} from "./ast.js";
export {
  ALWAYS,
  entryBegin,
  entryEnd,
  entryEquals,
  isAlways,
  rangeOf,
  singlePoint,
} from "./ast.js";
export type { BoundsTable, FieldBounds, ScheduleField } from "./bounds.js";
export { DEFAULT_BOUNDS, FIELD_LABELS, SCHEDULE_FIELDS } from "./bounds.js";
export type { ParseOptions } from "./config.js";
export type { ScheduleErrorKind, Span } from "./error.js";
export { ScheduleError } from "./error.js";
export { MAX_NUMBER } from "./lexer.js";
