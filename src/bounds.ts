// Field bounds and the validators applied to every parsed interval sequence.

import type { ScheduleEntries, ScheduleEntry } from "./ast.js";
import { entryBegin, entryEnd, isAlways } from "./ast.js";

export type ScheduleField =
  | "year"
  | "month"
  | "day"
  | "dayOfWeek"
  | "hour"
  | "minute"
  | "second"
  | "millisecond";

export const SCHEDULE_FIELDS: readonly ScheduleField[] = [
  "year",
  "month",
  "day",
  "dayOfWeek",
  "hour",
  "minute",
  "second",
  "millisecond",
];

export interface FieldBounds {
  min: number;
  max: number;
}

export type BoundsTable = Readonly<Record<ScheduleField, Readonly<FieldBounds>>>;

export const FIELD_LABELS: Readonly<Record<ScheduleField, string>> = {
  year: "Year",
  month: "Month",
  day: "Day",
  dayOfWeek: "Day of week",
  hour: "Hour",
  minute: "Minute",
  second: "Second",
  millisecond: "Millisecond",
};

export const DEFAULT_BOUNDS: BoundsTable = {
  year: { min: 2000, max: 2100 },
  month: { min: 1, max: 12 },
  day: { min: 1, max: 32 }, // 32 = last day of the month
  dayOfWeek: { min: 0, max: 6 }, // 0 = Sunday
  hour: { min: 0, max: 23 },
  minute: { min: 0, max: 59 },
  second: { min: 0, max: 59 },
  millisecond: { min: 0, max: 999 },
};

export interface BoundsViolation {
  index: number;
  entry: ScheduleEntry;
  begin: number;
  end: number;
}

/**
 * Returns the first entry outside `bounds`, or null when all entries fit.
 * Wildcards always pass; a single point is checked as the range [n, n].
 */
export function findBoundsViolation(
  entries: ScheduleEntries,
  bounds: FieldBounds,
): BoundsViolation | null {
  for (let index = 0; index < entries.length; index++) {
    const entry = entries[index];
    const begin = entryBegin(entry);
    if (begin === null) continue;
    const end = entryEnd(entry) ?? begin;
    if (begin < bounds.min || begin > bounds.max || end < begin || end > bounds.max) {
      return { index, entry, begin, end };
    }
  }
  return null;
}

export function boundsMessage(
  field: ScheduleField,
  violation: BoundsViolation,
  bounds: FieldBounds,
): string {
  return `${FIELD_LABELS[field]} component (${violation.begin}, ${violation.end}) is out of bounds (${bounds.min}, ${bounds.max})`;
}

/** A wildcard may only stand alone in its field. */
export function hasWildcardConflict(entries: ScheduleEntries): boolean {
  return entries.length > 1 && entries.some(isAlways);
}
