// Schedule data model — discriminated unions for the parsed intervals.

// --- Interval ---

export type Interval =
  | { type: "wildcard" }
  | { type: "single"; value: number }
  | { type: "range"; begin: number; end: number };

/** One comma-separated unit of a field: an interval and an optional step. */
export interface ScheduleEntry {
  readonly interval: Readonly<Interval>;
  readonly step: number | null;
}

export type ScheduleEntries = readonly ScheduleEntry[];

// --- Composite fields ---

export interface ScheduleDate {
  readonly years: ScheduleEntries;
  readonly months: ScheduleEntries;
  readonly days: ScheduleEntries;
}

export interface ScheduleTime {
  readonly hours: ScheduleEntries;
  readonly minutes: ScheduleEntries;
  readonly seconds: ScheduleEntries;
  readonly milliseconds: ScheduleEntries;
}

// --- Schedule (top-level) ---

export interface ScheduleFormat {
  readonly date: ScheduleDate;
  readonly dayOfWeek: ScheduleEntries;
  readonly time: ScheduleTime;
}

// --- Constructors ---

export function makeEntry(interval: Interval, step: number | null = null): ScheduleEntry {
  return Object.freeze({ interval: Object.freeze(interval), step });
}

/** The wildcard entry with no step: matches any value. */
export const ALWAYS: ScheduleEntry = makeEntry({ type: "wildcard" });

export function singlePoint(value: number): ScheduleEntry {
  return makeEntry({ type: "single", value });
}

export function rangeOf(begin: number, end: number, step: number | null = null): ScheduleEntry {
  return makeEntry({ type: "range", begin, end }, step);
}

export function freezeEntries(entries: ScheduleEntry[]): ScheduleEntries {
  return Object.freeze(entries.slice());
}

export function defaultDate(): ScheduleDate {
  return Object.freeze({
    years: freezeEntries([ALWAYS]),
    months: freezeEntries([ALWAYS]),
    days: freezeEntries([ALWAYS]),
  });
}

export function defaultDayOfWeek(): ScheduleEntries {
  return freezeEntries([ALWAYS]);
}

export function defaultMilliseconds(): ScheduleEntries {
  return freezeEntries([singlePoint(0)]);
}

// --- Helper functions ---

/** Lower bound of the entry, or null for a wildcard. */
export function entryBegin(entry: ScheduleEntry): number | null {
  switch (entry.interval.type) {
    case "wildcard":
      return null;
    case "single":
      return entry.interval.value;
    case "range":
      return entry.interval.begin;
  }
}

/** Explicit upper bound of the entry; null for wildcards and single points. */
export function entryEnd(entry: ScheduleEntry): number | null {
  return entry.interval.type === "range" ? entry.interval.end : null;
}

export function intervalEquals(a: Interval, b: Interval): boolean {
  switch (a.type) {
    case "wildcard":
      return b.type === "wildcard";
    case "single":
      return b.type === "single" && a.value === b.value;
    case "range":
      return b.type === "range" && a.begin === b.begin && a.end === b.end;
  }
}

export function entryEquals(a: ScheduleEntry, b: ScheduleEntry): boolean {
  return a.step === b.step && intervalEquals(a.interval, b.interval);
}

// True only for an unstepped wildcard: a stepped "*/5" is not ALWAYS.
export function isAlways(entry: ScheduleEntry): boolean {
  return entryEquals(entry, ALWAYS);
}
