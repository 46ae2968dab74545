// Conformance test runner — drives all cases from fixtures/parse.json.

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import {
  entryBegin,
  entryEnd,
  parse,
  ScheduleError,
  type ScheduleEntries,
} from "../src/index.js";

const triple = z.tuple([z.number().nullable(), z.number().nullable(), z.number().nullable()]);
const entries = z.array(triple).nonempty();

const fixtureSchema = z.object({
  description: z.string(),
  valid: z.array(
    z.object({
      name: z.string(),
      input: z.string(),
      years: entries,
      months: entries,
      days: entries,
      dayOfWeek: entries,
      hours: entries,
      minutes: entries,
      seconds: entries,
      milliseconds: entries,
    }),
  ),
  errors: z.array(
    z.object({
      name: z.string(),
      input: z.string(),
      kind: z.enum(["syntax", "wildcard", "bounds", "trailing", "overflow"]),
      field: z
        .enum(["year", "month", "day", "dayOfWeek", "hour", "minute", "second", "millisecond"])
        .optional(),
      offset: z.number(),
      message: z.string(),
    }),
  ),
});

const fixturePath = fileURLToPath(new URL("./fixtures/parse.json", import.meta.url));
const fixture = fixtureSchema.parse(JSON.parse(readFileSync(fixturePath, "utf-8")));

function triples(list: ScheduleEntries): [number | null, number | null, number | null][] {
  return list.map((entry) => [entryBegin(entry), entryEnd(entry), entry.step]);
}

function catchScheduleError(input: string): ScheduleError {
  try {
    parse(input);
  } catch (err) {
    if (err instanceof ScheduleError) return err;
    throw err;
  }
  throw new Error(`expected '${input}' to fail`);
}

// ===========================================================================
// Valid schedules
// ===========================================================================

describe("parse", () => {
  for (const tc of fixture.valid) {
    it(tc.name, () => {
      const schedule = parse(tc.input);

      expect(triples(schedule.date.years)).toEqual(tc.years);
      expect(triples(schedule.date.months)).toEqual(tc.months);
      expect(triples(schedule.date.days)).toEqual(tc.days);
      expect(triples(schedule.dayOfWeek)).toEqual(tc.dayOfWeek);
      expect(triples(schedule.time.hours)).toEqual(tc.hours);
      expect(triples(schedule.time.minutes)).toEqual(tc.minutes);
      expect(triples(schedule.time.seconds)).toEqual(tc.seconds);
      expect(triples(schedule.time.milliseconds)).toEqual(tc.milliseconds);
    });
  }
});

// ===========================================================================
// Parse errors
// ===========================================================================

describe("parse errors", () => {
  for (const tc of fixture.errors) {
    it(tc.name, () => {
      const error = catchScheduleError(tc.input);

      expect(error.kind).toBe(tc.kind);
      expect(error.message).toBe(tc.message);
      expect(error.offset).toBe(tc.offset);
      expect(error.input).toBe(tc.input);
      expect(error.field).toBe(tc.field);
    });
  }
});
