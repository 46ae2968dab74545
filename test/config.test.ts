import { mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { afterEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_BOUNDS } from "../src/bounds.js";
import { resolveOptions } from "../src/config.js";
import { MAX_NUMBER } from "../src/lexer.js";
import { parse, ScheduleError, singlePoint, tryParse } from "../src/index.js";
import { getLoggingConfig, parserLogger } from "../src/logging.js";

describe("resolveOptions", () => {
  it("falls back to the default bounds and parser logger", () => {
    const resolved = resolveOptions();
    expect(resolved.bounds).toBe(DEFAULT_BOUNDS);
    expect(resolved.logger).toBe(parserLogger);
  });

  it("merges bound overrides over the defaults", () => {
    const resolved = resolveOptions({ bounds: { year: { min: 1990, max: 2010 } } });
    expect(resolved.bounds.year).toEqual({ min: 1990, max: 2010 });
    expect(resolved.bounds.hour).toEqual(DEFAULT_BOUNDS.hour);
  });

  it("rejects bounds whose minimum exceeds the maximum", () => {
    expect(() => resolveOptions({ bounds: { year: { min: 5, max: 1 } } })).toThrow(
      "invalid parse options: bounds.year: min must not exceed max",
    );
  });

  it("rejects negative bounds", () => {
    const result = tryParse("10:00:00", { bounds: { hour: { min: -1, max: 5 } } });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("config");
      expect(result.error.message).toBe(
        "invalid parse options: bounds.hour.min: min must be a non-negative integer",
      );
    }
  });

  it("rejects bounds the lexer can never produce", () => {
    const result = tryParse("3000000000.1.1 0:0:0", {
      bounds: { year: { min: 0, max: 5000000000 } },
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("config");
      expect(result.error.message).toBe(
        "invalid parse options: bounds.year.max: max must not exceed 2147483647",
      );
    }
  });

  it("accepts bounds up to the largest number", () => {
    const resolved = resolveOptions({ bounds: { year: { min: 0, max: MAX_NUMBER } } });
    expect(resolved.bounds.year).toEqual({ min: 0, max: MAX_NUMBER });
  });
});

describe("parse with options", () => {
  it("applies an overridden year window", () => {
    const schedule = parse("1995.01.01 00:00:00", { bounds: { year: { min: 1990, max: 2010 } } });
    expect(schedule.date.years).toEqual([singlePoint(1995)]);
  });

  it("reports the overridden bounds in errors", () => {
    expect(() => parse("12:00:00", { bounds: { hour: { min: 0, max: 11 } } })).toThrow(
      new ScheduleError("bounds", "Hour component (12, 12) is out of bounds (0, 11)"),
    );
  });

  it("logs discarded optional sections to the supplied logger", () => {
    const lines: string[] = [];
    const logger = pino({ level: "debug" }, { write: (line: string) => lines.push(line) });

    parse("1-5 9:30:00", { logger });

    const records: unknown[] = lines.map((line) => JSON.parse(line));
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      msg: "discarded optional section",
      section: "date",
      offset: 0,
      reason: "Year component (1, 5) is out of bounds (2000, 2100)",
    });
  });
});

describe("getLoggingConfig", () => {
  it("reads the level from LOG_LEVEL", () => {
    expect(getLoggingConfig({ LOG_LEVEL: "DEBUG" })).toEqual({
      level: "debug",
      destination: "stdout",
    });
  });

  it("defaults to warn under test and info otherwise", () => {
    expect(getLoggingConfig({ NODE_ENV: "test" }).level).toBe("warn");
    expect(getLoggingConfig({}).level).toBe("info");
    expect(getLoggingConfig({ LOG_LEVEL: "loud" }).level).toBe("info");
  });

  it("accepts stderr as destination", () => {
    expect(getLoggingConfig({ LOG_DESTINATION: "stderr" }).destination).toBe("stderr");
  });

  it("treats other destinations as file paths", () => {
    expect(getLoggingConfig({ LOG_DESTINATION: " /var/log/Parser.log " }).destination).toBe(
      "/var/log/Parser.log",
    );
  });
});

describe("file log destination", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it("loads the parser and appends records to the file", async () => {
    const file = join(mkdtempSync(join(tmpdir(), "schedule-format-")), "parser.log");
    vi.stubEnv("LOG_DESTINATION", file);
    vi.stubEnv("LOG_LEVEL", "warn");
    vi.resetModules();

    const api = await import("../src/index.js");
    const logging = await import("../src/logging.js");

    expect(api.parse("10:00:00").time.hours).toEqual([singlePoint(10)]);
    logging.parserLogger.warn("written to file");

    const records: unknown[] = readFileSync(file, "utf8")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      level: "warn",
      component: "PARSER",
      msg: "written to file",
    });
  });
});
