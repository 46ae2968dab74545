// Hand-rolled recursive descent parser for schedule strings.
//
//   full          := (date ' ')? (dayOfWeek ' ')? time EOF
//   date          := sequence '.' sequence '.' sequence
//   time          := sequence ':' sequence ':' sequence ('.' sequence)?
//   sequence      := wholeInterval (',' wholeInterval)* ','?
//   wholeInterval := ('*' | number ('-' number)?) ('/' number)?

import type { Logger } from "pino";
import type {
  Interval,
  ScheduleDate,
  ScheduleEntries,
  ScheduleEntry,
  ScheduleFormat,
  ScheduleTime,
} from "./ast.js";
import {
  defaultDate,
  defaultDayOfWeek,
  defaultMilliseconds,
  freezeEntries,
  makeEntry,
} from "./ast.js";
import {
  type BoundsTable,
  boundsMessage,
  FIELD_LABELS,
  findBoundsViolation,
  hasWildcardConflict,
  type ScheduleField,
} from "./bounds.js";
import { ScheduleError, type Span } from "./error.js";
import { describeToken, type Token, type TokenKind, type TokenType } from "./lexer.js";

interface Failure {
  error: ScheduleError;
  reach: number;
}

interface ParsedSequence {
  entries: ScheduleEntry[];
  spans: Span[];
  span: Span;
}

export class Parser {
  private tokens: Token[];
  private pos: number;
  private input: string;
  private bounds: BoundsTable;
  private logger: Logger;
  private furthest: Failure | null;

  constructor(tokens: Token[], input: string, bounds: BoundsTable, logger: Logger) {
    this.tokens = tokens;
    this.pos = 0;
    this.input = input;
    this.bounds = bounds;
    this.logger = logger;
    this.furthest = null;
  }

  peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  peekKind(): TokenKind | undefined {
    return this.tokens[this.pos]?.kind;
  }

  advance(): Token | undefined {
    const tok = this.tokens[this.pos];
    if (tok) this.pos++;
    return tok;
  }

  currentSpan(): Span {
    const tok = this.peek();
    if (tok) return tok.span;
    return { start: this.input.length, end: this.input.length };
  }

  /**
   * Records `error` as a candidate for the reported failure and returns it.
   * The candidate that reached furthest into the input wins; on a tie the
   * later one does, so the mandatory time section beats the optional ones.
   */
  private fail(error: ScheduleError, reach: number = error.span?.start ?? 0): ScheduleError {
    if (this.furthest === null || reach >= this.furthest.reach) {
      this.furthest = { error, reach };
    }
    return error;
  }

  private syntaxError(message: string, span: Span): ScheduleError {
    return this.fail(ScheduleError.syntax(message, span, this.input));
  }

  private unexpected(expected: string): ScheduleError {
    const tok = this.peek();
    if (tok) {
      return this.syntaxError(`expected ${expected}, got ${describeToken(tok.kind)}`, tok.span);
    }
    return this.syntaxError(`expected ${expected}`, this.currentSpan());
  }

  private expect(type: TokenType, expected: string): Token {
    const tok = this.peek();
    if (tok && tok.kind.type === type) {
      this.pos++;
      return tok;
    }
    throw this.unexpected(expected);
  }

  /** Runs `parse`; on failure rewinds to where it started and returns null. */
  private attempt<T>(section: string, parse: () => T): T | null {
    const saved = this.pos;
    try {
      return parse();
    } catch (err) {
      if (!(err instanceof ScheduleError)) throw err;
      this.pos = saved;
      this.logger.debug(
        { section, offset: this.currentSpan().start, reason: err.message },
        "discarded optional section",
      );
      return null;
    }
  }

  // --- Interval primitive ---

  private parseNumber(expected: string): { value: number; span: Span } {
    const tok = this.peek();
    if (tok?.kind.type === "number") {
      this.pos++;
      return { value: tok.kind.value, span: tok.span };
    }
    throw this.unexpected(expected);
  }

  private parseWholeInterval(): { entry: ScheduleEntry; span: Span } {
    const start = this.currentSpan().start;
    const k = this.peekKind();

    let interval: Interval;
    if (k?.type === "star") {
      this.advance();
      interval = { type: "wildcard" };
    } else if (k?.type === "number") {
      this.advance();
      if (this.peekKind()?.type === "dash") {
        this.advance();
        const end = this.parseNumber("number after '-'");
        interval = { type: "range", begin: k.value, end: end.value };
      } else {
        interval = { type: "single", value: k.value };
      }
    } else {
      throw this.unexpected("'*' or number");
    }

    let step: number | null = null;
    if (this.peekKind()?.type === "slash") {
      this.advance();
      const parsed = this.parseNumber("step after '/'");
      if (parsed.value < 1) {
        throw this.syntaxError("step must be a positive integer", parsed.span);
      }
      step = parsed.value;
    }

    return {
      entry: makeEntry(interval, step),
      span: { start, end: this.currentSpan().start },
    };
  }

  // --- Interval sequence ---

  private parseSequence(): ParsedSequence {
    const start = this.currentSpan().start;
    const first = this.parseWholeInterval();
    const entries = [first.entry];
    const spans = [first.span];

    while (this.peekKind()?.type === "comma") {
      this.advance();
      // A trailing comma ends the sequence.
      const next = this.peekKind()?.type;
      if (next !== "star" && next !== "number") break;
      const item = this.parseWholeInterval();
      entries.push(item.entry);
      spans.push(item.span);
    }

    return { entries, spans, span: { start, end: this.currentSpan().start } };
  }

  /**
   * Parses and validates the sequence of one field. `follow` lists the tokens
   * that may come next; a validation failure right before one of them counts
   * as having reached past it.
   */
  private parseField(field: ScheduleField, follow: readonly TokenType[]): ScheduleEntries {
    const { entries, spans, span } = this.parseSequence();
    const next = this.peek();
    const reach = next && follow.includes(next.kind.type) ? next.span.end : span.end;

    if (hasWildcardConflict(entries)) {
      throw this.fail(
        ScheduleError.wildcard(
          `${FIELD_LABELS[field]} component cannot combine '*' with other entries`,
          span,
          this.input,
          field,
        ),
        reach,
      );
    }

    const bounds = this.bounds[field];
    const violation = findBoundsViolation(entries, bounds);
    if (violation) {
      throw this.fail(
        ScheduleError.bounds(
          boundsMessage(field, violation, bounds),
          spans[violation.index],
          this.input,
          field,
        ),
        reach,
      );
    }

    return freezeEntries(entries);
  }

  // --- Composite fields ---

  parseDate(): ScheduleDate {
    const years = this.parseField("year", ["dot"]);
    this.expect("dot", "'.' after year");
    const months = this.parseField("month", ["dot"]);
    this.expect("dot", "'.' after month");
    const days = this.parseField("day", ["space"]);
    return Object.freeze({ years, months, days });
  }

  parseDayOfWeek(): ScheduleEntries {
    return this.parseField("dayOfWeek", ["space"]);
  }

  parseTime(): ScheduleTime {
    const hours = this.parseField("hour", ["colon"]);
    this.expect("colon", "':' after hour");
    const minutes = this.parseField("minute", ["colon"]);
    this.expect("colon", "':' after minute");
    const seconds = this.parseField("second", ["dot"]);

    let milliseconds = defaultMilliseconds();
    if (this.peekKind()?.type === "dot") {
      this.advance();
      milliseconds = this.parseField("millisecond", []);
    }

    return Object.freeze({ hours, minutes, seconds, milliseconds });
  }

  // --- Full schedule ---

  parseSchedule(): ScheduleFormat {
    const date = this.attempt("date", () => {
      const parsed = this.parseDate();
      this.expect("space", "' ' after date");
      return parsed;
    });

    const dayOfWeek = this.attempt("dayOfWeek", () => {
      const parsed = this.parseDayOfWeek();
      this.expect("space", "' ' after day of week");
      return parsed;
    });

    try {
      const time = this.parseTime();

      const trailing = this.peek();
      if (trailing) {
        throw this.fail(
          ScheduleError.trailing(
            `unexpected input after time: '${this.input.slice(trailing.span.start)}'`,
            { start: trailing.span.start, end: this.input.length },
            this.input,
          ),
        );
      }

      return Object.freeze({
        date: date ?? defaultDate(),
        dayOfWeek: dayOfWeek ?? defaultDayOfWeek(),
        time,
      });
    } catch (err) {
      if (!(err instanceof ScheduleError) || this.furthest === null) throw err;
      const reported = this.furthest.error;
      this.logger.debug(
        { kind: reported.kind, offset: reported.offset, field: reported.field },
        "schedule parse failed",
      );
      throw reported;
    }
  }
}
