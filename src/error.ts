import type { ScheduleField } from "./bounds.js";

/** Character range within the input string. */
export interface Span {
  start: number;
  end: number;
}

export type ScheduleErrorKind =
  | "syntax"
  | "wildcard"
  | "bounds"
  | "trailing"
  | "overflow"
  | "config";

/** All errors produced while parsing a schedule. */
export class ScheduleError extends Error {
  readonly kind: ScheduleErrorKind;
  readonly span?: Span;
  readonly input?: string;
  readonly field?: ScheduleField;

  constructor(
    kind: ScheduleErrorKind,
    message: string,
    span?: Span,
    input?: string,
    field?: ScheduleField,
  ) {
    super(message);
    this.name = "ScheduleError";
    this.kind = kind;
    this.span = span;
    this.input = input;
    this.field = field;
  }

  /** Input offset at which parsing failed, when known. */
  get offset(): number | undefined {
    return this.span?.start;
  }

  static syntax(message: string, span: Span, input: string): ScheduleError {
    return new ScheduleError("syntax", message, span, input);
  }

  static wildcard(
    message: string,
    span: Span,
    input: string,
    field: ScheduleField,
  ): ScheduleError {
    return new ScheduleError("wildcard", message, span, input, field);
  }

  static bounds(
    message: string,
    span: Span,
    input: string,
    field: ScheduleField,
  ): ScheduleError {
    return new ScheduleError("bounds", message, span, input, field);
  }

  static trailing(message: string, span: Span, input: string): ScheduleError {
    return new ScheduleError("trailing", message, span, input);
  }

  static overflow(message: string, span: Span, input: string): ScheduleError {
    return new ScheduleError("overflow", message, span, input);
  }

  static config(message: string): ScheduleError {
    return new ScheduleError("config", message);
  }

  displayRich(): string {
    if (this.span && this.input !== undefined) {
      let out = `error: ${this.message}\n`;
      out += `  ${this.input}\n`;
      const padding = " ".repeat(this.span.start + 2);
      const underline = "^".repeat(Math.max(this.span.end - this.span.start, 1));
      out += padding + underline;
      return out;
    }
    return `error: ${this.message}`;
  }
}
