import { ScheduleError, type Span } from "./error.js";

/** Largest value a digit run may hold (32-bit signed integer). */
export const MAX_NUMBER = 2147483647;

export interface Token {
  kind: TokenKind;
  span: Span;
}

export type TokenKind =
  | { type: "number"; value: number }
  | { type: "star" }
  | { type: "dash" }
  | { type: "slash" }
  | { type: "comma" }
  | { type: "dot" }
  | { type: "colon" }
  | { type: "space" }
  | { type: "char"; ch: string };

export type TokenType = TokenKind["type"];

export function tokenize(input: string): Token[] {
  const lexer = new Lexer(input);
  return lexer.tokenize();
}

class Lexer {
  private input: string;
  private pos: number;

  constructor(input: string) {
    this.input = input;
    this.pos = 0;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    while (this.pos < this.input.length) {
      const start = this.pos;
      const ch = this.input[this.pos];

      if (isDigit(ch)) {
        tokens.push(this.lexNumber());
        continue;
      }

      this.pos++;
      const kind = PUNCTUATION_MAP[ch] ?? { type: "char", ch };
      tokens.push({ kind, span: { start, end: this.pos } });
    }
    return tokens;
  }

  private lexNumber(): Token {
    const start = this.pos;
    while (this.pos < this.input.length && isDigit(this.input[this.pos])) {
      this.pos++;
    }
    const digits = this.input.slice(start, this.pos);
    const span = { start, end: this.pos };

    const value = parseInt(digits, 10);
    if (value > MAX_NUMBER) {
      throw ScheduleError.overflow(
        `number '${digits}' exceeds ${MAX_NUMBER}`,
        span,
        this.input,
      );
    }

    return { kind: { type: "number", value }, span };
  }
}

const PUNCTUATION_MAP: Record<string, TokenKind> = {
  "*": { type: "star" },
  "-": { type: "dash" },
  "/": { type: "slash" },
  ",": { type: "comma" },
  ".": { type: "dot" },
  ":": { type: "colon" },
  " ": { type: "space" },
};

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

export function describeToken(kind: TokenKind): string {
  switch (kind.type) {
    case "number":
      return `number ${kind.value}`;
    case "star":
      return "'*'";
    case "dash":
      return "'-'";
    case "slash":
      return "'/'";
    case "comma":
      return "','";
    case "dot":
      return "'.'";
    case "colon":
      return "':'";
    case "space":
      return "' '";
    case "char":
      return `'${kind.ch}'`;
  }
}
