import type { SourceSpan } from "../diagnostics/index.js";

export type TokenKind =
  | "Identifier"
  | "Int"
  | "String"
  | "Fn"
  | "Let"
  | "Var"
  | "If"
  | "Else"
  | "While"
  | "Return"
  | "True"
  | "False"
  | "LeftParen"
  | "RightParen"
  | "LeftBrace"
  | "RightBrace"
  | "Comma"
  | "Colon"
  | "Semicolon"
  | "Arrow"
  | "Assign"
  | "Plus"
  | "Minus"
  | "Star"
  | "Slash"
  | "Percent"
  | "Bang"
  | "EqualEqual"
  | "BangEqual"
  | "Less"
  | "LessEqual"
  | "Greater"
  | "GreaterEqual"
  | "AndAnd"
  | "OrOr"
  | "Error"
  | "EndOfInput";

/** Decoded literal payload carried by Int and String tokens. */
export type TokenValue = bigint | string;

export class Token {
  readonly kind: TokenKind;
  readonly lexeme: string;
  readonly span: SourceSpan;
  readonly value?: TokenValue;

  constructor(opts: {
    kind: TokenKind;
    lexeme: string;
    span: SourceSpan;
    value?: TokenValue;
  }) {
    this.kind = opts.kind;
    this.lexeme = opts.lexeme;
    this.span = opts.span;
    this.value = opts.value;
  }

  is(kind: TokenKind) {
    return this.kind === kind;
  }

  /** How the token reads in a diagnostic message. */
  describe(): string {
    switch (this.kind) {
      case "EndOfInput":
        return "end of input";
      case "Identifier":
        return `identifier '${this.lexeme}'`;
      case "Int":
        return `integer ${this.lexeme}`;
      case "String":
        return "string literal";
      default:
        return `'${this.lexeme}'`;
    }
  }

  /** e.g. `Identifier(x)`, `Int(1)`, `Plus` */
  toString(): string {
    switch (this.kind) {
      case "Identifier":
      case "Int":
      case "Error":
        return `${this.kind}(${this.lexeme})`;
      case "String":
        return `String(${JSON.stringify(this.value ?? "")})`;
      default:
        return this.kind;
    }
  }
}
