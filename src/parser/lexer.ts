import {
  DiagnosticEmitter,
  type Diagnostic,
  type SourceSpan,
} from "../diagnostics/index.js";
import { CharStream, type SourcePosition } from "./char-stream.js";
import {
  isDigit,
  isIdentifierPart,
  isIdentifierStart,
  isWhitespace,
  keywords,
  stringEscapes,
} from "./grammar.js";
import { Token, type TokenKind } from "./token.js";

const INT_MAX = 2n ** 63n - 1n;

/** Operators and punctuation, longest spelling first so matching is maximal munch. */
const punctuators: readonly (readonly [string, TokenKind])[] = [
  ["->", "Arrow"],
  ["==", "EqualEqual"],
  ["!=", "BangEqual"],
  ["<>", "BangEqual"],
  ["<=", "LessEqual"],
  [">=", "GreaterEqual"],
  ["&&", "AndAnd"],
  ["||", "OrOr"],
  ["(", "LeftParen"],
  [")", "RightParen"],
  ["{", "LeftBrace"],
  ["}", "RightBrace"],
  [",", "Comma"],
  [":", "Colon"],
  [";", "Semicolon"],
  ["=", "Assign"],
  ["+", "Plus"],
  ["-", "Minus"],
  ["*", "Star"],
  ["/", "Slash"],
  ["%", "Percent"],
  ["!", "Bang"],
  ["<", "Less"],
  [">", "Greater"],
];

/**
 * Streaming tokenizer. Lexical errors are reported to `diagnostics` and
 * surface in the stream as `Error` tokens; scanning always continues, so the
 * parser sees a complete token sequence ending in `EndOfInput`.
 */
export class Lexer {
  private readonly chars: CharStream;
  private readonly emitter = new DiagnosticEmitter();
  private peeked?: Token;

  constructor(source: string, filePath: string) {
    this.chars = new CharStream(source, filePath);
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.emitter.diagnostics;
  }

  peek(): Token {
    if (!this.peeked) {
      this.peeked = this.scan();
    }
    return this.peeked;
  }

  next(): Token {
    const token = this.peek();
    this.peeked = undefined;
    return token;
  }

  private scan(): Token {
    this.skipTrivia();
    const chars = this.chars;
    const start = chars.mark();

    if (!chars.hasCharacters) {
      return this.token("EndOfInput", start);
    }

    const char = chars.next;

    if (isDigit(char)) {
      return this.scanNumber(start);
    }

    if (isIdentifierStart(char)) {
      while (isIdentifierPart(chars.next)) chars.consumeChar();
      const text = chars.textFrom(start);
      return this.token(keywords.get(text) ?? "Identifier", start);
    }

    if (char === '"') {
      return this.scanString(start);
    }

    for (const [spelling, kind] of punctuators) {
      if (this.lookingAt(spelling)) {
        for (let i = 0; i < spelling.length; i += 1) chars.consumeChar();
        return this.token(kind, start);
      }
    }

    return this.scanUnexpected(start);
  }

  private lookingAt(text: string): boolean {
    for (let i = 0; i < text.length; i += 1) {
      if (this.chars.at(i) !== text[i]) return false;
    }
    return true;
  }

  private skipTrivia() {
    const chars = this.chars;
    while (chars.hasCharacters) {
      if (isWhitespace(chars.next)) {
        chars.consumeChar();
        continue;
      }

      if (this.lookingAt("//")) {
        while (chars.hasCharacters && chars.next !== "\n") chars.consumeChar();
        continue;
      }

      if (this.lookingAt("/*")) {
        this.skipBlockComment();
        continue;
      }

      return;
    }
  }

  private skipBlockComment() {
    const chars = this.chars;
    const start = chars.mark();
    chars.consumeChar();
    chars.consumeChar();
    while (chars.hasCharacters) {
      if (this.lookingAt("*/")) {
        chars.consumeChar();
        chars.consumeChar();
        return;
      }
      chars.consumeChar();
    }
    this.emitter.report({
      code: "LX0005",
      params: { kind: "unterminated-comment" },
      span: this.openingSpan(start, 2),
    });
  }

  private scanNumber(start: SourcePosition): Token {
    const chars = this.chars;
    while (isDigit(chars.next)) chars.consumeChar();
    if (chars.next === "." && isDigit(chars.at(1))) {
      chars.consumeChar();
      while (isDigit(chars.next)) chars.consumeChar();
      const token = this.token("Error", start);
      this.emitter.report({
        code: "LX0004",
        params: { kind: "unsupported-float", literal: chars.textFrom(start) },
        span: token.span,
      });
      return token;
    }
    const literal = chars.textFrom(start);
    const value = BigInt(literal);
    if (value > INT_MAX) {
      const token = this.token("Error", start);
      this.emitter.report({
        code: "LX0004",
        params: { kind: "invalid-number", literal },
        span: token.span,
      });
      return token;
    }
    return this.token("Int", start, value);
  }

  private scanString(start: SourcePosition): Token {
    const chars = this.chars;
    chars.consumeChar();
    let value = "";
    let valid = true;

    while (chars.hasCharacters && chars.next !== '"' && chars.next !== "\n") {
      if (chars.next !== "\\") {
        value += chars.consumeChar();
        continue;
      }

      const escapeStart = chars.mark();
      chars.consumeChar();
      const escaped = chars.at(0);
      const decoded = escaped === undefined ? undefined : stringEscapes.get(escaped);
      if (escaped !== undefined && escaped !== "\n") chars.consumeChar();
      if (decoded === undefined) {
        valid = false;
        this.emitter.report({
          code: "LX0002",
          params: { kind: "invalid-escape", sequence: chars.textFrom(escapeStart) },
          span: chars.spanFrom(escapeStart),
        });
        continue;
      }
      value += decoded;
    }

    if (chars.next !== '"') {
      // Resume at the line break (or end of input) that cut the literal short.
      const token = this.token("Error", start);
      this.emitter.report({
        code: "LX0001",
        params: { kind: "unterminated-string" },
        span: this.openingSpan(start, 1),
      });
      return token;
    }

    chars.consumeChar();
    return valid ? this.token("String", start, value) : this.token("Error", start);
  }

  private scanUnexpected(start: SourcePosition): Token {
    const chars = this.chars;
    chars.consumeChar();
    const token = this.token("Error", start);
    this.emitter.report({
      code: "LX0003",
      params: { kind: "unexpected-char", char: token.lexeme },
      span: token.span,
    });
    return token;
  }

  private openingSpan(start: SourcePosition, length: number): SourceSpan {
    return {
      file: this.chars.filePath,
      start: start.index,
      end: start.index + length,
      line: start.line,
      column: start.column,
    };
  }

  private token(kind: TokenKind, start: SourcePosition, value?: bigint | string): Token {
    return new Token({
      kind,
      lexeme: this.chars.textFrom(start),
      span: this.chars.spanFrom(start),
      value,
    });
  }
}

export type TokenizeResult = {
  tokens: Token[];
  diagnostics: readonly Diagnostic[];
};

/** Runs the lexer to completion. The last token is always `EndOfInput`. */
export const tokenize = (source: string, filePath = "<input>"): TokenizeResult => {
  const lexer = new Lexer(source, filePath);
  const tokens: Token[] = [];
  while (true) {
    const token = lexer.next();
    tokens.push(token);
    if (token.is("EndOfInput")) break;
  }
  return { tokens, diagnostics: lexer.diagnostics };
};
