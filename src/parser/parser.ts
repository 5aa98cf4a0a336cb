import {
  DiagnosticEmitter,
  DiagnosticError,
  sortDiagnostics,
  type Diagnostic,
  type SourceSpan,
} from "../diagnostics/index.js";
import type {
  Block,
  Expr,
  FunctionDecl,
  If,
  Item,
  NodeId,
  Param,
  Program,
  Stmt,
  TypeRef,
  VarDecl,
} from "./ast.js";
import { callPower, infixOps, prefixPower, statementStarts } from "./grammar.js";
import { Lexer } from "./lexer.js";
import type { Token, TokenKind } from "./token.js";

const itemStarts: ReadonlySet<TokenKind> = new Set<TokenKind>(["Fn", "Let", "Var"]);

/** Unwinds to a recovery point without a diagnostic of its own. */
class SyntaxAbort extends Error {}

const spanBetween = (start: SourceSpan, end: SourceSpan): SourceSpan => ({
  file: start.file,
  start: start.start,
  end: Math.max(end.end, start.start),
  line: start.line,
  column: start.column,
});

/**
 * Recursive-descent parser with Pratt-style expression parsing.
 *
 * A syntax error is reported and unwinds (as a `DiagnosticError`) to the
 * nearest item or statement boundary, where the parser discards tokens until
 * it reaches a synchronization point and carries on. The resulting tree only
 * contains the constructs that parsed cleanly.
 */
export class Parser {
  private readonly lexer: Lexer;
  private readonly emitter = new DiagnosticEmitter();
  private nextNodeId: NodeId = 0;
  private previous?: Token;
  /** Set while the next token directly follows a token the lexer rejected. */
  private afterLexError = false;

  constructor(lexer: Lexer) {
    this.lexer = lexer;
  }

  /** Lexer and parser diagnostics, ordered by source position. */
  get diagnostics(): Diagnostic[] {
    return sortDiagnostics([...this.lexer.diagnostics, ...this.emitter.diagnostics]);
  }

  parseProgram(): Program {
    const first = this.peek();
    const items: Item[] = [];

    while (!this.check("EndOfInput")) {
      const start = this.peek();
      try {
        items.push(this.parseItem());
      } catch (error) {
        this.recover(error);
        this.synchronizeItem(start);
      }
    }

    return {
      kind: "Program",
      id: this.nodeId(),
      span: spanBetween(first.span, this.peek().span),
      file: first.span.file,
      items,
    };
  }

  parseStatement(): Stmt {
    const token = this.peek();
    switch (token.kind) {
      case "Let":
      case "Var":
        return this.parseVarDecl();
      case "If":
        return this.parseIf();
      case "While": {
        this.next();
        const condition = this.parseExpression();
        const body = this.parseBlock();
        return {
          kind: "While",
          id: this.nodeId(),
          span: spanBetween(token.span, body.span),
          condition,
          body,
        };
      }
      case "Return": {
        this.next();
        const value = this.check("Semicolon") ? undefined : this.parseExpression();
        const end = this.expect("Semicolon", "';'");
        return {
          kind: "Return",
          id: this.nodeId(),
          span: spanBetween(token.span, end.span),
          value,
        };
      }
      case "LeftBrace":
        return this.parseBlock();
      default:
        return this.parseSimpleStatement();
    }
  }

  parseExpression(minPower = 0): Expr {
    let left = this.parsePrefix();

    while (true) {
      const token = this.peek();

      if (token.is("LeftParen")) {
        if (callPower <= minPower) break;
        left = this.parseCall(left);
        continue;
      }

      const infix = infixOps.get(token.kind);
      if (!infix || infix.power <= minPower) break;
      this.next();
      const right = this.parseExpression(infix.power);
      left = {
        kind: "BinaryExpr",
        id: this.nodeId(),
        span: spanBetween(left.span, right.span),
        operator: infix.operator,
        left,
        right,
      };
    }

    return left;
  }

  private parseItem(): Item {
    const token = this.peek();
    if (token.is("Fn")) return this.parseFunction();
    if (token.is("Let") || token.is("Var")) return this.parseVarDecl();
    return this.unexpected("a function or variable declaration");
  }

  private parseFunction(): FunctionDecl {
    const keyword = this.expect("Fn", "'fn'");
    const name = this.expect("Identifier", "a function name");
    this.expect("LeftParen", "'('");

    const params: Param[] = [];
    if (!this.check("RightParen")) {
      do {
        params.push(this.parseParam());
      } while (this.match("Comma"));
    }
    this.expect("RightParen", "')'");

    const returnType = this.match("Arrow") ? this.parseTypeRef() : undefined;
    const body = this.parseBlock();

    return {
      kind: "FunctionDecl",
      id: this.nodeId(),
      span: spanBetween(keyword.span, body.span),
      name: name.lexeme,
      nameSpan: name.span,
      params,
      returnType,
      body,
    };
  }

  private parseParam(): Param {
    const name = this.expect("Identifier", "a parameter name");
    this.expect("Colon", "':'");
    const type = this.parseTypeRef();
    return {
      kind: "Param",
      id: this.nodeId(),
      span: spanBetween(name.span, type.span),
      name: name.lexeme,
      type,
    };
  }

  private parseTypeRef(): TypeRef {
    const name = this.expect("Identifier", "a type name");
    return { kind: "TypeRef", id: this.nodeId(), span: name.span, name: name.lexeme };
  }

  private parseVarDecl(): VarDecl {
    const keyword = this.next();
    const name = this.expect("Identifier", "a variable name");
    const type = this.match("Colon") ? this.parseTypeRef() : undefined;
    this.expect("Assign", "'='");
    const initializer = this.parseExpression();
    const end = this.expect("Semicolon", "';'");
    return {
      kind: "VarDecl",
      id: this.nodeId(),
      span: spanBetween(keyword.span, end.span),
      mutable: keyword.is("Var"),
      name: name.lexeme,
      nameSpan: name.span,
      type,
      initializer,
    };
  }

  private parseIf(): If {
    const keyword = this.expect("If", "'if'");
    const condition = this.parseExpression();
    const thenBranch = this.parseBlock();
    let elseBranch: Block | If | undefined;
    if (this.match("Else")) {
      elseBranch = this.check("If") ? this.parseIf() : this.parseBlock();
    }
    return {
      kind: "If",
      id: this.nodeId(),
      span: spanBetween(keyword.span, (elseBranch ?? thenBranch).span),
      condition,
      thenBranch,
      elseBranch,
    };
  }

  private parseBlock(): Block {
    const open = this.expect("LeftBrace", "'{'");
    const statements: Stmt[] = [];

    while (!this.check("RightBrace") && !this.check("EndOfInput")) {
      const start = this.peek();
      try {
        statements.push(this.parseStatement());
      } catch (error) {
        this.recover(error);
        this.synchronizeStatement(start);
      }
    }

    const close = this.peek();
    if (close.is("RightBrace")) {
      this.next();
    } else {
      this.report("'}'", close);
    }

    return {
      kind: "Block",
      id: this.nodeId(),
      span: spanBetween(open.span, close.span),
      statements,
    };
  }

  /** Assignment or expression statement. */
  private parseSimpleStatement(): Stmt {
    const expression = this.parseExpression();

    if (this.match("Assign")) {
      const value = this.parseExpression();
      const end = this.expect("Semicolon", "';'");
      const span = spanBetween(expression.span, end.span);
      if (expression.kind !== "Identifier") {
        // The statement is complete, so report without unwinding and keep the value.
        this.emitter.report({
          code: "PS0003",
          params: { kind: "invalid-assignment-target" },
          span: expression.span,
        });
        return { kind: "ExpressionStatement", id: this.nodeId(), span, expression: value };
      }
      return { kind: "Assignment", id: this.nodeId(), span, target: expression, value };
    }

    const end = this.expect("Semicolon", "';'");
    return {
      kind: "ExpressionStatement",
      id: this.nodeId(),
      span: spanBetween(expression.span, end.span),
      expression,
    };
  }

  private parsePrefix(): Expr {
    const token = this.peek();

    switch (token.kind) {
      case "Int": {
        this.next();
        const value = typeof token.value === "bigint" ? token.value : BigInt(token.lexeme);
        return { kind: "Literal", id: this.nodeId(), span: token.span, value: { type: "Int", value } };
      }
      case "String": {
        this.next();
        const value = typeof token.value === "string" ? token.value : "";
        return {
          kind: "Literal",
          id: this.nodeId(),
          span: token.span,
          value: { type: "String", value },
        };
      }
      case "True":
      case "False":
        this.next();
        return {
          kind: "Literal",
          id: this.nodeId(),
          span: token.span,
          value: { type: "Bool", value: token.is("True") },
        };
      case "Identifier":
        this.next();
        return { kind: "Identifier", id: this.nodeId(), span: token.span, name: token.lexeme };
      case "LeftParen": {
        this.next();
        const inner = this.parseExpression();
        this.expect("RightParen", "')'");
        return inner;
      }
      case "Minus":
      case "Bang": {
        this.next();
        const operand = this.parseExpression(prefixPower);
        return {
          kind: "UnaryExpr",
          id: this.nodeId(),
          span: spanBetween(token.span, operand.span),
          operator: token.is("Minus") ? "-" : "!",
          operand,
        };
      }
      default:
        // The lexer already reported whatever stood here.
        if (this.afterLexError) throw new SyntaxAbort();
        return this.emitter.error({
          code: "PS0002",
          params: { kind: "expected-expression", found: token.describe() },
          span: token.span,
        });
    }
  }

  private parseCall(callee: Expr): Expr {
    this.expect("LeftParen", "'('");
    const args: Expr[] = [];
    if (!this.check("RightParen")) {
      do {
        args.push(this.parseExpression());
      } while (this.match("Comma"));
    }
    const close = this.expect("RightParen", "')'");
    return {
      kind: "Call",
      id: this.nodeId(),
      span: spanBetween(callee.span, close.span),
      callee,
      args,
    };
  }

  private recover(error: unknown) {
    if (error instanceof DiagnosticError || error instanceof SyntaxAbort) return;
    throw error;
  }

  /** Skips to the next `;` (consumed) or statement keyword. */
  private synchronizeStatement(start: Token) {
    while (!this.check("EndOfInput")) {
      const token = this.peek();
      if (token.is("Semicolon")) {
        this.next();
        return;
      }
      if (statementStarts.has(token.kind)) {
        // Never stop on the token the failed statement began with.
        if (token === start && !token.is("RightBrace")) {
          this.next();
          continue;
        }
        return;
      }
      this.next();
    }
  }

  /** Skips to the next top-level declaration keyword outside any braces. */
  private synchronizeItem(start: Token) {
    let depth = 0;
    while (!this.check("EndOfInput")) {
      const token = this.peek();
      if (depth <= 0 && token !== start && itemStarts.has(token.kind)) return;
      if (depth <= 0 && token.is("Semicolon")) {
        this.next();
        return;
      }
      if (token.is("LeftBrace")) depth += 1;
      if (token.is("RightBrace")) depth -= 1;
      this.next();
      if (depth === 0 && token.is("RightBrace")) return;
    }
  }

  private peek(): Token {
    let token = this.lexer.peek();
    // Lexical errors are already reported; the parser never sees them.
    while (token.is("Error")) {
      this.lexer.next();
      this.afterLexError = true;
      token = this.lexer.peek();
    }
    return token;
  }

  private next(): Token {
    const token = this.peek();
    this.lexer.next();
    this.previous = token;
    this.afterLexError = false;
    return token;
  }

  private check(kind: TokenKind): boolean {
    return this.peek().is(kind);
  }

  private match(kind: TokenKind): boolean {
    if (!this.check(kind)) return false;
    this.next();
    return true;
  }

  private expect(kind: TokenKind, expected: string): Token {
    const token = this.peek();
    if (token.is(kind)) return this.next();
    return this.unexpected(expected);
  }

  private unexpected(expected: string): never {
    const token = this.peek();
    return this.emitter.error({
      code: "PS0001",
      params: { kind: "unexpected-token", expected, found: token.describe() },
      span: this.errorSpan(token),
    });
  }

  private report(expected: string, token: Token) {
    this.emitter.report({
      code: "PS0001",
      params: { kind: "unexpected-token", expected, found: token.describe() },
      span: this.errorSpan(token),
    });
  }

  /** Missing terminators are reported right after the previous token. */
  private errorSpan(token: Token): SourceSpan {
    const previous = this.previous;
    if (!token.is("EndOfInput") || !previous) return token.span;
    return {
      file: previous.span.file,
      start: previous.span.end,
      end: previous.span.end,
      line: previous.span.line,
      column: previous.span.column + previous.lexeme.length,
    };
  }

  private nodeId(): NodeId {
    return this.nextNodeId++;
  }
}

export type ParseResult = {
  program: Program;
  diagnostics: Diagnostic[];
};

export const parse = (source: string, filePath = "<input>"): ParseResult => {
  const parser = new Parser(new Lexer(source, filePath));
  const program = parser.parseProgram();
  return { program, diagnostics: parser.diagnostics };
};
