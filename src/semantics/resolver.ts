import {
  DiagnosticEmitter,
  sortDiagnostics,
  type Diagnostic,
  type NameNamespace,
} from "../diagnostics/index.js";
import type {
  Block,
  Expr,
  FunctionDecl,
  Identifier,
  Item,
  Program,
  Stmt,
  TypeRef,
  VarDecl,
} from "../parser/ast.js";
import { createSymbolTable } from "./binder/symbol-table.js";
import type { SymbolLookup, SymbolTable } from "./binder/types.js";
import { builtinFunctions } from "./builtins.js";
import type { NodeId, ScopeId, SymbolId } from "./ids.js";
import { primitiveTypes } from "./typing/type-system.js";

export interface ResolutionResult {
  /** Identifier and TypeRef node → the symbol it names. */
  bindings: ReadonlyMap<NodeId, SymbolId>;
  /** FunctionDecl, Param and VarDecl node → the symbol it declares. */
  declarations: ReadonlyMap<NodeId, SymbolId>;
  /** Program, FunctionDecl and Block node → the scope it opens. */
  scopes: ReadonlyMap<NodeId, ScopeId>;
  symbols: SymbolLookup;
  diagnostics: Diagnostic[];
}

type Lookup =
  | { status: "found"; symbol: SymbolId }
  | { status: "pending" }
  | { status: "missing" };

/**
 * Binds every name in a program to its declaration.
 *
 * Pass one hoists functions and globals into the global scope so top-level
 * items can refer to each other in any order. Pass two walks the bodies with
 * a scope stack. Inside a function or block, a name whose declaration comes
 * later in that scope is an error even when an outer declaration exists,
 * and a variable is not visible inside its own initializer.
 */
class Resolver {
  private readonly table: SymbolTable;
  private readonly emitter = new DiagnosticEmitter();
  private readonly bindings = new Map<NodeId, SymbolId>();
  private readonly declarations = new Map<NodeId, SymbolId>();
  private readonly scopes = new Map<NodeId, ScopeId>();
  /** Declarations not yet reached, per block or function scope, by name. */
  private readonly pending = new Map<ScopeId, Map<string, number>>();

  constructor(private readonly program: Program) {
    this.table = createSymbolTable({ rootOwner: program.id });
  }

  run(): ResolutionResult {
    this.declareBuiltins();

    this.table.enterScope(this.table.rootScope);
    this.scopes.set(this.program.id, this.table.rootScope);
    this.program.items.forEach((item) => this.hoistItem(item));
    this.program.items.forEach((item) => this.resolveItem(item));
    this.table.exitScope();

    return {
      bindings: this.bindings,
      declarations: this.declarations,
      scopes: this.scopes,
      symbols: this.table.freeze(),
      diagnostics: sortDiagnostics(this.emitter.diagnostics),
    };
  }

  private declareBuiltins() {
    for (const name of primitiveTypes.keys()) {
      this.table.declare({
        name,
        kind: "type",
        storage: "builtin",
        mutable: false,
        declaredAt: null,
      });
    }
    for (const builtin of builtinFunctions) {
      this.table.declare({
        name: builtin.name,
        kind: "function",
        storage: "builtin",
        mutable: false,
        declaredAt: null,
      });
    }
  }

  private hoistItem(item: Item) {
    if (item.kind === "FunctionDecl") {
      this.declare(item, {
        name: item.name,
        kind: "function",
        storage: "function",
        mutable: false,
        declaredAt: item.id,
        span: item.nameSpan,
      });
      return;
    }

    this.declareVariable(item, "global");
  }

  private resolveItem(item: Item) {
    if (item.kind === "VarDecl") {
      this.resolveTypeRef(item.type);
      this.resolveExpr(item.initializer);
      return;
    }

    this.resolveFunction(item);
  }

  private resolveFunction(fn: FunctionDecl) {
    // Signatures name types, which live outside the function's own scope.
    fn.params.forEach((param) => this.resolveTypeRef(param.type));
    this.resolveTypeRef(fn.returnType);

    const scope = this.table.createScope({
      parent: this.table.currentScope,
      kind: "function",
      owner: fn.id,
    });
    this.scopes.set(fn.id, scope);
    this.scopes.set(fn.body.id, scope);

    this.table.enterScope(scope);
    for (const param of fn.params) {
      const existing = this.table.lookupLocal(param.name, scope);
      if (existing !== undefined) {
        this.emitter.report({
          code: "NM0002",
          params: {
            kind: "duplicate-parameter",
            name: param.name,
            functionName: fn.name,
          },
          span: param.span,
        });
      }
      const symbol = this.table.declare({
        name: param.name,
        kind: "variable",
        storage: "param",
        mutable: false,
        declaredAt: param.id,
        span: param.span,
        declaredType: param.type,
      });
      this.declarations.set(param.id, symbol);
    }
    this.resolveStatements(fn.body.statements, scope);
    this.table.exitScope();
  }

  private resolveBlock(block: Block) {
    const scope = this.table.createScope({
      parent: this.table.currentScope,
      kind: "block",
      owner: block.id,
    });
    this.scopes.set(block.id, scope);
    this.table.enterScope(scope);
    this.resolveStatements(block.statements, scope);
    this.table.exitScope();
  }

  private resolveStatements(statements: readonly Stmt[], scope: ScopeId) {
    const upcoming = new Map<string, number>();
    statements.forEach((stmt) => {
      if (stmt.kind === "VarDecl") {
        upcoming.set(stmt.name, (upcoming.get(stmt.name) ?? 0) + 1);
      }
    });
    this.pending.set(scope, upcoming);
    statements.forEach((stmt) => this.resolveStmt(stmt));
    this.pending.delete(scope);
  }

  private resolveStmt(stmt: Stmt) {
    switch (stmt.kind) {
      case "VarDecl":
        this.resolveTypeRef(stmt.type);
        this.resolveExpr(stmt.initializer);
        this.markReached(stmt.name);
        this.declareVariable(stmt, "local");
        return;
      case "Block":
        this.resolveBlock(stmt);
        return;
      case "If":
        this.resolveExpr(stmt.condition);
        this.resolveBlock(stmt.thenBranch);
        if (stmt.elseBranch) this.resolveStmt(stmt.elseBranch);
        return;
      case "While":
        this.resolveExpr(stmt.condition);
        this.resolveBlock(stmt.body);
        return;
      case "Return":
        if (stmt.value) this.resolveExpr(stmt.value);
        return;
      case "Assignment":
        this.resolveUse(stmt.target, "value");
        this.resolveExpr(stmt.value);
        return;
      case "ExpressionStatement":
        this.resolveExpr(stmt.expression);
        return;
    }
  }

  private resolveExpr(expr: Expr) {
    switch (expr.kind) {
      case "Identifier":
        this.resolveUse(expr, "value");
        return;
      case "Literal":
        return;
      case "UnaryExpr":
        this.resolveExpr(expr.operand);
        return;
      case "BinaryExpr":
        this.resolveExpr(expr.left);
        this.resolveExpr(expr.right);
        return;
      case "Call":
        if (expr.callee.kind === "Identifier") {
          this.resolveUse(expr.callee, "function");
        } else {
          this.resolveExpr(expr.callee);
        }
        expr.args.forEach((arg) => this.resolveExpr(arg));
        return;
    }
  }

  private resolveUse(ident: Identifier, expected: Exclude<NameNamespace, "type">) {
    const found = this.lookup(ident.name);
    if (found.status === "missing") {
      this.emitter.report({
        code: "NM0001",
        params: { kind: "undefined", name: ident.name, namespace: expected },
        span: ident.span,
      });
      return;
    }
    if (found.status === "pending") {
      this.emitter.report({
        code: "NM0003",
        params: { kind: "used-before-declaration", name: ident.name },
        span: ident.span,
      });
      return;
    }

    this.bindings.set(ident.id, found.symbol);
    const symbol = this.table.getSymbol(found.symbol);
    const misused =
      symbol.kind === "type" || (expected === "value" && symbol.kind === "function");
    if (misused) {
      this.emitter.report({
        code: "NM0004",
        params: { kind: "wrong-kind", name: ident.name, expected, found: symbol.kind },
        span: ident.span,
      });
    }
  }

  private resolveTypeRef(ref: TypeRef | undefined) {
    if (!ref) return;
    // Types are never declared in blocks, so later declarations do not hide them.
    const found = this.table.resolve(ref.name, this.table.currentScope);
    if (found === undefined) {
      this.emitter.report({
        code: "NM0001",
        params: { kind: "undefined", name: ref.name, namespace: "type" },
        span: ref.span,
      });
      return;
    }

    const symbol = this.table.getSymbol(found);
    if (symbol.kind !== "type") {
      this.emitter.report({
        code: "NM0004",
        params: { kind: "wrong-kind", name: ref.name, expected: "type", found: symbol.kind },
        span: ref.span,
      });
      return;
    }
    this.bindings.set(ref.id, found);
  }

  private lookup(name: string): Lookup {
    let scope: ScopeId | null = this.table.currentScope;
    while (scope !== null) {
      const symbol = this.table.lookupLocal(name, scope);
      if (symbol !== undefined) return { status: "found", symbol };
      if (this.pending.get(scope)?.has(name)) return { status: "pending" };
      scope = this.table.getScope(scope).parent;
    }
    return { status: "missing" };
  }

  private markReached(name: string) {
    const upcoming = this.pending.get(this.table.currentScope);
    const count = upcoming?.get(name);
    if (!upcoming || count === undefined) return;
    if (count <= 1) {
      upcoming.delete(name);
    } else {
      upcoming.set(name, count - 1);
    }
  }

  private declareVariable(decl: VarDecl, storage: "global" | "local") {
    this.declare(decl, {
      name: decl.name,
      kind: "variable",
      storage,
      mutable: decl.mutable,
      declaredAt: decl.id,
      span: decl.nameSpan,
      declaredType: decl.type,
    });
  }

  private declare(
    node: FunctionDecl | VarDecl,
    symbol: Parameters<SymbolTable["declare"]>[0]
  ): SymbolId {
    const scope = this.table.currentScope;
    if (this.table.lookupLocal(symbol.name, scope) !== undefined) {
      this.emitter.report({
        code: "NM0002",
        params: { kind: "duplicate-declaration", name: symbol.name },
        span: node.nameSpan,
      });
    }
    const id = this.table.declare(symbol);
    this.declarations.set(node.id, id);
    return id;
  }
}

export const resolveProgram = (program: Program): ResolutionResult =>
  new Resolver(program).run();
