import {
  DiagnosticEmitter,
  sortDiagnostics,
  type Diagnostic,
  type SourceSpan,
} from "../../diagnostics/index.js";
import {
  walk,
  type Assignment,
  type BinaryExpr,
  type Block,
  type Call,
  type Expr,
  type FunctionDecl,
  type LiteralValue,
  type Program,
  type Stmt,
  type TypeRef,
  type VarDecl,
} from "../../parser/ast.js";
import { builtinFunctions } from "../builtins.js";
import type { SymbolId } from "../ids.js";
import type { ResolutionResult } from "../resolver.js";
import { createTypeTable, type TypeTable } from "./type-table.js";
import {
  boolType,
  formatType,
  functionType,
  intType,
  isCompatible,
  isPrimitive,
  isUnknown,
  primitiveTypes,
  stringType,
  unitType,
  unknownType,
  type FunctionType,
  type Type,
} from "./type-system.js";

export interface TypingResult {
  types: TypeTable;
  /** Global declarations in the order their initializers must run. */
  globalInitOrder: readonly VarDecl[];
  diagnostics: Diagnostic[];
}

class TypeChecker {
  private readonly emitter = new DiagnosticEmitter();
  private readonly types = createTypeTable();
  private readonly globals = new Map<SymbolId, VarDecl>();
  private readonly functions = new Map<SymbolId, FunctionDecl>();
  private readonly checkedGlobals = new Set<SymbolId>();
  private readonly inferring = new Set<SymbolId>();
  private currentReturn: Type = unitType;

  constructor(
    private readonly program: Program,
    private readonly resolution: ResolutionResult
  ) {}

  run(): TypingResult {
    this.seedSymbols();

    for (const [symbol, decl] of this.globals) {
      this.checkGlobal(symbol, decl);
    }
    for (const fn of this.functions.values()) {
      this.checkFunction(fn);
    }

    return {
      types: this.types,
      globalInitOrder: this.orderGlobals(),
      diagnostics: sortDiagnostics(this.emitter.diagnostics),
    };
  }

  /** Types known from signatures and annotations alone. */
  private seedSymbols() {
    const { symbols } = this.resolution;
    for (const id of symbols.symbolsInScope(symbols.builtinScope)) {
      const builtin = builtinFunctions.find((fn) => fn.name === symbols.getSymbol(id).name);
      if (builtin) this.types.setSymbolType(id, builtin.type);
    }

    for (const item of this.program.items) {
      const symbol = this.resolution.declarations.get(item.id);
      if (symbol === undefined) continue;

      if (item.kind === "VarDecl") {
        this.globals.set(symbol, item);
        if (item.type) this.types.setSymbolType(symbol, this.bindingType(item, item.type));
        continue;
      }

      this.functions.set(symbol, item);
      const params = item.params.map((param) => {
        const type = this.bindingType(param, param.type);
        const paramSymbol = this.resolution.declarations.get(param.id);
        if (paramSymbol !== undefined) this.types.setSymbolType(paramSymbol, type);
        return type;
      });
      const returns = item.returnType ? this.typeOfRef(item.returnType) : unitType;
      this.types.setSymbolType(symbol, functionType(params, returns));
    }
  }

  private checkGlobal(symbol: SymbolId, decl: VarDecl): Type {
    if (this.checkedGlobals.has(symbol)) {
      return this.types.getSymbolType(symbol) ?? unknownType;
    }
    // Re-entered through its own initializer; the cycle is reported by orderGlobals.
    if (this.inferring.has(symbol)) return unknownType;

    this.inferring.add(symbol);
    const declared = decl.type ? this.types.getSymbolType(symbol) : undefined;
    const type = this.checkVarDecl(decl, symbol, declared);
    this.inferring.delete(symbol);
    this.checkedGlobals.add(symbol);
    return type;
  }

  private checkFunction(fn: FunctionDecl) {
    const symbol = this.resolution.declarations.get(fn.id);
    const type = symbol === undefined ? undefined : this.types.getSymbolType(symbol);
    this.currentReturn = type?.kind === "function" ? type.returns : unknownType;

    this.checkBlock(fn.body);

    const returns = this.currentReturn;
    if (!isPrimitive(returns, "Unit") && !isUnknown(returns) && !alwaysReturns(fn.body)) {
      this.emitter.report({
        code: "TY0005",
        params: {
          kind: "missing-return",
          functionName: fn.name,
          returnType: formatType(returns),
        },
        span: fn.nameSpan,
      });
    }
  }

  private checkBlock(block: Block) {
    block.statements.forEach((stmt) => this.checkStmt(stmt));
  }

  private checkStmt(stmt: Stmt) {
    switch (stmt.kind) {
      case "VarDecl": {
        const declared = stmt.type ? this.bindingType(stmt, stmt.type) : undefined;
        this.checkVarDecl(stmt, this.resolution.declarations.get(stmt.id), declared);
        return;
      }
      case "Block":
        this.checkBlock(stmt);
        return;
      case "If":
        this.checkExpr(stmt.condition, boolType);
        this.checkBlock(stmt.thenBranch);
        if (stmt.elseBranch) this.checkStmt(stmt.elseBranch);
        return;
      case "While":
        this.checkExpr(stmt.condition, boolType);
        this.checkBlock(stmt.body);
        return;
      case "Return":
        if (stmt.value) {
          this.checkExpr(stmt.value, this.currentReturn);
        } else if (!isCompatible(this.currentReturn, unitType)) {
          this.mismatch(this.currentReturn, unitType, stmt.span);
        }
        return;
      case "Assignment":
        this.checkAssignment(stmt);
        return;
      case "ExpressionStatement":
        this.inferExpr(stmt.expression);
        return;
    }
  }

  private checkVarDecl(
    decl: VarDecl,
    symbol: SymbolId | undefined,
    declared: Type | undefined
  ): Type {
    const found = declared
      ? this.checkExpr(decl.initializer, declared)
      : this.inferExpr(decl.initializer);

    let type = declared ?? found;
    if (!declared && isPrimitive(found, "Unit")) {
      this.reportUnitBinding(decl.name, decl.nameSpan);
      type = unknownType;
    }

    if (symbol !== undefined) this.types.setSymbolType(symbol, type);
    return type;
  }

  private checkAssignment({ target, value }: Assignment) {
    const symbol = this.resolution.bindings.get(target.id);
    const record =
      symbol === undefined ? undefined : this.resolution.symbols.getSymbol(symbol);
    if (symbol === undefined || record?.kind !== "variable") {
      this.inferExpr(value);
      return;
    }

    if (!record.mutable) {
      this.emitter.report({
        code: "TY0004",
        params: { kind: "immutable-assignment", name: target.name },
        span: target.span,
      });
    }

    const type = this.symbolType(symbol);
    this.types.setExprType(target.id, type);
    this.checkExpr(value, type);
  }

  /** Infers `expr` and reports a mismatch against `expected`. */
  private checkExpr(expr: Expr, expected: Type): Type {
    const found = this.inferExpr(expr);
    if (!isCompatible(expected, found)) {
      this.mismatch(expected, found, expr.span);
    }
    return found;
  }

  private inferExpr(expr: Expr): Type {
    const type = this.inferExprType(expr);
    this.types.setExprType(expr.id, type);
    return type;
  }

  private inferExprType(expr: Expr): Type {
    switch (expr.kind) {
      case "Literal":
        return literalType(expr.value);
      case "Identifier": {
        const symbol = this.resolution.bindings.get(expr.id);
        if (symbol === undefined) return unknownType;
        if (this.resolution.symbols.getSymbol(symbol).kind !== "variable") return unknownType;
        return this.symbolType(symbol);
      }
      case "UnaryExpr":
        if (expr.operator === "-") {
          this.checkExpr(expr.operand, intType);
          return intType;
        }
        this.checkExpr(expr.operand, boolType);
        return boolType;
      case "BinaryExpr":
        return this.inferBinary(expr);
      case "Call":
        return this.inferCall(expr);
    }
  }

  private inferBinary(expr: BinaryExpr): Type {
    switch (expr.operator) {
      case "+":
      case "-":
      case "*":
      case "/":
      case "%":
        this.checkExpr(expr.left, intType);
        this.checkExpr(expr.right, intType);
        return intType;
      case "<":
      case "<=":
      case ">":
      case ">=":
        this.checkExpr(expr.left, intType);
        this.checkExpr(expr.right, intType);
        return boolType;
      case "&&":
      case "||":
        this.checkExpr(expr.left, boolType);
        this.checkExpr(expr.right, boolType);
        return boolType;
      case "==":
      case "!=":
        this.checkEquality(expr);
        return boolType;
    }
  }

  /** Equality is defined on Int and Bool only. */
  private checkEquality(expr: BinaryExpr) {
    const left = this.inferExpr(expr.left);
    const right = isUnknown(left)
      ? this.inferExpr(expr.right)
      : this.checkExpr(expr.right, left);
    const operand = isUnknown(left) ? right : left;
    const comparable =
      isUnknown(operand) || isPrimitive(operand, "Int") || isPrimitive(operand, "Bool");
    if (comparable) return;

    this.emitter.report({
      code: "TY0006",
      params: {
        kind: "unsupported-operand",
        operator: expr.operator,
        type: formatType(operand),
      },
      span: expr.span,
    });
  }

  private inferCall(call: Call): Type {
    const signature = this.calleeSignature(call.callee);
    if (!signature) {
      call.args.forEach((arg) => this.inferExpr(arg));
      return unknownType;
    }

    if (call.args.length !== signature.params.length) {
      this.emitter.report({
        code: "TY0002",
        params: {
          kind: "arity-mismatch",
          callee: call.callee.kind === "Identifier" ? call.callee.name : "<expression>",
          expected: signature.params.length,
          found: call.args.length,
        },
        span: call.span,
      });
    }

    call.args.forEach((arg, index) => {
      const param = signature.params[index];
      if (param) {
        this.checkExpr(arg, param);
      } else {
        this.inferExpr(arg);
      }
    });
    return signature.returns;
  }

  /** The callee's function type, or undefined when it cannot be called. */
  private calleeSignature(callee: Expr): FunctionType | undefined {
    if (callee.kind === "Identifier") {
      const symbol = this.resolution.bindings.get(callee.id);
      if (symbol === undefined) return undefined;
      const record = this.resolution.symbols.getSymbol(symbol);
      if (record.kind === "type") return undefined;
      if (record.kind === "function") {
        const type = this.symbolType(symbol);
        this.types.setExprType(callee.id, type);
        return type.kind === "function" ? type : undefined;
      }
    }

    const type = this.inferExpr(callee);
    if (!isUnknown(type)) {
      this.emitter.report({
        code: "TY0003",
        params: { kind: "not-callable", found: formatType(type) },
        span: callee.span,
      });
    }
    return undefined;
  }

  private symbolType(symbol: SymbolId): Type {
    const known = this.types.getSymbolType(symbol);
    if (known) return known;

    const global = this.globals.get(symbol);
    return global ? this.checkGlobal(symbol, global) : unknownType;
  }

  /** Annotation type for a variable or parameter; Unit cannot be stored. */
  private bindingType(decl: { name: string; span: SourceSpan }, ref: TypeRef): Type {
    const type = this.typeOfRef(ref);
    if (isPrimitive(type, "Unit")) {
      this.reportUnitBinding(decl.name, decl.span);
      return unknownType;
    }
    return type;
  }

  private typeOfRef(ref: TypeRef): Type {
    const symbol = this.resolution.bindings.get(ref.id);
    if (symbol === undefined) return unknownType;
    return primitiveTypes.get(this.resolution.symbols.getSymbol(symbol).name) ?? unknownType;
  }

  private reportUnitBinding(name: string, span: SourceSpan) {
    this.emitter.report({
      code: "TY0006",
      params: { kind: "unit-binding", name },
      span,
    });
  }

  private mismatch(expected: Type, found: Type, span: SourceSpan) {
    this.emitter.report({
      code: "TY0001",
      params: {
        kind: "mismatch",
        expected: formatType(expected),
        found: formatType(found),
      },
      span,
    });
  }

  /**
   * Orders globals so that each initializer runs after the globals it reads,
   * directly or through the functions it calls. Cycles are reported once per
   * global that closes one.
   */
  private orderGlobals(): VarDecl[] {
    const order: VarDecl[] = [];
    const state = new Map<SymbolId, "visiting" | "done">();
    const reported = new Set<SymbolId>();

    const visit = (symbol: SymbolId, decl: VarDecl) => {
      const current = state.get(symbol);
      if (current === "done") return;
      if (current === "visiting") {
        if (reported.has(symbol)) return;
        reported.add(symbol);
        this.emitter.report({
          code: "TY0007",
          params: { kind: "cyclic-definition", name: decl.name },
          span: decl.nameSpan,
        });
        return;
      }

      state.set(symbol, "visiting");
      for (const dependency of this.initializerReads(decl)) {
        const dependencyDecl = this.globals.get(dependency);
        if (dependencyDecl) visit(dependency, dependencyDecl);
      }
      state.set(symbol, "done");
      order.push(decl);
    };

    for (const [symbol, decl] of this.globals) visit(symbol, decl);
    return order;
  }

  /** Globals an initializer may read before it finishes. */
  private initializerReads(decl: VarDecl): Set<SymbolId> {
    const reads = new Set<SymbolId>();
    const seenFunctions = new Set<SymbolId>();

    const scan = (root: Expr | Block): void =>
      walk(root, (node) => {
        if (node.kind !== "Identifier") return;
        const symbol = this.resolution.bindings.get(node.id);
        if (symbol === undefined) return;
        const record = this.resolution.symbols.getSymbol(symbol);
        if (record.storage === "global") {
          reads.add(symbol);
          return;
        }
        const fn = this.functions.get(symbol);
        if (fn && !seenFunctions.has(symbol)) {
          seenFunctions.add(symbol);
          scan(fn.body);
        }
      });

    scan(decl.initializer);
    return reads;
  }
}

const literalType = (literal: LiteralValue): Type => {
  switch (literal.type) {
    case "Int":
      return intType;
    case "Bool":
      return boolType;
    case "String":
      return stringType;
  }
};

/** Whether control can never fall off the end of `stmt`. */
export const alwaysReturns = (stmt: Stmt): boolean => {
  switch (stmt.kind) {
    case "Return":
      return true;
    case "Block":
      return stmt.statements.some(alwaysReturns);
    case "If":
      return (
        stmt.elseBranch !== undefined &&
        alwaysReturns(stmt.thenBranch) &&
        alwaysReturns(stmt.elseBranch)
      );
    case "While":
      // Without `break`, `while true` only exits by returning.
      return stmt.condition.kind === "Literal" && stmt.condition.value.type === "Bool"
        ? stmt.condition.value.value
        : false;
    default:
      return false;
  }
};

export const checkProgram = (
  program: Program,
  resolution: ResolutionResult
): TypingResult => new TypeChecker(program, resolution).run();
