import type { SourceSpan } from "../diagnostics/index.js";
import type {
  BinaryExpr,
  Block,
  Expr,
  FunctionDecl,
  If,
  LiteralValue,
  Program,
  Stmt,
  VarDecl,
} from "../parser/ast.js";
import { incrementCompilerPerfCounter } from "../perf.js";
import { isBuiltinFunctionName } from "../semantics/builtins.js";
import type { SymbolId } from "../semantics/ids.js";
import type { SemanticsResult } from "../semantics/pipeline.js";
import type { Type } from "../semantics/typing/type-system.js";
import {
  INITIALIZER_NAME,
  successors,
  type BasicBlock,
  type Instruction,
  type IrBinaryOp,
  type IrCallee,
  type IrFunction,
  type IrGlobal,
  type IrModule,
  type IrReturnType,
  type IrSlot,
  type IrValueType,
  type IrVariable,
  type Operand,
  type Terminator,
} from "./types.js";

const binaryOps: Record<Exclude<BinaryExpr["operator"], "&&" | "||">, IrBinaryOp> = {
  "+": "add",
  "-": "sub",
  "*": "mul",
  "/": "div",
  "%": "rem",
  "==": "eq",
  "!=": "ne",
  "<": "lt",
  "<=": "le",
  ">": "gt",
  ">=": "ge",
};

const toIrType = (type: Type | undefined): IrReturnType => {
  if (type?.kind !== "primitive") {
    throw new Error(`cannot lower a value of type ${type?.kind ?? "unknown"}`);
  }
  switch (type.name) {
    case "Int":
      return "i64";
    case "Bool":
      return "bool";
    case "String":
      return "str";
    case "Unit":
      return "unit";
  }
};

const toValueType = (type: Type | undefined): IrValueType => {
  const lowered = toIrType(type);
  if (lowered === "unit") {
    throw new Error("a Unit value has no storage");
  }
  return lowered;
};

/** State shared by every function in the module. */
class ModuleContext {
  readonly globals: IrGlobal[] = [];
  readonly globalIndex = new Map<SymbolId, number>();
  private readonly strings = new Map<string, number>();

  constructor(readonly semantics: SemanticsResult) {}

  get stringPool(): string[] {
    return [...this.strings.keys()];
  }

  intern(value: string): number {
    const existing = this.strings.get(value);
    if (existing !== undefined) return existing;
    const index = this.strings.size;
    this.strings.set(value, index);
    return index;
  }

  exprType(expr: Expr): Type | undefined {
    return this.semantics.typing.types.getExprType(expr.id);
  }

  symbolType(symbol: SymbolId): Type | undefined {
    return this.semantics.typing.types.getSymbolType(symbol);
  }

  binding(expr: { id: number }): SymbolId {
    const symbol = this.semantics.resolution.bindings.get(expr.id);
    if (symbol === undefined) {
      throw new Error(`node ${expr.id} has no binding`);
    }
    return symbol;
  }

  declaration(node: { id: number }): SymbolId {
    const symbol = this.semantics.resolution.declarations.get(node.id);
    if (symbol === undefined) {
      throw new Error(`node ${node.id} declares no symbol`);
    }
    return symbol;
  }
}

type OpenBlock = { label: string; instructions: Instruction[] };

/**
 * Lowers one function body to basic blocks. Every non-constant
 * subexpression gets a fresh temporary; variables live in numbered slots.
 */
class FunctionLowering {
  private readonly slots: IrSlot[] = [];
  private readonly temps: IrValueType[] = [];
  private readonly blocks: BasicBlock[] = [];
  private readonly slotOf = new Map<SymbolId, number>();
  private current?: OpenBlock = { label: "entry", instructions: [] };
  private nextLabel = 0;

  constructor(
    private readonly ctx: ModuleContext,
    private readonly name: string,
    private readonly returnType: IrReturnType
  ) {}

  addParam(symbol: SymbolId, name: string, type: IrValueType) {
    this.slotOf.set(symbol, this.addSlot({ name, type, role: "param" }));
  }

  lowerBody(statements: readonly Stmt[]) {
    statements.forEach((stmt) => this.lowerStmt(stmt));
  }

  storeGlobal(decl: VarDecl, index: number) {
    const value = this.lowerValue(decl.initializer);
    this.emit({ op: "store", target: { kind: "global", index }, value });
  }

  finish(paramCount: number, span?: SourceSpan): IrFunction {
    if (this.current) {
      // Falling off the end returns Unit; the checker rules it out for other types.
      this.terminate(this.returnType === "unit" ? { op: "return" } : { op: "unreachable" });
    }
    return {
      name: this.name,
      span,
      paramCount,
      returnType: this.returnType,
      slots: this.slots,
      temps: this.temps,
      blocks: pruneUnreachable(this.blocks),
    };
  }

  private lowerStmt(stmt: Stmt) {
    switch (stmt.kind) {
      case "VarDecl": {
        const symbol = this.ctx.declaration(stmt);
        const value = this.lowerValue(stmt.initializer);
        const slot = this.addSlot({
          name: stmt.name,
          type: toValueType(this.ctx.symbolType(symbol)),
          role: "local",
        });
        this.slotOf.set(symbol, slot);
        this.emit({ op: "store", target: { kind: "local", slot }, value });
        return;
      }
      case "Assignment": {
        const value = this.lowerValue(stmt.value);
        this.emit({ op: "store", target: this.variable(this.ctx.binding(stmt.target)), value });
        return;
      }
      case "ExpressionStatement":
        this.lowerExpr(stmt.expression);
        return;
      case "Return":
        this.terminate({
          op: "return",
          value: stmt.value ? this.lowerExpr(stmt.value) : undefined,
        });
        return;
      case "Block":
        this.lowerBody(stmt.statements);
        return;
      case "If":
        this.lowerIf(stmt);
        return;
      case "While": {
        const id = this.nextLabel++;
        const cond = `while.cond.${id}`;
        const body = `while.body.${id}`;
        const end = `while.end.${id}`;
        this.terminate({ op: "jump", target: cond });
        this.startBlock(cond);
        this.lowerCondition(stmt.condition, body, end);
        this.startBlock(body);
        this.lowerBody(stmt.body.statements);
        this.jumpIfOpen(cond);
        this.startBlock(end);
        return;
      }
    }
  }

  private lowerIf(stmt: If) {
    const id = this.nextLabel++;
    const thenLabel = `if.then.${id}`;
    const elseLabel = `if.else.${id}`;
    const end = `if.end.${id}`;

    this.lowerCondition(stmt.condition, thenLabel, stmt.elseBranch ? elseLabel : end);
    this.startBlock(thenLabel);
    this.lowerBranch(stmt.thenBranch);
    this.jumpIfOpen(end);

    if (stmt.elseBranch) {
      this.startBlock(elseLabel);
      this.lowerBranch(stmt.elseBranch);
      this.jumpIfOpen(end);
    }
    this.startBlock(end);
  }

  private lowerBranch(branch: Block | If) {
    if (branch.kind === "If") {
      this.lowerIf(branch);
    } else {
      this.lowerBody(branch.statements);
    }
  }

  /** Branches to `whenTrue` or `whenFalse`; `&&`, `||` and `!` never materialize a value. */
  private lowerCondition(expr: Expr, whenTrue: string, whenFalse: string) {
    if (expr.kind === "BinaryExpr" && (expr.operator === "&&" || expr.operator === "||")) {
      const rhs = `${expr.operator === "&&" ? "and" : "or"}.rhs.${this.nextLabel++}`;
      if (expr.operator === "&&") {
        this.lowerCondition(expr.left, rhs, whenFalse);
      } else {
        this.lowerCondition(expr.left, whenTrue, rhs);
      }
      this.startBlock(rhs);
      this.lowerCondition(expr.right, whenTrue, whenFalse);
      return;
    }

    if (expr.kind === "UnaryExpr" && expr.operator === "!") {
      this.lowerCondition(expr.operand, whenFalse, whenTrue);
      return;
    }

    if (expr.kind === "Literal" && expr.value.type === "Bool") {
      this.terminate({ op: "jump", target: expr.value.value ? whenTrue : whenFalse });
      return;
    }

    const condition = this.lowerValue(expr);
    this.terminate({ op: "branch", condition, whenTrue, whenFalse });
  }

  private lowerValue(expr: Expr): Operand {
    const value = this.lowerExpr(expr);
    if (!value) {
      throw new Error(`expression ${expr.id} has no value`);
    }
    return value;
  }

  /** Lowers `expr`; undefined when it has type Unit. */
  private lowerExpr(expr: Expr): Operand | undefined {
    switch (expr.kind) {
      case "Literal":
        return this.literal(expr.value);
      case "Identifier": {
        const dest = this.newTemp(this.valueType(expr));
        this.emit({ op: "load", dest, source: this.variable(this.ctx.binding(expr)) });
        return { kind: "temp", id: dest };
      }
      case "UnaryExpr": {
        const operand = this.lowerValue(expr.operand);
        const dest = this.newTemp(this.valueType(expr));
        this.emit({
          op: "unary",
          operator: expr.operator === "-" ? "neg" : "not",
          dest,
          operand,
        });
        return { kind: "temp", id: dest };
      }
      case "BinaryExpr": {
        if (expr.operator === "&&" || expr.operator === "||") {
          return this.materializeCondition(expr);
        }
        const left = this.lowerValue(expr.left);
        const right = this.lowerValue(expr.right);
        const dest = this.newTemp(this.valueType(expr));
        this.emit({ op: "binary", operator: binaryOps[expr.operator], dest, left, right });
        return { kind: "temp", id: dest };
      }
      case "Call": {
        if (expr.callee.kind !== "Identifier") {
          throw new Error("only named functions can be called");
        }
        const callee = this.callee(expr.callee.name, this.ctx.binding(expr.callee));
        const args = expr.args.map((arg) => this.lowerValue(arg));
        const returns = toIrType(this.ctx.exprType(expr));
        if (returns === "unit") {
          this.emit({ op: "call", callee, args });
          return undefined;
        }
        const dest = this.newTemp(returns);
        this.emit({ op: "call", dest, callee, args });
        return { kind: "temp", id: dest };
      }
    }
  }

  private literal(value: LiteralValue): Operand {
    switch (value.type) {
      case "Int":
        return { kind: "int", value: value.value };
      case "Bool":
        return { kind: "bool", value: value.value };
      case "String":
        return { kind: "str", index: this.ctx.intern(value.value) };
    }
  }

  /** A short-circuit operator used as a value goes through a hidden Bool slot. */
  private materializeCondition(expr: BinaryExpr): Operand {
    const id = this.nextLabel++;
    const whenTrue = `bool.true.${id}`;
    const whenFalse = `bool.false.${id}`;
    const end = `bool.end.${id}`;
    const slot = this.addSlot({ name: `$bool.${id}`, type: "bool", role: "synthetic" });
    const target: IrVariable = { kind: "local", slot };

    this.lowerCondition(expr, whenTrue, whenFalse);
    this.startBlock(whenTrue);
    this.emit({ op: "store", target, value: { kind: "bool", value: true } });
    this.terminate({ op: "jump", target: end });
    this.startBlock(whenFalse);
    this.emit({ op: "store", target, value: { kind: "bool", value: false } });
    this.terminate({ op: "jump", target: end });
    this.startBlock(end);

    const dest = this.newTemp("bool");
    this.emit({ op: "load", dest, source: target });
    return { kind: "temp", id: dest };
  }

  private callee(name: string, symbol: SymbolId): IrCallee {
    const record = this.ctx.semantics.resolution.symbols.getSymbol(symbol);
    if (record.storage === "builtin" && isBuiltinFunctionName(name)) {
      return { kind: "builtin", name };
    }
    return { kind: "function", name };
  }

  private variable(symbol: SymbolId): IrVariable {
    const slot = this.slotOf.get(symbol);
    if (slot !== undefined) return { kind: "local", slot };
    const index = this.ctx.globalIndex.get(symbol);
    if (index !== undefined) return { kind: "global", index };
    throw new Error(`symbol ${symbol} has no storage in ${this.name}`);
  }

  private valueType(expr: Expr): IrValueType {
    return toValueType(this.ctx.exprType(expr));
  }

  private addSlot(slot: IrSlot): number {
    this.slots.push(slot);
    return this.slots.length - 1;
  }

  private newTemp(type: IrValueType): number {
    this.temps.push(type);
    incrementCompilerPerfCounter("ir.temps");
    return this.temps.length - 1;
  }

  private emit(instruction: Instruction) {
    this.openBlock().instructions.push(instruction);
  }

  /** Code after a return still needs a block; it is pruned once the function is done. */
  private openBlock(): OpenBlock {
    if (!this.current) {
      this.current = { label: `dead.${this.nextLabel++}`, instructions: [] };
    }
    return this.current;
  }

  private terminate(terminator: Terminator) {
    const block = this.openBlock();
    this.blocks.push({ ...block, terminator });
    this.current = undefined;
  }

  private jumpIfOpen(target: string) {
    if (this.current) this.terminate({ op: "jump", target });
  }

  private startBlock(label: string) {
    this.jumpIfOpen(label);
    this.current = { label, instructions: [] };
  }
}

const pruneUnreachable = (blocks: BasicBlock[]): BasicBlock[] => {
  const byLabel = new Map(blocks.map((block) => [block.label, block]));
  const reached = new Set<string>();
  const queue = blocks.slice(0, 1);
  while (queue.length > 0) {
    const block = queue.pop();
    if (!block || reached.has(block.label)) continue;
    reached.add(block.label);
    for (const label of successors(block.terminator)) {
      const next = byLabel.get(label);
      if (next) queue.push(next);
    }
  }
  return blocks.filter((block) => reached.has(block.label));
};

const lowerFunction = (ctx: ModuleContext, fn: FunctionDecl): IrFunction => {
  const type = ctx.symbolType(ctx.declaration(fn));
  if (type?.kind !== "function") {
    throw new Error(`function ${fn.name} has no signature`);
  }

  const lowering = new FunctionLowering(ctx, fn.name, toIrType(type.returns));
  fn.params.forEach((param, index) => {
    lowering.addParam(ctx.declaration(param), param.name, toValueType(type.params[index]));
  });
  lowering.lowerBody(fn.body.statements);
  return lowering.finish(fn.params.length, fn.nameSpan);
};

/**
 * Lowers a checked program to IR. The input must be free of diagnostics:
 * every expression is expected to carry a concrete type.
 */
export const lowerProgram = (program: Program, semantics: SemanticsResult): IrModule => {
  const ctx = new ModuleContext(semantics);

  for (const item of program.items) {
    if (item.kind !== "VarDecl") continue;
    const symbol = ctx.declaration(item);
    ctx.globalIndex.set(symbol, ctx.globals.length);
    ctx.globals.push({ name: item.name, type: toValueType(ctx.symbolType(symbol)) });
  }

  const initializer = new FunctionLowering(ctx, INITIALIZER_NAME, "unit");
  for (const decl of semantics.typing.globalInitOrder) {
    const index = ctx.globalIndex.get(ctx.declaration(decl));
    if (index !== undefined) initializer.storeGlobal(decl, index);
  }

  const functions = program.items.flatMap((item) =>
    item.kind === "FunctionDecl" ? [lowerFunction(ctx, item)] : []
  );

  return {
    file: program.file,
    globals: ctx.globals,
    strings: ctx.stringPool,
    functions,
    initializer: initializer.finish(0),
  };
};
