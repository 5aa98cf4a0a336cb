import binaryen from "binaryen";
import { fileSpan, type DiagnosticEmitter } from "../diagnostics/index.js";
import {
  INITIALIZER_NAME,
  successors,
  type BasicBlock,
  type Instruction,
  type IrBinaryOp,
  type IrFunction,
  type IrGlobal,
  type IrModule,
  type IrValueType,
  type IrVariable,
  type Operand,
} from "../ir/types.js";
import { incrementCompilerPerfCounter } from "../perf.js";
import { builtinFunctions, type BuiltinFunctionName } from "../semantics/builtins.js";
import { findEntryPoint } from "./entry.js";

export const WASM_IMPORT_MODULE = "env";
export const WASM_ENTRY_EXPORT = "_start";
export const WASM_MEMORY_EXPORT = "memory";

/** Strings are laid out from here so that no string lives at address 0. */
const STRING_BASE = 16;
const PAGE_SIZE = 65536;

export type WasmOptions = {
  /** Hand the module to binaryen's optimizer before emitting. */
  optimize: boolean;
};

export type WasmOutput = {
  binary: Uint8Array;
  text: string;
};

type WasmContext = {
  mod: binaryen.Module;
  module: IrModule;
  stringOffsets: readonly number[];
};

type FunctionContext = WasmContext & { fn: IrFunction };

const builtinImports: Record<BuiltinFunctionName, { name: string; param: binaryen.Type }> = {
  print_int: { name: "__kindred_print_int", param: binaryen.i64 },
  print_bool: { name: "__kindred_print_bool", param: binaryen.i32 },
  print_str: { name: "__kindred_print_str", param: binaryen.i32 },
};

/** User functions share a prefix so they never collide with `_start` or runtime names. */
const functionName = (name: string): string =>
  name === INITIALIZER_NAME ? "__kindred_init" : `kin_fn_${name}`;

const valueType = (type: IrValueType): binaryen.Type =>
  type === "i64" ? binaryen.i64 : binaryen.i32;

const returnType = (fn: IrFunction): binaryen.Type =>
  fn.returnType === "unit" ? binaryen.none : valueType(fn.returnType);

const i64Const = (mod: binaryen.Module, value: bigint) =>
  mod.i64.const(Number(BigInt.asIntN(32, value)), Number(BigInt.asIntN(32, value >> 32n)));

const operandType = (ctx: FunctionContext, operand: Operand): IrValueType => {
  switch (operand.kind) {
    case "temp": {
      const type = ctx.fn.temps[operand.id];
      if (!type) throw new Error(`unknown temporary %${operand.id}`);
      return type;
    }
    case "int":
      return "i64";
    case "bool":
      return "bool";
    case "str":
      return "str";
  }
};

const tempIndex = (ctx: FunctionContext, temp: number): number => ctx.fn.slots.length + temp;

const compileOperand = (ctx: FunctionContext, operand: Operand): binaryen.ExpressionRef => {
  const { mod } = ctx;
  switch (operand.kind) {
    case "temp":
      return mod.local.get(tempIndex(ctx, operand.id), valueType(operandType(ctx, operand)));
    case "int":
      return i64Const(mod, operand.value);
    case "bool":
      return mod.i32.const(operand.value ? 1 : 0);
    case "str": {
      const offset = ctx.stringOffsets[operand.index];
      if (offset === undefined) throw new Error(`unknown string #${operand.index}`);
      return mod.i32.const(offset);
    }
  }
};

const compileBinary = (
  ctx: FunctionContext,
  operator: IrBinaryOp,
  left: binaryen.ExpressionRef,
  right: binaryen.ExpressionRef,
  type: IrValueType
): binaryen.ExpressionRef => {
  const { mod } = ctx;
  if (type !== "i64") {
    // Bool equality; the checker allows nothing else on i32 values.
    return operator === "eq" ? mod.i32.eq(left, right) : mod.i32.ne(left, right);
  }
  switch (operator) {
    case "add":
      return mod.i64.add(left, right);
    case "sub":
      return mod.i64.sub(left, right);
    case "mul":
      return mod.i64.mul(left, right);
    case "div":
      return mod.i64.div_s(left, right);
    case "rem":
      return mod.i64.rem_s(left, right);
    case "eq":
      return mod.i64.eq(left, right);
    case "ne":
      return mod.i64.ne(left, right);
    case "lt":
      return mod.i64.lt_s(left, right);
    case "le":
      return mod.i64.le_s(left, right);
    case "gt":
      return mod.i64.gt_s(left, right);
    case "ge":
      return mod.i64.ge_s(left, right);
  }
};

const globalAt = (ctx: WasmContext, index: number): IrGlobal => {
  const global = ctx.module.globals[index];
  if (!global) throw new Error(`unknown global ${index}`);
  return global;
};

const slotType = (ctx: FunctionContext, slot: number): IrValueType => {
  const found = ctx.fn.slots[slot];
  if (!found) throw new Error(`unknown slot $${slot}`);
  return found.type;
};

const compileLoad = (ctx: FunctionContext, source: IrVariable): binaryen.ExpressionRef => {
  if (source.kind === "local") {
    return ctx.mod.local.get(source.slot, valueType(slotType(ctx, source.slot)));
  }
  const global = globalAt(ctx, source.index);
  return ctx.mod.global.get(global.name, valueType(global.type));
};

const compileInstruction = (
  ctx: FunctionContext,
  instruction: Instruction
): binaryen.ExpressionRef => {
  const { mod } = ctx;
  incrementCompilerPerfCounter("codegen.wasm.instructions");
  switch (instruction.op) {
    case "binary": {
      const value = compileBinary(
        ctx,
        instruction.operator,
        compileOperand(ctx, instruction.left),
        compileOperand(ctx, instruction.right),
        operandType(ctx, instruction.left)
      );
      return mod.local.set(tempIndex(ctx, instruction.dest), value);
    }
    case "unary": {
      const operand = compileOperand(ctx, instruction.operand);
      const value =
        instruction.operator === "neg"
          ? mod.i64.sub(i64Const(mod, 0n), operand)
          : mod.i32.eqz(operand);
      return mod.local.set(tempIndex(ctx, instruction.dest), value);
    }
    case "load":
      return mod.local.set(tempIndex(ctx, instruction.dest), compileLoad(ctx, instruction.source));
    case "store": {
      const value = compileOperand(ctx, instruction.value);
      if (instruction.target.kind === "local") {
        return mod.local.set(instruction.target.slot, value);
      }
      return mod.global.set(globalAt(ctx, instruction.target.index).name, value);
    }
    case "call": {
      const args = instruction.args.map((arg) => compileOperand(ctx, arg));
      const { callee } = instruction;
      if (callee.kind === "builtin") {
        return mod.call(builtinImports[callee.name].name, args, binaryen.none);
      }
      const target = ctx.module.functions.find((fn) => fn.name === callee.name);
      if (!target) throw new Error(`unknown function ${callee.name}`);
      const call = mod.call(functionName(callee.name), args, returnType(target));
      return instruction.dest === undefined
        ? call
        : mod.local.set(tempIndex(ctx, instruction.dest), call);
    }
  }
};

const compileBlockBody = (ctx: FunctionContext, block: BasicBlock): binaryen.ExpressionRef => {
  const { mod } = ctx;
  const body = block.instructions.map((instruction) => compileInstruction(ctx, instruction));
  const { terminator } = block;
  if (terminator.op === "return") {
    body.push(mod.return(terminator.value ? compileOperand(ctx, terminator.value) : undefined));
  } else if (terminator.op === "unreachable") {
    body.push(mod.unreachable());
  }
  return mod.block(null, body, binaryen.auto);
};

/** Basic blocks become structured control flow through binaryen's Relooper. */
const compileFunction = (ctx: FunctionContext) => {
  const { mod, fn } = ctx;
  const relooper = new binaryen.Relooper(mod);
  const refs = new Map<string, number>();
  fn.blocks.forEach((block) => {
    refs.set(block.label, relooper.addBlock(compileBlockBody(ctx, block)));
  });

  const lookup = (label: string): number => {
    const ref = refs.get(label);
    if (ref === undefined) throw new Error(`unknown block ${label} in ${fn.name}`);
    return ref;
  };

  for (const block of fn.blocks) {
    const from = lookup(block.label);
    const { terminator } = block;
    if (terminator.op === "branch" && terminator.whenTrue !== terminator.whenFalse) {
      const condition = compileOperand(ctx, terminator.condition);
      relooper.addBranch(from, lookup(terminator.whenTrue), condition, 0);
      relooper.addBranch(from, lookup(terminator.whenFalse), 0, 0);
      continue;
    }
    successors(terminator)
      .slice(0, 1)
      .forEach((label) => relooper.addBranch(from, lookup(label), 0, 0));
  }

  const entry = fn.blocks[0];
  if (!entry) throw new Error(`function ${fn.name} has no blocks`);

  const locals = [
    ...fn.slots.slice(fn.paramCount).map((slot) => valueType(slot.type)),
    ...fn.temps.map(valueType),
  ];
  const labelHelper = fn.slots.length + fn.temps.length;
  const rendered = relooper.renderAndDispose(lookup(entry.label), labelHelper);
  const results = returnType(fn);
  const body =
    results === binaryen.none
      ? rendered
      : mod.block(null, [rendered, mod.unreachable()], binaryen.auto);

  mod.addFunction(
    functionName(fn.name),
    binaryen.createType(fn.slots.slice(0, fn.paramCount).map((slot) => valueType(slot.type))),
    results,
    [...locals, binaryen.i32],
    body
  );
};

const layoutStrings = (strings: readonly string[]) => {
  const encoder = new TextEncoder();
  let offset = STRING_BASE;
  return strings.map((value) => {
    const data = new Uint8Array([...encoder.encode(value), 0]);
    const segment = { offset, data };
    offset += data.length;
    return segment;
  });
};

const addEntryExport = (mod: binaryen.Module, entry: IrFunction) => {
  const init = mod.call(functionName(INITIALIZER_NAME), [], binaryen.none);
  const run = mod.call(functionName(entry.name), [], returnType(entry));
  const status = entry.returnType === "i64" ? [mod.i32.wrap(run)] : [run, mod.i32.const(0)];
  mod.addFunction(
    WASM_ENTRY_EXPORT,
    binaryen.none,
    binaryen.i32,
    [],
    mod.block(null, [init, ...status], binaryen.i32)
  );
  mod.addFunctionExport(WASM_ENTRY_EXPORT, WASM_ENTRY_EXPORT);
};

/**
 * Builds a WebAssembly module. The host supplies `env.print_int(i64)`,
 * `env.print_bool(i32)` and `env.print_str(i32)`, the last receiving the
 * address of a NUL-terminated UTF-8 string in the exported memory.
 * `_start` runs the global initializers and `main`, and returns the exit
 * status.
 */
export const generateWasm = (
  module: IrModule,
  emitter: DiagnosticEmitter,
  options: WasmOptions
): WasmOutput => {
  const entry = findEntryPoint(module, emitter);
  const mod = new binaryen.Module();
  try {
    const segments = layoutStrings(module.strings);
    const end = segments.reduce(
      (max, segment) => Math.max(max, segment.offset + segment.data.length),
      STRING_BASE
    );
    const pages = Math.max(1, Math.ceil(end / PAGE_SIZE));
    mod.setMemory(
      pages,
      pages,
      WASM_MEMORY_EXPORT,
      segments.map((segment) => ({
        offset: mod.i32.const(segment.offset),
        data: segment.data,
        passive: false,
      }))
    );

    builtinFunctions.forEach(({ name }) => {
      const { name: internal, param } = builtinImports[name];
      mod.addFunctionImport(internal, WASM_IMPORT_MODULE, name, param, binaryen.none);
    });

    module.globals.forEach((global) => {
      const zero = global.type === "i64" ? i64Const(mod, 0n) : mod.i32.const(0);
      mod.addGlobal(global.name, valueType(global.type), true, zero);
    });

    const ctx: WasmContext = {
      mod,
      module,
      stringOffsets: segments.map((segment) => segment.offset),
    };
    [module.initializer, ...module.functions].forEach((fn) => compileFunction({ ...ctx, fn }));
    addEntryExport(mod, entry);

    if (!mod.validate()) {
      emitter.error({
        code: "CG0004",
        params: { kind: "invalid-module", target: "wasm" },
        span: fileSpan(module.file),
      });
    }

    if (options.optimize) {
      binaryen.setShrinkLevel(3);
      binaryen.setOptimizeLevel(3);
      mod.optimize();
    }

    return { binary: mod.emitBinary(), text: mod.emitText() };
  } finally {
    mod.dispose();
  }
};
