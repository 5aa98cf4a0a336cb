import { fileSpan, type DiagnosticEmitter } from "../diagnostics/index.js";
import {
  INITIALIZER_NAME,
  type BasicBlock,
  type Instruction,
  type IrBinaryOp,
  type IrCallee,
  type IrFunction,
  type IrModule,
  type IrVariable,
  type Operand,
  type Terminator,
} from "../ir/types.js";
import { incrementCompilerPerfCounter } from "../perf.js";
import type { BuiltinFunctionName } from "../semantics/builtins.js";
import { findEntryPoint } from "./entry.js";

export type NativePlatform = "linux" | "darwin";

export type AssemblyOptions = {
  platform: NativePlatform;
};

/** System V integer argument registers, in order. */
const ARGUMENT_REGISTERS = ["%rdi", "%rsi", "%rdx", "%rcx", "%r8", "%r9"] as const;

const SLOT_SIZE = 8;

const comparisonSuffixes: Partial<Record<IrBinaryOp, string>> = {
  eq: "e",
  ne: "ne",
  lt: "l",
  le: "le",
  gt: "g",
  ge: "ge",
};

const arithmeticMnemonics: Partial<Record<IrBinaryOp, string>> = {
  add: "addq",
  sub: "subq",
  mul: "imulq",
};

const builtinHelpers: Record<BuiltinFunctionName, string> = {
  print_int: "__kindred_print_int",
  print_bool: "__kindred_print_bool",
  print_str: "__kindred_print_str",
};

const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;

/** Naming differences between the ELF and Mach-O flavours of the same code. */
class Symbols {
  constructor(readonly platform: NativePlatform) {}

  global(name: string): string {
    return this.platform === "darwin" ? `_${name}` : name;
  }

  local(name: string): string {
    return this.platform === "darwin" ? `L${name}` : `.L${name}`;
  }

  libc(name: string): string {
    return this.platform === "darwin" ? `_${name}` : `${name}@PLT`;
  }

  function(name: string): string {
    return this.global(name === INITIALIZER_NAME ? "__kindred_init" : `kin_fn_${name}`);
  }

  variable(name: string): string {
    return this.global(`kin_var_${name}`);
  }

  string(index: number): string {
    return this.local(`str.${index}`);
  }

  get readOnlySection(): string {
    return this.platform === "darwin" ? "\t.section\t__TEXT,__const" : "\t.section\t.rodata";
  }
}

const inst = (mnemonic: string, ...operands: string[]): string =>
  operands.length > 0 ? `\t${mnemonic}\t${operands.join(", ")}` : `\t${mnemonic}`;

type FrameContext = {
  fn: IrFunction;
  index: number;
  module: IrModule;
  symbols: Symbols;
  out: string[];
};

const frameSize = (fn: IrFunction): number => {
  const bytes = (fn.slots.length + fn.temps.length) * SLOT_SIZE;
  return Math.ceil(bytes / 16) * 16;
};

const slotAddress = (slot: number): string => `-${SLOT_SIZE * (slot + 1)}(%rbp)`;

const tempAddress = (ctx: FrameContext, temp: number): string =>
  slotAddress(ctx.fn.slots.length + temp);

const blockLabel = (ctx: FrameContext, label: string): string =>
  ctx.symbols.local(`k${ctx.index}.${label}`);

const variableAddress = (ctx: FrameContext, variable: IrVariable): string => {
  if (variable.kind === "local") return slotAddress(variable.slot);
  const global = ctx.module.globals[variable.index];
  if (!global) throw new Error(`unknown global ${variable.index}`);
  return `${ctx.symbols.variable(global.name)}(%rip)`;
};

const loadOperand = (ctx: FrameContext, operand: Operand, register: string) => {
  switch (operand.kind) {
    case "temp":
      ctx.out.push(inst("movq", tempAddress(ctx, operand.id), register));
      return;
    case "int": {
      const fitsImmediate = operand.value >= INT32_MIN && operand.value <= INT32_MAX;
      ctx.out.push(inst(fitsImmediate ? "movq" : "movabsq", `$${operand.value}`, register));
      return;
    }
    case "bool":
      ctx.out.push(inst("movq", operand.value ? "$1" : "$0", register));
      return;
    case "str":
      ctx.out.push(inst("leaq", `${ctx.symbols.string(operand.index)}(%rip)`, register));
      return;
  }
};

const calleeSymbol = (ctx: FrameContext, callee: IrCallee): string =>
  callee.kind === "builtin"
    ? ctx.symbols.global(builtinHelpers[callee.name])
    : ctx.symbols.function(callee.name);

const emitBinary = (
  ctx: FrameContext,
  instruction: Extract<Instruction, { op: "binary" }>
) => {
  const { operator } = instruction;
  loadOperand(ctx, instruction.left, "%rax");
  loadOperand(ctx, instruction.right, "%rcx");

  const arithmetic = arithmeticMnemonics[operator];
  const comparison = comparisonSuffixes[operator];
  let result = "%rax";
  if (arithmetic) {
    ctx.out.push(inst(arithmetic, "%rcx", "%rax"));
  } else if (comparison) {
    ctx.out.push(
      inst("cmpq", "%rcx", "%rax"),
      inst(`set${comparison}`, "%al"),
      inst("movzbq", "%al", "%rax")
    );
  } else {
    // div and rem; a zero divisor raises SIGFPE.
    ctx.out.push(inst("cqto"), inst("idivq", "%rcx"));
    if (operator === "rem") result = "%rdx";
  }
  ctx.out.push(inst("movq", result, tempAddress(ctx, instruction.dest)));
};

const emitInstruction = (ctx: FrameContext, instruction: Instruction) => {
  incrementCompilerPerfCounter("codegen.native.instructions");
  switch (instruction.op) {
    case "binary":
      emitBinary(ctx, instruction);
      return;
    case "unary":
      loadOperand(ctx, instruction.operand, "%rax");
      ctx.out.push(
        instruction.operator === "neg" ? inst("negq", "%rax") : inst("xorq", "$1", "%rax"),
        inst("movq", "%rax", tempAddress(ctx, instruction.dest))
      );
      return;
    case "load":
      ctx.out.push(
        inst("movq", variableAddress(ctx, instruction.source), "%rax"),
        inst("movq", "%rax", tempAddress(ctx, instruction.dest))
      );
      return;
    case "store":
      loadOperand(ctx, instruction.value, "%rax");
      ctx.out.push(inst("movq", "%rax", variableAddress(ctx, instruction.target)));
      return;
    case "call":
      instruction.args.forEach((arg, index) => {
        const register = ARGUMENT_REGISTERS[index];
        if (!register) throw new Error("call has more arguments than registers");
        loadOperand(ctx, arg, register);
      });
      ctx.out.push(inst("call", calleeSymbol(ctx, instruction.callee)));
      if (instruction.dest !== undefined) {
        ctx.out.push(inst("movq", "%rax", tempAddress(ctx, instruction.dest)));
      }
      return;
  }
};

const emitTerminator = (ctx: FrameContext, terminator: Terminator) => {
  switch (terminator.op) {
    case "jump":
      ctx.out.push(inst("jmp", blockLabel(ctx, terminator.target)));
      return;
    case "branch":
      loadOperand(ctx, terminator.condition, "%rax");
      ctx.out.push(
        inst("testq", "%rax", "%rax"),
        inst("jne", blockLabel(ctx, terminator.whenTrue)),
        inst("jmp", blockLabel(ctx, terminator.whenFalse))
      );
      return;
    case "return":
      if (terminator.value) loadOperand(ctx, terminator.value, "%rax");
      ctx.out.push(inst("leave"), inst("ret"));
      return;
    case "unreachable":
      ctx.out.push(inst("ud2"));
      return;
  }
};

const emitBlock = (ctx: FrameContext, block: BasicBlock) => {
  ctx.out.push(`${blockLabel(ctx, block.label)}:`);
  block.instructions.forEach((instruction) => emitInstruction(ctx, instruction));
  emitTerminator(ctx, block.terminator);
};

const emitFunction = (ctx: FrameContext) => {
  const { fn, out } = ctx;
  out.push(
    "",
    `${ctx.symbols.function(fn.name)}:`,
    inst("pushq", "%rbp"),
    inst("movq", "%rsp", "%rbp")
  );
  const size = frameSize(fn);
  if (size > 0) out.push(inst("subq", `$${size}`, "%rsp"));
  for (let param = 0; param < fn.paramCount; param += 1) {
    const register = ARGUMENT_REGISTERS[param];
    if (register) out.push(inst("movq", register, slotAddress(param)));
  }
  fn.blocks.forEach((block) => emitBlock(ctx, block));
};

const emitRuntime = (symbols: Symbols, entry: IrFunction): string[] => [
  "",
  `\t.globl\t${symbols.global("main")}`,
  `${symbols.global("main")}:`,
  inst("pushq", "%rbp"),
  inst("movq", "%rsp", "%rbp"),
  inst("call", symbols.function(INITIALIZER_NAME)),
  inst("call", symbols.function(entry.name)),
  ...(entry.returnType === "unit" ? [inst("xorl", "%eax", "%eax")] : []),
  inst("popq", "%rbp"),
  inst("ret"),
  "",
  `${symbols.global(builtinHelpers.print_int)}:`,
  inst("pushq", "%rbp"),
  inst("movq", "%rsp", "%rbp"),
  inst("movq", "%rdi", "%rsi"),
  inst("leaq", `${symbols.local("fmt.int")}(%rip)`, "%rdi"),
  inst("xorl", "%eax", "%eax"),
  inst("call", symbols.libc("printf")),
  inst("popq", "%rbp"),
  inst("ret"),
  "",
  `${symbols.global(builtinHelpers.print_bool)}:`,
  inst("pushq", "%rbp"),
  inst("movq", "%rsp", "%rbp"),
  inst("leaq", `${symbols.local("bool.false")}(%rip)`, "%rax"),
  inst("leaq", `${symbols.local("bool.true")}(%rip)`, "%rcx"),
  inst("testq", "%rdi", "%rdi"),
  inst("cmovneq", "%rcx", "%rax"),
  inst("movq", "%rax", "%rdi"),
  inst("call", symbols.libc("puts")),
  inst("popq", "%rbp"),
  inst("ret"),
  "",
  `${symbols.global(builtinHelpers.print_str)}:`,
  inst("pushq", "%rbp"),
  inst("movq", "%rsp", "%rbp"),
  inst("call", symbols.libc("puts")),
  inst("popq", "%rbp"),
  inst("ret"),
];

const encodeBytes = (value: string): string => {
  const bytes = [...new TextEncoder().encode(value), 0];
  return `\t.byte\t${bytes.join(", ")}`;
};

const emitData = (module: IrModule, symbols: Symbols): string[] => {
  const out = [
    "",
    symbols.readOnlySection,
    `${symbols.local("fmt.int")}:`,
    '\t.asciz\t"%lld\\n"',
    `${symbols.local("bool.true")}:`,
    '\t.asciz\t"true"',
    `${symbols.local("bool.false")}:`,
    '\t.asciz\t"false"',
  ];
  module.strings.forEach((value, index) => {
    out.push(`${symbols.string(index)}:`, encodeBytes(value));
  });

  if (module.globals.length > 0) {
    out.push("", "\t.data", "\t.p2align\t3");
    module.globals.forEach((global) => {
      out.push(`${symbols.variable(global.name)}:`, "\t.quad\t0");
    });
  }
  return out;
};

/**
 * Renders a module as x86-64 AT&T assembly for the System V ABI. Every
 * slot and temporary lives in its own 8-byte frame slot below `%rbp`;
 * instructions go through `%rax` and `%rcx` and store their result back.
 */
export const generateAssembly = (
  module: IrModule,
  emitter: DiagnosticEmitter,
  options: AssemblyOptions
): string => {
  const entry = findEntryPoint(module, emitter);
  for (const fn of module.functions) {
    if (fn.paramCount > ARGUMENT_REGISTERS.length) {
      emitter.error({
        code: "CG0003",
        params: {
          kind: "too-many-parameters",
          functionName: fn.name,
          count: fn.paramCount,
          limit: ARGUMENT_REGISTERS.length,
        },
        span: fn.span ?? fileSpan(module.file),
      });
    }
  }

  const symbols = new Symbols(options.platform);
  const out = ["\t.text"];
  [module.initializer, ...module.functions].forEach((fn, index) =>
    emitFunction({ fn, index, module, symbols, out })
  );
  out.push(...emitRuntime(symbols, entry), ...emitData(module, symbols));

  if (options.platform === "linux") {
    out.push("", '\t.section\t.note.GNU-stack,"",@progbits');
  }
  return out.join("\n") + "\n";
};
