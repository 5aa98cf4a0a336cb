import type { SourceSpan } from "../diagnostics/index.js";
import type { BuiltinFunctionName } from "../semantics/builtins.js";

/** Machine-level value categories. Unit has no runtime representation. */
export type IrValueType = "i64" | "bool" | "str";

export type IrReturnType = IrValueType | "unit";

export type Operand =
  | { kind: "temp"; id: number }
  | { kind: "int"; value: bigint }
  | { kind: "bool"; value: boolean }
  /** Index into the module's string pool. */
  | { kind: "str"; index: number };

export type IrVariable =
  | { kind: "local"; slot: number }
  | { kind: "global"; index: number };

export type IrBinaryOp =
  | "add"
  | "sub"
  | "mul"
  | "div"
  | "rem"
  | "eq"
  | "ne"
  | "lt"
  | "le"
  | "gt"
  | "ge";

export type IrUnaryOp = "neg" | "not";

export type IrCallee =
  | { kind: "function"; name: string }
  | { kind: "builtin"; name: BuiltinFunctionName };

export type Instruction =
  | {
      op: "binary";
      operator: IrBinaryOp;
      dest: number;
      left: Operand;
      right: Operand;
    }
  | { op: "unary"; operator: IrUnaryOp; dest: number; operand: Operand }
  | { op: "load"; dest: number; source: IrVariable }
  | { op: "store"; target: IrVariable; value: Operand }
  | { op: "call"; dest?: number; callee: IrCallee; args: Operand[] };

export type Terminator =
  | { op: "jump"; target: string }
  | { op: "branch"; condition: Operand; whenTrue: string; whenFalse: string }
  | { op: "return"; value?: Operand }
  | { op: "unreachable" };

export interface BasicBlock {
  label: string;
  instructions: Instruction[];
  terminator: Terminator;
}

export interface IrSlot {
  name: string;
  type: IrValueType;
  role: "param" | "local" | "synthetic";
}

export interface IrFunction {
  name: string;
  /** Where the function is declared; absent for synthesized functions. */
  span?: SourceSpan;
  /** The first `paramCount` slots hold the parameters, in order. */
  paramCount: number;
  returnType: IrReturnType;
  slots: IrSlot[];
  /** Type of each temporary, indexed by temporary number. */
  temps: IrValueType[];
  /** `blocks[0]` is the entry block. */
  blocks: BasicBlock[];
}

export interface IrGlobal {
  name: string;
  type: IrValueType;
}

export interface IrModule {
  file: string;
  globals: IrGlobal[];
  strings: string[];
  functions: IrFunction[];
  /** Runs every global initializer, in dependency order, before `main`. */
  initializer: IrFunction;
}

export const INITIALIZER_NAME = "$init";

const sourceTypeNames: Record<IrReturnType, string> = {
  i64: "Int",
  bool: "Bool",
  str: "String",
  unit: "Unit",
};

/** `fn(Int, Bool) -> Unit`, in source-level type names. */
export const formatSignature = (fn: IrFunction): string => {
  const params = fn.slots
    .slice(0, fn.paramCount)
    .map((slot) => sourceTypeNames[slot.type]);
  return `fn(${params.join(", ")}) -> ${sourceTypeNames[fn.returnType]}`;
};

export const successors = (terminator: Terminator): string[] => {
  switch (terminator.op) {
    case "jump":
      return [terminator.target];
    case "branch":
      return [terminator.whenTrue, terminator.whenFalse];
    case "return":
    case "unreachable":
      return [];
  }
};
