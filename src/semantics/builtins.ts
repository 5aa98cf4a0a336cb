import {
  boolType,
  functionType,
  intType,
  stringType,
  unitType,
  type FunctionType,
} from "./typing/type-system.js";

export type BuiltinFunctionName = "print_int" | "print_bool" | "print_str";

export interface BuiltinFunction {
  name: BuiltinFunctionName;
  type: FunctionType;
}

/** Runtime functions every program can call. Each prints its argument and a newline. */
export const builtinFunctions: readonly BuiltinFunction[] = [
  { name: "print_int", type: functionType([intType], unitType) },
  { name: "print_bool", type: functionType([boolType], unitType) },
  { name: "print_str", type: functionType([stringType], unitType) },
];

export const isBuiltinFunctionName = (name: string): name is BuiltinFunctionName =>
  builtinFunctions.some((builtin) => builtin.name === name);
