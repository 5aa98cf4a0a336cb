import { escapeString } from "../parser/printer.js";
import type {
  BasicBlock,
  Instruction,
  IrCallee,
  IrFunction,
  IrModule,
  IrVariable,
  Operand,
  Terminator,
} from "./types.js";

type Names = { globals: readonly { name: string }[] };

const printOperand = (operand: Operand): string => {
  switch (operand.kind) {
    case "temp":
      return `%${operand.id}`;
    case "int":
      return operand.value.toString();
    case "bool":
      return String(operand.value);
    case "str":
      return `#${operand.index}`;
  }
};

const printVariable = (variable: IrVariable, names: Names): string =>
  variable.kind === "local"
    ? `$${variable.slot}`
    : `@${names.globals[variable.index]?.name ?? variable.index}`;

const printCall = (callee: IrCallee, args: readonly Operand[]): string =>
  `call ${callee.name}(${args.map(printOperand).join(", ")})`;

const printInstruction = (instruction: Instruction, names: Names): string => {
  switch (instruction.op) {
    case "binary":
      return `%${instruction.dest} = ${instruction.operator} ${printOperand(
        instruction.left
      )}, ${printOperand(instruction.right)}`;
    case "unary":
      return `%${instruction.dest} = ${instruction.operator} ${printOperand(instruction.operand)}`;
    case "load":
      return `%${instruction.dest} = load ${printVariable(instruction.source, names)}`;
    case "store":
      return `store ${printVariable(instruction.target, names)}, ${printOperand(
        instruction.value
      )}`;
    case "call": {
      const call = printCall(instruction.callee, instruction.args);
      return instruction.dest === undefined ? call : `%${instruction.dest} = ${call}`;
    }
  }
};

const printTerminator = (terminator: Terminator): string => {
  switch (terminator.op) {
    case "jump":
      return `jump ${terminator.target}`;
    case "branch":
      return `branch ${printOperand(terminator.condition)}, ${terminator.whenTrue}, ${
        terminator.whenFalse
      }`;
    case "return":
      return terminator.value ? `return ${printOperand(terminator.value)}` : "return";
    case "unreachable":
      return "unreachable";
  }
};

const printBlock = (block: BasicBlock, names: Names): string[] => [
  `${block.label}:`,
  ...block.instructions.map((instruction) => `  ${printInstruction(instruction, names)}`),
  `  ${printTerminator(block.terminator)}`,
];

export const printFunction = (fn: IrFunction, names: Names = { globals: [] }): string => {
  const params = fn.slots.slice(0, fn.paramCount).map((slot) => slot.type);
  const lines = [
    `fn ${fn.name}(${params.join(", ")}) -> ${fn.returnType} {`,
    ...fn.slots.map(
      (slot, index) => `  slot $${index} ${slot.name}: ${slot.type} ${slot.role}`
    ),
    ...fn.blocks.flatMap((block) => printBlock(block, names)),
    "}",
  ];
  return lines.join("\n");
};

/** Textual form of a module, as shown by `--emit ir`. */
export const printModule = (module: IrModule): string => {
  const header = [
    ...module.globals.map((global) => `global @${global.name}: ${global.type}`),
    ...module.strings.map((value, index) => `string #${index} = ${escapeString(value)}`),
  ];
  const functions = [module.initializer, ...module.functions].map((fn) =>
    printFunction(fn, module)
  );
  const sections = header.length > 0 ? [header.join("\n"), ...functions] : functions;
  return sections.join("\n\n") + "\n";
};
