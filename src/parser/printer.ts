import type { Block, Expr, If, Item, LiteralValue, Program, Stmt } from "./ast.js";
import { operatorPower, prefixPower } from "./grammar.js";

const INDENT = "    ";

const stringEscapes: ReadonlyMap<string, string> = new Map([
  ["\\", "\\\\"],
  ['"', '\\"'],
  ["\n", "\\n"],
  ["\t", "\\t"],
  ["\r", "\\r"],
  ["\0", "\\0"],
]);

export const escapeString = (value: string): string => {
  let out = "";
  for (const char of value) {
    out += stringEscapes.get(char) ?? char;
  }
  return `"${out}"`;
};

/**
 * Renders a syntax tree back to source text. Parentheses are only emitted
 * where precedence or associativity requires them, so parsing the output
 * yields the same tree.
 */
export const printProgram = (program: Program): string =>
  program.items.map((item) => printItem(item)).join("\n\n") + "\n";

export const printItem = (item: Item, indent = ""): string => {
  if (item.kind === "VarDecl") return printStatement(item, indent);
  const params = item.params
    .map((param) => `${param.name}: ${param.type.name}`)
    .join(", ");
  const returns = item.returnType ? ` -> ${item.returnType.name}` : "";
  return `${indent}fn ${item.name}(${params})${returns} ${printBlock(item.body, indent)}`;
};

export const printStatement = (stmt: Stmt, indent = ""): string => {
  switch (stmt.kind) {
    case "VarDecl": {
      const keyword = stmt.mutable ? "var" : "let";
      const type = stmt.type ? `: ${stmt.type.name}` : "";
      return `${indent}${keyword} ${stmt.name}${type} = ${printExpression(stmt.initializer)};`;
    }
    case "Block":
      return `${indent}${printBlock(stmt, indent)}`;
    case "If":
      return `${indent}${printIf(stmt, indent)}`;
    case "While":
      return `${indent}while ${printExpression(stmt.condition)} ${printBlock(stmt.body, indent)}`;
    case "Return":
      return stmt.value
        ? `${indent}return ${printExpression(stmt.value)};`
        : `${indent}return;`;
    case "Assignment":
      return `${indent}${stmt.target.name} = ${printExpression(stmt.value)};`;
    case "ExpressionStatement":
      return `${indent}${printExpression(stmt.expression)};`;
  }
};

const printIf = (node: If, indent: string): string => {
  const head = `if ${printExpression(node.condition)} ${printBlock(node.thenBranch, indent)}`;
  if (!node.elseBranch) return head;
  const tail =
    node.elseBranch.kind === "If"
      ? printIf(node.elseBranch, indent)
      : printBlock(node.elseBranch, indent);
  return `${head} else ${tail}`;
};

const printBlock = (block: Block, indent: string): string => {
  if (block.statements.length === 0) return "{}";
  const inner = indent + INDENT;
  const body = block.statements.map((stmt) => printStatement(stmt, inner));
  return `{\n${body.join("\n")}\n${indent}}`;
};

/** Binding power of the construct at the root of an expression. */
const powerOf = (expr: Expr): number => {
  switch (expr.kind) {
    case "BinaryExpr":
      return operatorPower(expr.operator);
    case "UnaryExpr":
      return prefixPower;
    default:
      return Infinity;
  }
};

const wrapBelow = (expr: Expr, power: number, strict: boolean): string => {
  const text = printExpression(expr);
  const inner = powerOf(expr);
  const needsParens = strict ? inner <= power : inner < power;
  return needsParens ? `(${text})` : text;
};

const printLiteral = (literal: LiteralValue): string => {
  switch (literal.type) {
    case "Int":
      return literal.value.toString();
    case "Bool":
      return literal.value ? "true" : "false";
    case "String":
      return escapeString(literal.value);
  }
};

export const printExpression = (expr: Expr): string => {
  switch (expr.kind) {
    case "Literal":
      return printLiteral(expr.value);
    case "Identifier":
      return expr.name;
    case "UnaryExpr":
      return `${expr.operator}${wrapBelow(expr.operand, prefixPower, false)}`;
    case "BinaryExpr": {
      const power = operatorPower(expr.operator);
      // Operators associate to the left, so an equal-power right operand keeps its parentheses.
      const left = wrapBelow(expr.left, power, false);
      const right = wrapBelow(expr.right, power, true);
      return `${left} ${expr.operator} ${right}`;
    }
    case "Call": {
      const callee = wrapBelow(expr.callee, prefixPower, true);
      const args = expr.args.map((arg) => printExpression(arg)).join(", ");
      return `${callee}(${args})`;
    }
  }
};
