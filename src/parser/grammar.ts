import type { BinaryOperator } from "./ast.js";
import type { TokenKind } from "./token.js";

export const isWhitespace = (char: string | undefined) =>
  char === " " || char === "\n" || char === "\r" || char === "\t";

export const isDigit = (char: string | undefined): char is string =>
  char !== undefined && char >= "0" && char <= "9";

export const isIdentifierStart = (char: string | undefined): char is string =>
  char !== undefined &&
  ((char >= "a" && char <= "z") || (char >= "A" && char <= "Z") || char === "_");

export const isIdentifierPart = (char: string | undefined): char is string =>
  isIdentifierStart(char) || isDigit(char);

export const keywords: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
  ["fn", "Fn"],
  ["let", "Let"],
  ["var", "Var"],
  ["if", "If"],
  ["else", "Else"],
  ["while", "While"],
  ["return", "Return"],
  ["true", "True"],
  ["false", "False"],
]);

/** Single-character escapes accepted inside string literals. */
export const stringEscapes: ReadonlyMap<string, string> = new Map([
  ["n", "\n"],
  ["t", "\t"],
  ["r", "\r"],
  ["0", "\0"],
  ["\\", "\\"],
  ['"', '"'],
  ["'", "'"],
]);

/** Token kinds the parser synchronizes on after a syntax error. */
export const statementStarts: ReadonlySet<TokenKind> = new Set<TokenKind>([
  "Fn",
  "Let",
  "Var",
  "If",
  "While",
  "Return",
  "LeftBrace",
  "RightBrace",
]);

/** Left binding power of each infix operator; higher binds tighter. */
export const infixOps: ReadonlyMap<TokenKind, { operator: BinaryOperator; power: number }> =
  new Map<TokenKind, { operator: BinaryOperator; power: number }>([
    ["OrOr", { operator: "||", power: 1 }],
    ["AndAnd", { operator: "&&", power: 2 }],
    ["EqualEqual", { operator: "==", power: 3 }],
    ["BangEqual", { operator: "!=", power: 3 }],
    ["Less", { operator: "<", power: 4 }],
    ["LessEqual", { operator: "<=", power: 4 }],
    ["Greater", { operator: ">", power: 4 }],
    ["GreaterEqual", { operator: ">=", power: 4 }],
    ["Plus", { operator: "+", power: 5 }],
    ["Minus", { operator: "-", power: 5 }],
    ["Star", { operator: "*", power: 6 }],
    ["Slash", { operator: "/", power: 6 }],
    ["Percent", { operator: "%", power: 6 }],
  ]);

export const prefixPower = 7;
export const callPower = 8;

/** Binding power of a binary operator, used by the printer to place parentheses. */
export const operatorPower = (operator: BinaryOperator): number => {
  for (const entry of infixOps.values()) {
    if (entry.operator === operator) return entry.power;
  }
  return 0;
};
