export * from "./ast.js";
export { Lexer, tokenize, type TokenizeResult } from "./lexer.js";
export { Parser, parse, type ParseResult } from "./parser.js";
export {
  escapeString,
  printExpression,
  printItem,
  printProgram,
  printStatement,
} from "./printer.js";
export { Token, type TokenKind, type TokenValue } from "./token.js";
