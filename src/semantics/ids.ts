/**
 * Identifier aliases shared by the resolver, type checker and IR lowering.
 * They are plain numbers so side-tables can key on them directly.
 */
export type { NodeId } from "../parser/ast.js";
export type ScopeId = number;
export type SymbolId = number;
