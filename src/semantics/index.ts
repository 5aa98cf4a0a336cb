export { createSymbolTable } from "./binder/symbol-table.js";
export type {
  ScopeInfo,
  ScopeKind,
  StorageRole,
  SymbolKind,
  SymbolLookup,
  SymbolRecord,
  SymbolTable,
} from "./binder/types.js";
export * from "./builtins.js";
export type { NodeId, ScopeId, SymbolId } from "./ids.js";
export { analyzeProgram, type SemanticsResult } from "./pipeline.js";
export { resolveProgram, type ResolutionResult } from "./resolver.js";
export { alwaysReturns, checkProgram, type TypingResult } from "./typing/typechecker.js";
export type { TypeTable } from "./typing/type-table.js";
export * from "./typing/type-system.js";
