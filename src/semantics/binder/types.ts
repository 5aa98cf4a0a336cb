import type { SourceSpan } from "../../diagnostics/index.js";
import type { TypeRef } from "../../parser/ast.js";
import type { NodeId, ScopeId, SymbolId } from "../ids.js";

export type ScopeKind = "builtin" | "global" | "function" | "block";

export type SymbolKind = "variable" | "function" | "type";

/** Where a symbol's value lives at run time. */
export type StorageRole = "builtin" | "global" | "param" | "local" | "function";

export interface ScopeInfo {
  id: ScopeId;
  parent: ScopeId | null;
  kind: ScopeKind;
  /** Program, FunctionDecl or Block that owns the scope; null for builtins. */
  owner: NodeId | null;
}

export interface SymbolRecord {
  id: SymbolId;
  name: string;
  kind: SymbolKind;
  storage: StorageRole;
  mutable: boolean;
  scope: ScopeId;
  /** Declaring node; null for builtins. */
  declaredAt: NodeId | null;
  /** Span of the declared name, for diagnostics that point at a declaration. */
  span?: SourceSpan;
  declaredType?: TypeRef;
}

export interface SymbolTableInit {
  /** Node that owns the global scope, the Program. */
  rootOwner: NodeId;
}

/** Read-only view handed to the passes after resolution. */
export interface SymbolLookup {
  readonly builtinScope: ScopeId;
  readonly rootScope: ScopeId;
  resolve(name: string, fromScope: ScopeId): SymbolId | undefined;
  lookupLocal(name: string, scope: ScopeId): SymbolId | undefined;
  getSymbol(id: SymbolId): Readonly<SymbolRecord>;
  getScope(id: ScopeId): Readonly<ScopeInfo>;
  symbolsInScope(scope: ScopeId): Iterable<SymbolId>;
  readonly symbolCount: number;
}

export interface SymbolTable extends SymbolLookup {
  createScope(info: Omit<ScopeInfo, "id">): ScopeId;
  enterScope(scope: ScopeId): void;
  exitScope(): void;
  readonly currentScope: ScopeId;
  declare(symbol: Omit<SymbolRecord, "id" | "scope">): SymbolId;
  /** Stops further declarations and returns the read-only view. */
  freeze(): SymbolLookup;
}
