import type { ScopeId, SymbolId } from "../ids.js";
import type {
  ScopeInfo,
  SymbolLookup,
  SymbolRecord,
  SymbolTable,
  SymbolTableInit,
} from "./types.js";

interface ScopeBucket {
  info: ScopeInfo;
  locals: SymbolId[];
  nameIndex: Map<string, SymbolId[]>;
}

const cloneScopeInfo = (info: ScopeInfo): ScopeInfo => ({ ...info });

const cloneSymbolRecord = (symbol: SymbolRecord): SymbolRecord => ({ ...symbol });

const ensureScopeExists = (
  bucket: ScopeBucket | undefined,
  scope: ScopeId
): ScopeBucket => {
  if (!bucket) {
    throw new Error(`symbol table scope ${scope} does not exist`);
  }

  return bucket;
};

/**
 * Scope tree plus symbol storage. The table starts with two scopes: the
 * builtin scope holding primitive types and runtime functions, and the
 * global scope (its child) where top-level items are declared.
 */
export const createSymbolTable = (init: SymbolTableInit): SymbolTable => {
  let nextScope: ScopeId = 0;
  let nextSymbol: SymbolId = 0;
  let frozen = false;

  const scopeBuckets: ScopeBucket[] = [];
  const symbolRecords: SymbolRecord[] = [];
  const scopeStack: ScopeId[] = [];

  const assertMutable = (operation: string): void => {
    if (frozen) {
      throw new Error(`cannot ${operation} after the symbol table is frozen`);
    }
  };

  const createBucket = (info: Omit<ScopeInfo, "id">): ScopeId => {
    if (typeof info.parent === "number" && !scopeBuckets[info.parent]) {
      throw new Error(
        `cannot create scope without registering parent ${info.parent}`
      );
    }

    const id = nextScope++;
    scopeBuckets[id] = {
      info: { ...info, id },
      locals: [],
      nameIndex: new Map(),
    };
    return id;
  };

  const builtinScope = createBucket({ parent: null, kind: "builtin", owner: null });
  const rootScope = createBucket({
    parent: builtinScope,
    kind: "global",
    owner: init.rootOwner,
  });
  scopeStack.push(builtinScope);

  const currentScope = (): ScopeId => {
    const scope = scopeStack.at(-1);
    if (scope === undefined) {
      throw new Error("symbol table scope stack underflow");
    }

    return scope;
  };

  const enterScope = (scope: ScopeId): void => {
    ensureScopeExists(scopeBuckets[scope], scope);
    scopeStack.push(scope);
  };

  const exitScope = (): void => {
    if (scopeStack.length <= 1) {
      throw new Error("attempted to exit the builtin scope");
    }

    scopeStack.pop();
  };

  const createScope = (info: Omit<ScopeInfo, "id">): ScopeId => {
    assertMutable("create a scope");
    return createBucket(info);
  };

  const declare = (symbol: Omit<SymbolRecord, "id" | "scope">): SymbolId => {
    assertMutable("declare a symbol");
    const scope = currentScope();
    const id = nextSymbol++;
    const record: SymbolRecord = { ...symbol, id, scope };
    symbolRecords[id] = record;

    const bucket = ensureScopeExists(scopeBuckets[scope], scope);
    bucket.locals.push(id);
    const hits = bucket.nameIndex.get(record.name);
    if (hits) {
      hits.push(id);
    } else {
      bucket.nameIndex.set(record.name, [id]);
    }

    return id;
  };

  const getScope = (id: ScopeId): Readonly<ScopeInfo> =>
    cloneScopeInfo(ensureScopeExists(scopeBuckets[id], id).info);

  const getSymbol = (id: SymbolId): Readonly<SymbolRecord> => {
    const record = symbolRecords[id];
    if (!record) {
      throw new Error(`symbol ${id} does not exist`);
    }

    return cloneSymbolRecord(record);
  };

  const lookupLocal = (name: string, scope: ScopeId): SymbolId | undefined =>
    ensureScopeExists(scopeBuckets[scope], scope).nameIndex.get(name)?.[0];

  const resolve = (name: string, fromScope: ScopeId): SymbolId | undefined => {
    let scope: ScopeId | null = fromScope;
    while (scope !== null) {
      const bucket = ensureScopeExists(scopeBuckets[scope], scope);
      const hit = bucket.nameIndex.get(name)?.[0];
      if (hit !== undefined) {
        return hit;
      }

      scope = bucket.info.parent;
    }

    return undefined;
  };

  const symbolsInScope = function* (
    scope: ScopeId
  ): IterableIterator<SymbolId> {
    const bucket = ensureScopeExists(scopeBuckets[scope], scope);
    yield* bucket.locals;
  };

  const lookup: SymbolLookup = {
    builtinScope,
    rootScope,
    resolve,
    lookupLocal,
    getSymbol,
    getScope,
    symbolsInScope,
    get symbolCount() {
      return symbolRecords.length;
    },
  };

  const freeze = (): SymbolLookup => {
    frozen = true;
    return lookup;
  };

  return {
    ...lookup,
    get symbolCount() {
      return symbolRecords.length;
    },
    get currentScope() {
      return currentScope();
    },
    createScope,
    enterScope,
    exitScope,
    declare,
    freeze,
  };
};
