import type { NodeId, SymbolId } from "../ids.js";
import type { Type } from "./type-system.js";

export interface TypeTable {
  setExprType(id: NodeId, type: Type): void;
  getExprType(id: NodeId): Type | undefined;
  setSymbolType(symbol: SymbolId, type: Type): void;
  getSymbolType(symbol: SymbolId): Type | undefined;
  exprEntries(): Iterable<[NodeId, Type]>;
}

export const createTypeTable = (): TypeTable => {
  const exprTypes = new Map<NodeId, Type>();
  const symbolTypes = new Map<SymbolId, Type>();

  const setExprType = (id: NodeId, type: Type): void => {
    exprTypes.set(id, type);
  };

  const getExprType = (id: NodeId): Type | undefined => exprTypes.get(id);

  const setSymbolType = (symbol: SymbolId, type: Type): void => {
    symbolTypes.set(symbol, type);
  };

  const getSymbolType = (symbol: SymbolId): Type | undefined =>
    symbolTypes.get(symbol);

  const exprEntries = (): Iterable<[NodeId, Type]> => exprTypes.entries();

  return {
    setExprType,
    getExprType,
    setSymbolType,
    getSymbolType,
    exprEntries,
  };
};
