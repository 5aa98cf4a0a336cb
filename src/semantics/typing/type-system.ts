export type PrimitiveName = "Int" | "Bool" | "String" | "Unit";

export type PrimitiveType = { readonly kind: "primitive"; readonly name: PrimitiveName };

export type FunctionType = {
  readonly kind: "function";
  readonly params: readonly Type[];
  readonly returns: Type;
};

/** Placeholder for expressions whose type could not be determined. */
export type UnknownType = { readonly kind: "unknown" };

export type Type = PrimitiveType | FunctionType | UnknownType;

const primitive = (name: PrimitiveName): PrimitiveType => ({ kind: "primitive", name });

export const intType = primitive("Int");
export const boolType = primitive("Bool");
export const stringType = primitive("String");
export const unitType = primitive("Unit");
export const unknownType: UnknownType = { kind: "unknown" };

export const primitiveTypes: ReadonlyMap<string, PrimitiveType> = new Map(
  [intType, boolType, stringType, unitType].map((type) => [type.name, type])
);

export const functionType = (params: readonly Type[], returns: Type): FunctionType => ({
  kind: "function",
  params,
  returns,
});

export const isPrimitive = (type: Type, name: PrimitiveName): boolean =>
  type.kind === "primitive" && type.name === name;

export const isUnknown = (type: Type): type is UnknownType => type.kind === "unknown";

/** Structural equality. */
export const typeEquals = (left: Type, right: Type): boolean => {
  switch (left.kind) {
    case "primitive":
      return right.kind === "primitive" && right.name === left.name;
    case "unknown":
      return right.kind === "unknown";
    case "function":
      return (
        right.kind === "function" &&
        left.params.length === right.params.length &&
        left.params.every((param, index) => {
          const other = right.params[index];
          return other !== undefined && typeEquals(param, other);
        }) &&
        typeEquals(left.returns, right.returns)
      );
  }
};

/** Unknown is compatible with everything so one error does not cascade. */
export const isCompatible = (expected: Type, found: Type): boolean =>
  isUnknown(expected) || isUnknown(found) || typeEquals(expected, found);

export const formatType = (type: Type): string => {
  switch (type.kind) {
    case "primitive":
      return type.name;
    case "unknown":
      return "{unknown}";
    case "function":
      return `fn(${type.params.map(formatType).join(", ")}) -> ${formatType(type.returns)}`;
  }
};
