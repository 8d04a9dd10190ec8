import type { ModuleId } from "./ids.js";

export type NominalTypeRef = {
  kind: "nominal";
  name: string;
  moduleId: ModuleId;
  typeArgs?: readonly TypeRef[];
};

export type OptionalTypeRef = {
  kind: "optional";
  inner: TypeRef;
};

export type FunctionTypeRef = {
  kind: "function";
  parameters: readonly TypeRef[];
  returnType: TypeRef;
};

export type TupleTypeRef = {
  kind: "tuple";
  elements: readonly TypeRef[];
};

export type StructuralTypeRef = {
  kind: "structural";
  fields: readonly { name: string; type: TypeRef }[];
};

export type TypeParamRef = {
  kind: "type-param";
  name: string;
};

export type TypeRef =
  | NominalTypeRef
  | OptionalTypeRef
  | FunctionTypeRef
  | TupleTypeRef
  | StructuralTypeRef
  | TypeParamRef;

/** Types a constructor catalog can be built for. */
export type ConstructibleTypeRef = NominalTypeRef | OptionalTypeRef;

export const nominalType = (
  name: string,
  moduleId: ModuleId,
  typeArgs?: readonly TypeRef[]
): NominalTypeRef =>
  typeArgs && typeArgs.length > 0
    ? { kind: "nominal", name, moduleId, typeArgs }
    : { kind: "nominal", name, moduleId };

export const optionalType = (inner: TypeRef): OptionalTypeRef => ({
  kind: "optional",
  inner,
});

export const functionType = (
  parameters: readonly TypeRef[],
  returnType: TypeRef
): FunctionTypeRef => ({ kind: "function", parameters, returnType });

export const tupleType = (elements: readonly TypeRef[]): TupleTypeRef => ({
  kind: "tuple",
  elements,
});

export const structuralType = (
  fields: readonly { name: string; type: TypeRef }[]
): StructuralTypeRef => ({ kind: "structural", fields });

export const typeParam = (name: string): TypeParamRef => ({
  kind: "type-param",
  name,
});

export const isConstructibleTypeRef = (
  type: TypeRef
): type is ConstructibleTypeRef =>
  type.kind === "nominal" || type.kind === "optional";

/**
 * Stable by-value key. Two refs produce the same key exactly when
 * {@link typesEqual} holds.
 */
export const typeKey = (type: TypeRef): string => {
  switch (type.kind) {
    case "nominal": {
      const args = type.typeArgs?.length
        ? `<${type.typeArgs.map(typeKey).join(",")}>`
        : "";
      return `${type.moduleId}::${type.name}${args}`;
    }
    case "optional":
      return `?${typeKey(type.inner)}`;
    case "function":
      return `fn(${type.parameters.map(typeKey).join(",")})->${typeKey(type.returnType)}`;
    case "tuple":
      return `(${type.elements.map(typeKey).join(",")})`;
    case "structural":
      return `{${type.fields
        .map((field) => `${field.name}:${typeKey(field.type)}`)
        .join(",")}}`;
    case "type-param":
      return `'${type.name}`;
  }
};

export const typesEqual = (left: TypeRef, right: TypeRef): boolean =>
  left === right || typeKey(left) === typeKey(right);

export const formatType = (type: TypeRef): string => {
  switch (type.kind) {
    case "nominal":
      return type.typeArgs?.length
        ? `${type.name}<${type.typeArgs.map(formatType).join(", ")}>`
        : type.name;
    case "optional":
      return `${formatType(type.inner)}?`;
    case "function":
      return `(${type.parameters.map(formatType).join(", ")}) -> ${formatType(type.returnType)}`;
    case "tuple":
      return `(${type.elements.map(formatType).join(", ")})`;
    case "structural":
      return `{ ${type.fields
        .map((field) => `${field.name}: ${formatType(field.type)}`)
        .join(", ")} }`;
    case "type-param":
      return type.name;
  }
};
