import type { TypeRef } from "../type-ref.js";
import type { DeclarationIndex } from "./catalog.js";
import type { NonNominalReason, SignatureError } from "./errors.js";
import {
  type ParameterDeclaration,
  type Signature,
  expandedParameters,
} from "./signature.js";

type ExpandedTypeShape =
  | { kind: "concrete" }
  | { kind: "abstract" }
  | { kind: "non-nominal"; reason: NonNominalReason };

/**
 * Classifies the declared type of an expanded parameter. Optional wrappers are
 * looked through here; the catalog is still built for the wrapper itself.
 */
const classifyExpandedType = (
  type: TypeRef,
  index: DeclarationIndex
): ExpandedTypeShape => {
  switch (type.kind) {
    case "optional":
      return classifyExpandedType(type.inner, index);
    case "function":
      return { kind: "non-nominal", reason: "function" };
    case "tuple":
      return { kind: "non-nominal", reason: "tuple" };
    case "structural":
      return { kind: "non-nominal", reason: "structural" };
    case "type-param":
      return { kind: "non-nominal", reason: "type-parameter" };
    case "nominal": {
      if (type.typeArgs && type.typeArgs.length > 0) {
        return { kind: "non-nominal", reason: "generic" };
      }
      const decl = index.describeType(type);
      if (!decl) {
        return { kind: "non-nominal", reason: "unresolved" };
      }
      if (decl.typeParams.length > 0) {
        return { kind: "non-nominal", reason: "generic" };
      }
      switch (decl.kind) {
        case "enum":
          return { kind: "non-nominal", reason: "sum-type" };
        case "interface":
          return { kind: "abstract" };
        case "struct":
        case "class":
          return { kind: "concrete" };
      }
    }
  }
};

const checkPlacement = (expanded: readonly ParameterDeclaration[]) =>
  expanded
    .filter((param) => param.positionalIndex !== 0)
    .map(
      (param): SignatureError => ({
        kind: "invalid-expanded-placement",
        parameterIndex: param.positionalIndex,
      })
    );

const checkUniqueness = (
  expanded: readonly ParameterDeclaration[]
): SignatureError[] =>
  expanded.length > 1
    ? [
        {
          kind: "multiple-expanded-parameters",
          parameterIndices: expanded.map((param) => param.positionalIndex),
        },
      ]
    : [];

const checkOverloads = (
  signature: Signature,
  expanded: readonly ParameterDeclaration[]
): SignatureError[] => {
  const first = expanded[0];
  if (!first || !signature.hasSiblingOverloads) {
    return [];
  }
  return [
    {
      kind: "overload-conflict-with-expanded",
      functionName: signature.name,
      parameterIndex: first.positionalIndex,
    },
  ];
};

const checkTypeKinds = (
  expanded: readonly ParameterDeclaration[],
  index: DeclarationIndex
): SignatureError[] =>
  expanded.flatMap((param): SignatureError[] => {
    const shape = classifyExpandedType(param.declaredType, index);
    switch (shape.kind) {
      case "concrete":
        return [];
      case "abstract":
        return [
          {
            kind: "abstract-type-not-expandable",
            parameterIndex: param.positionalIndex,
            type: param.declaredType,
          },
        ];
      case "non-nominal":
        return [
          {
            kind: "non-nominal-expanded-type",
            parameterIndex: param.positionalIndex,
            type: param.declaredType,
            reason: shape.reason,
          },
        ];
    }
  });

const checkByReference = (expanded: readonly ParameterDeclaration[]) =>
  expanded
    .filter((param) => param.isByReference)
    .map(
      (param): SignatureError => ({
        kind: "by-reference-expanded-conflict",
        parameterIndex: param.positionalIndex,
      })
    );

const checkDefaultAdjacency = (
  signature: Signature,
  expanded: readonly ParameterDeclaration[]
): SignatureError[] => {
  const first = expanded[0];
  const next = signature.parameters.find((param) => param.positionalIndex === 1);
  if (!first || !next || next.isExpanded || !next.hasDefaultValue) {
    return [];
  }
  if (next.positionalIndex === signature.parameters.length - 1) {
    return [];
  }
  return [
    {
      kind: "default-argument-adjacency-violation",
      parameterIndex: next.positionalIndex,
      expandedParameterIndex: first.positionalIndex,
    },
  ];
};

/**
 * Runs every declaration-time legality check and reports all violations
 * together. An empty list means the signature is valid.
 */
export const validateSignature = (
  signature: Signature,
  { index }: { index: DeclarationIndex }
): SignatureError[] => {
  const expanded = expandedParameters(signature);
  if (expanded.length === 0) {
    return [];
  }

  return [
    ...checkPlacement(expanded),
    ...checkUniqueness(expanded),
    ...checkOverloads(signature, expanded),
    ...checkTypeKinds(expanded, index),
    ...checkByReference(expanded),
    ...checkDefaultAdjacency(signature, expanded),
  ];
};
