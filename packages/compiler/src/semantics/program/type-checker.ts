import type { TypeCheckOracle } from "../expansion/resolve-constructor.js";
import {
  type FunctionTypeRef,
  type NominalTypeRef,
  type TupleTypeRef,
  type TypeRef,
  typeKey,
  typesEqual,
} from "../type-ref.js";
import { type Expression, staticTypeOf } from "./expressions.js";
import type { ProgramIndex } from "./program-index.js";

const nominalSatisfies = (
  actual: NominalTypeRef,
  expected: NominalTypeRef,
  index: ProgramIndex,
  seen: Set<string>
): boolean => {
  if (typesEqual(actual, expected)) {
    return true;
  }
  const key = typeKey(actual);
  if (seen.has(key)) {
    return false;
  }
  seen.add(key);
  return index
    .supertypesOf(actual)
    .some((supertype) => nominalSatisfies(supertype, expected, index, seen));
};

const everyPair = (
  actual: readonly TypeRef[],
  expected: readonly TypeRef[],
  check: (actual: TypeRef, expected: TypeRef) => boolean
): boolean =>
  actual.length === expected.length &&
  actual.every((type, position) => {
    const other = expected[position];
    return other !== undefined && check(type, other);
  });

const functionSatisfies = (
  actual: FunctionTypeRef,
  expected: FunctionTypeRef,
  index: ProgramIndex
): boolean =>
  everyPair(expected.parameters, actual.parameters, (param, actualParam) =>
    typeSatisfies(param, actualParam, index)
  ) && typeSatisfies(actual.returnType, expected.returnType, index);

const tupleSatisfies = (
  actual: TupleTypeRef,
  expected: TupleTypeRef,
  index: ProgramIndex
): boolean =>
  everyPair(actual.elements, expected.elements, (element, expectedElement) =>
    typeSatisfies(element, expectedElement, index)
  );

/**
 * Assignability used by the reference program: exact matches, nominal
 * subtyping through declared supertypes, promotion into an optional, and
 * function types with contravariant parameters.
 */
export const typeSatisfies = (
  actual: TypeRef,
  expected: TypeRef,
  index: ProgramIndex
): boolean => {
  if (typesEqual(actual, expected)) {
    return true;
  }

  if (expected.kind === "optional") {
    return actual.kind === "optional"
      ? typeSatisfies(actual.inner, expected.inner, index)
      : typeSatisfies(actual, expected.inner, index);
  }

  switch (actual.kind) {
    case "nominal":
      return (
        expected.kind === "nominal" &&
        nominalSatisfies(actual, expected, index, new Set())
      );
    case "function":
      return (
        expected.kind === "function" && functionSatisfies(actual, expected, index)
      );
    case "tuple":
      return expected.kind === "tuple" && tupleSatisfies(actual, expected, index);
    case "optional":
    case "structural":
    case "type-param":
      return false;
  }
};

export const createTypeChecker =
  (index: ProgramIndex): TypeCheckOracle<Expression> =>
  (expression, expectedType) =>
    typeSatisfies(staticTypeOf(expression), expectedType, index);
