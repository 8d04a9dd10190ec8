import type { ConstructibleTypeRef, TypeRef } from "../type-ref.js";
import type { SiteContext, VisibilityOracle } from "../visibility.js";
import { type CallArgument, argumentLabels } from "./call.js";
import type { ConstructorCandidate } from "./catalog.js";
import type { CallResolutionError } from "./errors.js";

export type TypeCheckOracle<TExpr> = (
  expression: TExpr,
  expectedType: TypeRef
) => boolean;

export type ConstructorResolution =
  | { kind: "resolved"; candidate: ConstructorCandidate }
  | { kind: "error"; error: CallResolutionError };

const labelsMatch = (
  candidate: ConstructorCandidate,
  labels: readonly (string | undefined)[]
): boolean =>
  candidate.parameterLabels.length === labels.length &&
  candidate.parameterLabels.every((label, index) => label === labels[index]);

type ArgumentMismatch = { argumentIndex: number; expectedType: TypeRef };

const firstMismatch = <TExpr>(
  candidate: ConstructorCandidate,
  span: readonly CallArgument<TExpr>[],
  typeChecks: TypeCheckOracle<TExpr>
): ArgumentMismatch | undefined => {
  for (const [argumentIndex, expectedType] of candidate.parameterTypes.entries()) {
    const arg = span[argumentIndex];
    if (!arg || !typeChecks(arg.value, expectedType)) {
      return { argumentIndex, expectedType };
    }
  }
  return undefined;
};

/**
 * Picks the constructor an expansion span forwards to. Labels filter first,
 * since they are known before inference; argument types only break ties.
 */
export const resolveConstructor = <TExpr>({
  span,
  catalog,
  ownerType,
  callSite,
  typeChecks,
  isVisible,
}: {
  span: readonly CallArgument<TExpr>[];
  catalog: readonly ConstructorCandidate[];
  ownerType: ConstructibleTypeRef;
  callSite: SiteContext;
  typeChecks: TypeCheckOracle<TExpr>;
  isVisible: VisibilityOracle;
}): ConstructorResolution => {
  const labels = argumentLabels(span);
  const argumentIndices = span.map((_arg, index) => index);
  const survivors = catalog.filter((candidate) => labelsMatch(candidate, labels));

  const noMatch = (
    candidates: readonly ConstructorCandidate[]
  ): ConstructorResolution => ({
    kind: "error",
    error: {
      kind: "no-matching-initializer",
      ownerType,
      argumentLabels: labels,
      argumentIndices,
      candidates,
    },
  });

  if (survivors.length === 0) {
    return noMatch(catalog);
  }

  let chosen: ConstructorCandidate | undefined;
  const [single] = survivors;
  if (single && survivors.length === 1) {
    const mismatch = firstMismatch(single, span, typeChecks);
    if (mismatch) {
      return {
        kind: "error",
        error: { kind: "argument-type-mismatch", candidate: single, ...mismatch },
      };
    }
    chosen = single;
  } else {
    const passing = survivors.filter(
      (candidate) => firstMismatch(candidate, span, typeChecks) === undefined
    );
    if (passing.length > 1) {
      return {
        kind: "error",
        error: {
          kind: "ambiguous-initializer",
          ownerType,
          argumentIndices,
          candidates: passing,
        },
      };
    }
    chosen = passing[0];
  }

  if (!chosen) {
    return noMatch(survivors);
  }

  if (!isVisible(chosen, callSite)) {
    return {
      kind: "error",
      error: {
        kind: "inaccessible-initializer",
        candidate: chosen,
        argumentIndices,
        callSite,
      },
    };
  }

  return { kind: "resolved", candidate: chosen };
};
