import type { CallArgument } from "./call.js";
import type { CallResolutionError } from "./errors.js";
import {
  type ExpansionBoundary,
  type ParameterDeclaration,
  type Signature,
  expandedParameterOf,
  expansionBoundaryOf,
} from "./signature.js";

export type Segmentation<TExpr> =
  | { kind: "not-applicable" }
  | {
      kind: "direct";
      parameter: ParameterDeclaration;
      argument: CallArgument<TExpr>;
      remainder: readonly CallArgument<TExpr>[];
    }
  | {
      kind: "empty";
      parameter: ParameterDeclaration;
      remainder: readonly CallArgument<TExpr>[];
    }
  | {
      kind: "expanded";
      parameter: ParameterDeclaration;
      span: readonly CallArgument<TExpr>[];
      remainder: readonly CallArgument<TExpr>[];
    }
  | { kind: "error"; error: CallResolutionError };

const spanLength = <TExpr>(
  args: readonly CallArgument<TExpr>[],
  boundary: ExpansionBoundary
): number => {
  if (boundary.kind === "end") {
    return args.length;
  }
  const { label } = boundary;
  const stop = args.findIndex((arg) => arg.label === label);
  return stop === -1 ? args.length : stop;
};

/**
 * Splits a call's arguments into the run that builds the expanded parameter
 * and the remainder left for ordinary argument matching.
 */
export const segmentArguments = <TExpr>(
  signature: Signature,
  args: readonly CallArgument<TExpr>[]
): Segmentation<TExpr> => {
  const parameter = expandedParameterOf(signature);
  if (!parameter) {
    return { kind: "not-applicable" };
  }

  const first = args[0];
  if (first && first.label === parameter.label) {
    return {
      kind: "direct",
      parameter,
      argument: first,
      remainder: args.slice(1),
    };
  }

  const length = spanLength(args, expansionBoundaryOf(signature));
  const span = args.slice(0, length);
  const remainder = args.slice(length);

  const closureIndex = span.findIndex((arg) => arg.isTrailingClosureForm);
  if (closureIndex !== -1) {
    return {
      kind: "error",
      error: { kind: "trailing-closure-not-allowed", argumentIndex: closureIndex },
    };
  }

  if (span.length === 0) {
    return { kind: "empty", parameter, remainder };
  }

  return { kind: "expanded", parameter, span, remainder };
};
