import {
  type ConstructibleTypeRef,
  type TypeRef,
  isConstructibleTypeRef,
} from "../type-ref.js";
import {
  type SiteContext,
  type VisibilityOracle,
  canAccessDeclaration,
} from "../visibility.js";
import type { CallArgument } from "./call.js";
import {
  type ConstructorCandidate,
  type DeclarationIndex,
  buildConstructorCatalog,
} from "./catalog.js";
import { ConstructorCatalogCache } from "./catalog-cache.js";
import type { NonNominalReason, ResolutionError } from "./errors.js";
import { type TypeCheckOracle, resolveConstructor } from "./resolve-constructor.js";
import { segmentArguments } from "./segment.js";
import type { ParameterDeclaration, Signature } from "./signature.js";

export type ExpansionHost<TExpr> = {
  index: DeclarationIndex;
  typeChecks: TypeCheckOracle<TExpr>;
  /** Defaults to {@link canAccessDeclaration}. */
  isVisible?: VisibilityOracle;
  cache?: ConstructorCatalogCache;
};

export type ResolutionResult<TExpr> =
  | { kind: "not-applicable" }
  | {
      kind: "direct";
      parameter: ParameterDeclaration;
      argument: CallArgument<TExpr>;
      remainder: readonly CallArgument<TExpr>[];
    }
  | {
      kind: "defaulted";
      parameter: ParameterDeclaration;
      remainder: readonly CallArgument<TExpr>[];
    }
  | {
      kind: "constructed";
      parameter: ParameterDeclaration;
      candidate: ConstructorCandidate;
      arguments: readonly CallArgument<TExpr>[];
      remainder: readonly CallArgument<TExpr>[];
    }
  | { kind: "error"; error: ResolutionError };

const nonConstructibleReason = (
  type: Exclude<TypeRef, ConstructibleTypeRef>
): NonNominalReason => {
  switch (type.kind) {
    case "function":
      return "function";
    case "tuple":
      return "tuple";
    case "structural":
      return "structural";
    case "type-param":
      return "type-parameter";
  }
};

/**
 * Returns the frozen catalog for `ownerType` as seen from `declarationSite`,
 * building it on first use.
 */
export const catalogFor = <TExpr>(
  host: ExpansionHost<TExpr>,
  ownerType: ConstructibleTypeRef,
  declarationSite: SiteContext
): readonly ConstructorCandidate[] => {
  const isVisible = host.isVisible ?? canAccessDeclaration;
  const build = () =>
    buildConstructorCatalog({
      ownerType,
      declarationSite,
      index: host.index,
      isVisible,
    });
  if (!host.cache) {
    return build();
  }
  return host.cache.getOrBuild(
    {
      ownerType,
      declarationSite,
      version: host.index.constructorSetVersion(ownerType),
    },
    build
  );
};

/**
 * Decides how a call supplies the expanded parameter of `signature`. The
 * host substitutes the direct value, the default, or the synthesized
 * construction, then matches `remainder` against the rest of the signature.
 */
export const resolveCall = <TExpr>(
  signature: Signature,
  args: readonly CallArgument<TExpr>[],
  { host, callSite }: { host: ExpansionHost<TExpr>; callSite: SiteContext }
): ResolutionResult<TExpr> => {
  const segmentation = segmentArguments(signature, args);
  switch (segmentation.kind) {
    case "not-applicable":
    case "error":
    case "direct":
      return segmentation;
    case "empty":
      if (segmentation.parameter.hasDefaultValue) {
        return {
          kind: "defaulted",
          parameter: segmentation.parameter,
          remainder: segmentation.remainder,
        };
      }
      break;
    case "expanded":
      break;
  }

  const { parameter, remainder } = segmentation;
  const span = segmentation.kind === "expanded" ? segmentation.span : [];
  const ownerType = parameter.declaredType;
  if (!isConstructibleTypeRef(ownerType)) {
    return {
      kind: "error",
      error: {
        kind: "non-nominal-expanded-type",
        parameterIndex: parameter.positionalIndex,
        type: ownerType,
        reason: nonConstructibleReason(ownerType),
      },
    };
  }
  const catalog = catalogFor(host, ownerType, signature.declarationSite);
  const resolution = resolveConstructor({
    span,
    catalog,
    ownerType,
    callSite,
    typeChecks: host.typeChecks,
    isVisible: host.isVisible ?? canAccessDeclaration,
  });

  if (resolution.kind === "error") {
    return resolution;
  }

  return {
    kind: "constructed",
    parameter,
    candidate: resolution.candidate,
    arguments: span,
    remainder,
  };
};
