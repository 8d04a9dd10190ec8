import type { SourceSpan } from "../ids.js";
import type { TypeRef } from "../type-ref.js";
import type { SiteContext } from "../visibility.js";

export type ParameterDeclaration = {
  /** External argument label. `undefined` means callers pass it unlabeled. */
  label?: string;
  /** Internal binding name, used only for diagnostics. */
  name?: string;
  positionalIndex: number;
  declaredType: TypeRef;
  isExpanded: boolean;
  hasDefaultValue: boolean;
  isByReference: boolean;
  span?: SourceSpan;
};

export type Signature = {
  name: string;
  parameters: readonly ParameterDeclaration[];
  /** Supplied by the enclosing overload set. */
  hasSiblingOverloads: boolean;
  /** Where the callable is declared; locks its constructor catalogs. */
  declarationSite: SiteContext;
  span?: SourceSpan;
};

/** Where the argument run for the expanded parameter ends. */
export type ExpansionBoundary =
  | { kind: "end" }
  | { kind: "label"; label: string | undefined };

type ParameterFlags = "isExpanded" | "hasDefaultValue" | "isByReference";

export type ParameterInput = Omit<
  ParameterDeclaration,
  "positionalIndex" | ParameterFlags
> &
  Partial<Pick<ParameterDeclaration, ParameterFlags>>;

/**
 * Builds an immutable signature, numbering parameters in the order given.
 */
export const createSignature = ({
  name,
  parameters,
  declarationSite,
  hasSiblingOverloads = false,
  span,
}: {
  name: string;
  parameters: readonly ParameterInput[];
  declarationSite: SiteContext;
  hasSiblingOverloads?: boolean;
  span?: SourceSpan;
}): Signature =>
  Object.freeze({
    name,
    hasSiblingOverloads,
    declarationSite,
    span,
    parameters: Object.freeze(
      parameters.map((param, positionalIndex) =>
        Object.freeze({
          ...param,
          positionalIndex,
          isExpanded: param.isExpanded ?? false,
          hasDefaultValue: param.hasDefaultValue ?? false,
          isByReference: param.isByReference ?? false,
        })
      )
    ),
  });

export const expandedParameters = (
  signature: Signature
): ParameterDeclaration[] =>
  signature.parameters.filter((param) => param.isExpanded);

export const expandedParameterOf = (
  signature: Signature
): ParameterDeclaration | undefined =>
  signature.parameters.find((param) => param.isExpanded);

export const expansionBoundaryOf = (signature: Signature): ExpansionBoundary => {
  const next = signature.parameters.find((param) => param.positionalIndex === 1);
  return next ? { kind: "label", label: next.label } : { kind: "end" };
};

export const parameterDisplayName = (param: ParameterDeclaration): string =>
  param.name ?? param.label ?? `parameter ${param.positionalIndex + 1}`;
