import type {
  DeclarationOrder,
  ModuleId,
  PackageId,
  SourceSpan,
} from "../ids.js";
import {
  type ConstructibleTypeRef,
  type NominalTypeRef,
  type TypeRef,
  formatType,
  typesEqual,
} from "../type-ref.js";
import type {
  SiteContext,
  Visibility,
  VisibilityOracle,
} from "../visibility.js";

export type NominalTypeKind = "struct" | "class" | "interface" | "enum";

export type TypeDeclaration = {
  type: NominalTypeRef;
  kind: NominalTypeKind;
  typeParams: readonly string[];
  supertypes: readonly NominalTypeRef[];
  declaringModule: ModuleId;
  declaringPackage: PackageId;
  span?: SourceSpan;
};

export type ConstructorParameter = {
  label?: string;
  type: TypeRef;
};

/** A constructor as the host's declaration index reports it. */
export type ConstructorDeclaration = {
  owningType: ConstructibleTypeRef;
  parameters: readonly ConstructorParameter[];
  visibility: Visibility;
  declaringModule: ModuleId;
  declaringPackage: PackageId;
  declarationOrder: DeclarationOrder;
  span?: SourceSpan;
};

export type ConstructorCandidate = {
  readonly owningType: ConstructibleTypeRef;
  readonly parameterLabels: readonly (string | undefined)[];
  readonly parameterTypes: readonly TypeRef[];
  readonly visibility: Visibility;
  readonly declaringModule: ModuleId;
  readonly declaringPackage: PackageId;
  readonly declarationOrder: DeclarationOrder;
  readonly span?: SourceSpan;
};

export interface DeclarationIndex {
  describeType(type: NominalTypeRef): TypeDeclaration | undefined;
  /**
   * Every constructor usable in ordinary construction syntax, including
   * constructors a class inherits from its supertypes.
   */
  constructorsOf(type: ConstructibleTypeRef): readonly ConstructorDeclaration[];
  /** Changes whenever the constructor set of `type` changes. */
  constructorSetVersion(type: ConstructibleTypeRef): number;
}

const toCandidate = (decl: ConstructorDeclaration): ConstructorCandidate =>
  Object.freeze({
    owningType: decl.owningType,
    parameterLabels: Object.freeze(decl.parameters.map((param) => param.label)),
    parameterTypes: Object.freeze(decl.parameters.map((param) => param.type)),
    visibility: decl.visibility,
    declaringModule: decl.declaringModule,
    declaringPackage: decl.declaringPackage,
    declarationOrder: decl.declarationOrder,
    span: decl.span,
  });

/**
 * Collects the constructors declared directly on `ownerType` that the
 * declaration site could see when it was written. Inherited constructors and
 * constructors declared after the site are left out even if a later call
 * site could reach them.
 */
export const buildConstructorCatalog = ({
  ownerType,
  declarationSite,
  index,
  isVisible,
}: {
  ownerType: ConstructibleTypeRef;
  declarationSite: SiteContext;
  index: DeclarationIndex;
  isVisible: VisibilityOracle;
}): readonly ConstructorCandidate[] =>
  Object.freeze(
    index
      .constructorsOf(ownerType)
      .filter((decl) => typesEqual(decl.owningType, ownerType))
      .filter((decl) => decl.declarationOrder < declarationSite.declarationOrder)
      .filter((decl) => isVisible(decl, declarationSite))
      .sort((a, b) => a.declarationOrder - b.declarationOrder)
      .map(toCandidate)
  );

export const formatConstructorCandidate = (
  candidate: ConstructorCandidate
): string => {
  const params = candidate.parameterLabels.map((label, index) => {
    const type = candidate.parameterTypes[index];
    const typeLabel = type ? formatType(type) : "?";
    return `${label ?? "_"}: ${typeLabel}`;
  });
  return `${formatType(candidate.owningType)}.init(${params.join(", ")})`;
};
