import type { DeclarationOrder, ModuleId, PackageId } from "./ids.js";
import { type TypeRef, typeKey, typesEqual } from "./type-ref.js";

export type VisibilityLevel = "object" | "module" | "package" | "public";

export interface Visibility {
  level: VisibilityLevel;
}

export const objectVisibility = (): Visibility => ({ level: "object" });
export const moduleVisibility = (): Visibility => ({ level: "module" });
export const packageVisibility = (): Visibility => ({ level: "package" });
export const publicVisibility = (): Visibility => ({ level: "public" });

export const formatVisibility = (visibility: Visibility): string =>
  visibility.level === "object" ? "pri" : visibility.level;

/**
 * Snapshot of where a declaration or a call is written. Declaration sites
 * and call sites are passed separately and never read from ambient state.
 */
export type SiteContext = {
  moduleId: ModuleId;
  packageId: PackageId;
  /** Type whose body encloses the site, when there is one. */
  enclosingType?: TypeRef;
  /** Declarations stamped at or after this order are not yet visible. */
  declarationOrder: DeclarationOrder;
};

export type VisibleDeclaration = {
  visibility: Visibility;
  declaringModule: ModuleId;
  declaringPackage: PackageId;
  owningType: TypeRef;
};

export type VisibilityOracle = (
  declaration: VisibleDeclaration,
  from: SiteContext
) => boolean;

export const siteContextKey = (site: SiteContext): string => {
  const enclosing = site.enclosingType ? typeKey(site.enclosingType) : "-";
  return `${site.packageId}|${site.moduleId}|${enclosing}|${site.declarationOrder}`;
};

export const canAccessDeclaration: VisibilityOracle = (declaration, from) => {
  const { visibility } = declaration;
  switch (visibility.level) {
    case "public":
      return true;
    case "package":
      return declaration.declaringPackage === from.packageId;
    case "module":
      return (
        declaration.declaringPackage === from.packageId &&
        declaration.declaringModule === from.moduleId
      );
    case "object":
      return (
        from.enclosingType !== undefined &&
        typesEqual(from.enclosingType, declaration.owningType)
      );
  }
};
