import type {
  DeclarationOrder,
  ModuleId,
  PackageId,
  SourceSpan,
} from "../ids.js";
import type {
  ConstructorDeclaration,
  ConstructorParameter,
  DeclarationIndex,
  NominalTypeKind,
  TypeDeclaration,
} from "../expansion/catalog.js";
import {
  type ConstructibleTypeRef,
  type NominalTypeRef,
  type OptionalTypeRef,
  type TypeRef,
  nominalType,
  typeKey,
} from "../type-ref.js";
import {
  type SiteContext,
  type Visibility,
  publicVisibility,
} from "../visibility.js";

export const STD_MODULE: ModuleId = "std";
export const STD_PACKAGE: PackageId = "std";

export type StdTypes = {
  Int: NominalTypeRef;
  Float: NominalTypeRef;
  Bool: NominalTypeRef;
  String: NominalTypeRef;
};

/**
 * In-memory declaration index. Declarations are stamped in the order they
 * are added, so a site created between two declarations sees only the first.
 */
export class ProgramIndex implements DeclarationIndex {
  #types = new Map<string, TypeDeclaration>();
  #constructors = new Map<string, ConstructorDeclaration[]>();
  #versions = new Map<string, number>();
  #order: DeclarationOrder = 0;
  readonly std: StdTypes;

  constructor() {
    const std = (name: string) =>
      this.declareType({
        name,
        moduleId: STD_MODULE,
        packageId: STD_PACKAGE,
        kind: "struct",
      });
    this.std = {
      Int: std("Int"),
      Float: std("Float"),
      Bool: std("Bool"),
      String: std("String"),
    };
  }

  #nextOrder(): DeclarationOrder {
    this.#order += 1;
    return this.#order;
  }

  declareType({
    name,
    moduleId,
    packageId,
    kind,
    typeParams = [],
    supertypes = [],
    span,
  }: {
    name: string;
    moduleId: ModuleId;
    packageId: PackageId;
    kind: NominalTypeKind;
    typeParams?: readonly string[];
    supertypes?: readonly NominalTypeRef[];
    span?: SourceSpan;
  }): NominalTypeRef {
    const type = nominalType(name, moduleId);
    const key = typeKey(type);
    if (this.#types.has(key)) {
      throw new Error(`type ${name} is already declared in ${moduleId}`);
    }
    this.#nextOrder();
    this.#types.set(key, {
      type,
      kind,
      typeParams,
      supertypes,
      declaringModule: moduleId,
      declaringPackage: packageId,
      span,
    });
    return type;
  }

  declareConstructor({
    owningType,
    parameters,
    moduleId,
    packageId,
    visibility = publicVisibility(),
    span,
  }: {
    owningType: NominalTypeRef;
    parameters: readonly ConstructorParameter[];
    moduleId: ModuleId;
    packageId: PackageId;
    visibility?: Visibility;
    span?: SourceSpan;
  }): ConstructorDeclaration {
    const key = typeKey(owningType);
    if (!this.#types.has(key)) {
      throw new Error(`cannot declare an initializer for unknown type ${owningType.name}`);
    }
    const decl: ConstructorDeclaration = Object.freeze({
      owningType,
      parameters: Object.freeze([...parameters]),
      visibility,
      declaringModule: moduleId,
      declaringPackage: packageId,
      declarationOrder: this.#nextOrder(),
      span,
    });
    this.#constructors.set(key, [...(this.#constructors.get(key) ?? []), decl]);
    this.#versions.set(key, (this.#versions.get(key) ?? 0) + 1);
    return decl;
  }

  /**
   * Stamps a site at the current point of the program. Declarations added
   * afterwards are not visible from it.
   */
  siteAt({
    moduleId,
    packageId,
    enclosingType,
  }: {
    moduleId: ModuleId;
    packageId: PackageId;
    enclosingType?: TypeRef;
  }): SiteContext {
    return Object.freeze({
      moduleId,
      packageId,
      enclosingType,
      declarationOrder: this.#nextOrder(),
    });
  }

  describeType(type: NominalTypeRef): TypeDeclaration | undefined {
    return this.#types.get(typeKey(nominalType(type.name, type.moduleId)));
  }

  lookupType(name: string, moduleId?: ModuleId): NominalTypeRef | undefined {
    for (const decl of this.#types.values()) {
      if (decl.type.name === name && (!moduleId || decl.declaringModule === moduleId)) {
        return decl.type;
      }
    }
    return undefined;
  }

  supertypesOf(type: NominalTypeRef): readonly NominalTypeRef[] {
    return this.describeType(type)?.supertypes ?? [];
  }

  constructorsOf(type: ConstructibleTypeRef): readonly ConstructorDeclaration[] {
    if (type.kind === "optional") {
      return [wrapperConstructor(type)];
    }
    return [...this.#ownConstructors(type), ...this.#inheritedConstructors(type)];
  }

  constructorSetVersion(type: ConstructibleTypeRef): number {
    return type.kind === "optional" ? 0 : (this.#versions.get(typeKey(type)) ?? 0);
  }

  #ownConstructors(type: NominalTypeRef): readonly ConstructorDeclaration[] {
    return this.#constructors.get(typeKey(type)) ?? [];
  }

  #inheritedConstructors(
    type: NominalTypeRef,
    seen: Set<string> = new Set([typeKey(type)])
  ): ConstructorDeclaration[] {
    const decl = this.describeType(type);
    if (decl?.kind !== "class") {
      return [];
    }
    return decl.supertypes.flatMap((supertype) => {
      const key = typeKey(supertype);
      if (seen.has(key) || this.describeType(supertype)?.kind !== "class") {
        return [];
      }
      seen.add(key);
      return [
        ...this.#ownConstructors(supertype),
        ...this.#inheritedConstructors(supertype, seen),
      ];
    });
  }
}

/** The optional wrapper's only initializer wraps a value of the inner type. */
const wrapperConstructor = (type: OptionalTypeRef): ConstructorDeclaration =>
  Object.freeze({
    owningType: type,
    parameters: Object.freeze([{ type: type.inner }]),
    visibility: publicVisibility(),
    declaringModule: STD_MODULE,
    declaringPackage: STD_PACKAGE,
    declarationOrder: 0,
  });
