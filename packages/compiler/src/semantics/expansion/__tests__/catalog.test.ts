import { describe, expect, it } from "vitest";
import { ProgramIndex } from "../../program/index.js";
import { nominalType, optionalType } from "../../type-ref.js";
import {
  canAccessDeclaration,
  moduleVisibility,
  objectVisibility,
  packageVisibility,
} from "../../visibility.js";
import {
  buildConstructorCatalog,
  formatConstructorCandidate,
} from "../catalog.js";
import { ConstructorCatalogCache } from "../catalog-cache.js";
import { createExpansionEngine } from "../engine.js";
import { createSignature } from "../signature.js";
import { MAIN, SHAPES, VENDOR, args, createHost, int } from "./helpers.js";

describe("buildConstructorCatalog", () => {
  it("lists only constructors declared on the type itself", () => {
    const index = new ProgramIndex();
    const Base = index.declareType({ name: "Base", ...MAIN, kind: "class" });
    const Derived = index.declareType({
      name: "Derived",
      ...MAIN,
      kind: "class",
      supertypes: [Base],
    });
    index.declareConstructor({
      owningType: Base,
      parameters: [{ label: "id", type: index.std.Int }],
      ...MAIN,
    });
    index.declareConstructor({
      owningType: Derived,
      parameters: [{ label: "name", type: index.std.String }],
      ...MAIN,
    });

    expect(index.constructorsOf(Derived)).toHaveLength(2);

    const catalog = buildConstructorCatalog({
      ownerType: Derived,
      declarationSite: index.siteAt(MAIN),
      index,
      isVisible: canAccessDeclaration,
    });
    expect(catalog.map(formatConstructorCandidate)).toEqual([
      "Derived.init(name: String)",
    ]);
  });

  it("ignores constructors declared after the declaration site", () => {
    const index = new ProgramIndex();
    const T = index.declareType({ name: "T", ...MAIN, kind: "struct" });
    index.declareConstructor({
      owningType: T,
      parameters: [{ label: "a", type: index.std.Int }],
      ...MAIN,
    });
    const site = index.siteAt(MAIN);
    index.declareConstructor({
      owningType: T,
      parameters: [{ label: "b", type: index.std.Bool }],
      ...MAIN,
    });

    const catalog = buildConstructorCatalog({
      ownerType: T,
      declarationSite: site,
      index,
      isVisible: canAccessDeclaration,
    });
    expect(catalog.map((candidate) => candidate.parameterLabels)).toEqual([["a"]]);
  });

  it("keeps constructors the declaration site can see", () => {
    const index = new ProgramIndex();
    const T = index.declareType({ name: "T", ...SHAPES, kind: "struct" });
    index.declareConstructor({
      owningType: T,
      parameters: [{ label: "pkg", type: index.std.Int }],
      ...SHAPES,
      visibility: packageVisibility(),
    });
    index.declareConstructor({
      owningType: T,
      parameters: [{ label: "mod", type: index.std.Int }],
      ...SHAPES,
      visibility: moduleVisibility(),
    });
    index.declareConstructor({
      owningType: T,
      parameters: [{ label: "own", type: index.std.Int }],
      ...SHAPES,
      visibility: objectVisibility(),
    });

    const labelsFrom = (site: ReturnType<typeof index.siteAt>) =>
      buildConstructorCatalog({
        ownerType: T,
        declarationSite: site,
        index,
        isVisible: canAccessDeclaration,
      }).map((candidate) => candidate.parameterLabels[0]);

    expect(labelsFrom(index.siteAt(MAIN))).toEqual(["pkg"]);
    expect(labelsFrom(index.siteAt(SHAPES))).toEqual(["pkg", "mod"]);
    expect(labelsFrom(index.siteAt({ ...SHAPES, enclosingType: T }))).toEqual([
      "pkg",
      "mod",
      "own",
    ]);
    expect(labelsFrom(index.siteAt(VENDOR))).toEqual([]);
  });

  it("synthesizes the wrapping initializer for optionals", () => {
    const index = new ProgramIndex();
    const T = index.declareType({ name: "T", ...MAIN, kind: "struct" });
    const catalog = buildConstructorCatalog({
      ownerType: optionalType(T),
      declarationSite: index.siteAt(MAIN),
      index,
      isVisible: canAccessDeclaration,
    });
    expect(catalog.map(formatConstructorCandidate)).toEqual(["T?.init(_: T)"]);
  });

  it("returns frozen catalogs", () => {
    const index = new ProgramIndex();
    const T = index.declareType({ name: "T", ...MAIN, kind: "struct" });
    index.declareConstructor({ owningType: T, parameters: [], ...MAIN });
    const catalog = buildConstructorCatalog({
      ownerType: T,
      declarationSite: index.siteAt(MAIN),
      index,
      isVisible: canAccessDeclaration,
    });
    expect(Object.isFrozen(catalog)).toBe(true);
    expect(catalog.every((candidate) => Object.isFrozen(candidate))).toBe(true);
  });
});

describe("call-site accessibility", () => {
  it("rejects a constructor the declaration site sees but the call site does not", () => {
    const index = new ProgramIndex();
    const T = index.declareType({ name: "T", ...SHAPES, kind: "struct" });
    index.declareConstructor({
      owningType: T,
      parameters: [{ label: "a", type: index.std.Int }],
      ...SHAPES,
      visibility: moduleVisibility(),
    });
    const f = createSignature({
      name: "f",
      declarationSite: index.siteAt(SHAPES),
      parameters: [{ label: "x", declaredType: T, isExpanded: true }],
    });
    const engine = createExpansionEngine(createHost(index));
    const call = args(["a", int(index, 1)]);

    const inside = engine.resolveCall(f, call, index.siteAt(SHAPES));
    expect(inside.kind).toBe("constructed");

    const outside = engine.resolveCall(f, call, index.siteAt(MAIN));
    expect(outside.kind).toBe("error");
    if (outside.kind !== "error") return;
    expect(outside.error.kind).toBe("inaccessible-initializer");
  });
});

describe("ConstructorCatalogCache", () => {
  const setup = () => {
    const index = new ProgramIndex();
    const T = index.declareType({ name: "T", ...MAIN, kind: "struct" });
    index.declareConstructor({
      owningType: T,
      parameters: [{ label: "a", type: index.std.Int }],
      ...MAIN,
    });
    const engine = createExpansionEngine(createHost(index));
    return { index, T, engine };
  };

  it("returns the same catalog for the same type and site", () => {
    const { index, T, engine } = setup();
    const site = index.siteAt(MAIN);
    const first = engine.catalogFor(T, site);
    const second = engine.catalogFor(T, site);
    expect(second).toBe(first);
    expect(engine.cache.builds).toBe(1);
  });

  it("builds a separate catalog per declaration site", () => {
    const { index, T, engine } = setup();
    engine.catalogFor(T, index.siteAt(MAIN));
    engine.catalogFor(T, index.siteAt(MAIN));
    expect(engine.cache.size).toBe(2);
  });

  it("rebuilds when the constructor set changes", () => {
    const { index, T, engine } = setup();
    const site = index.siteAt(MAIN);
    const first = engine.catalogFor(T, site);
    index.declareConstructor({
      owningType: T,
      parameters: [{ label: "b", type: index.std.Bool }],
      ...MAIN,
    });
    const second = engine.catalogFor(T, site);
    expect(second).not.toBe(first);
    // Still locked to the declaration site.
    expect(second).toEqual(first);
    expect(engine.cache.builds).toBe(2);
  });

  it("replaces the catalog of an older constructor set", () => {
    const { index, T, engine } = setup();
    const site = index.siteAt(MAIN);
    engine.catalogFor(T, site);
    index.declareConstructor({
      owningType: T,
      parameters: [{ label: "b", type: index.std.Bool }],
      ...MAIN,
    });
    const current = engine.catalogFor(T, site);

    expect(engine.cache.size).toBe(1);
    expect(engine.catalogFor(T, site)).toBe(current);
    expect(engine.cache.builds).toBe(2);
  });

  it("does not let an older version overwrite a newer one", () => {
    const cache = new ConstructorCatalogCache();
    const index = new ProgramIndex();
    const ownerType = nominalType("T", MAIN.moduleId);
    const declarationSite = index.siteAt(MAIN);
    const newer = cache.getOrBuild({ ownerType, declarationSite, version: 2 }, () => []);
    cache.getOrBuild({ ownerType, declarationSite, version: 1 }, () => []);

    expect(cache.getOrBuild({ ownerType, declarationSite, version: 2 }, () => [])).toBe(
      newer
    );
    expect(cache.builds).toBe(2);
  });

  it("drops every entry of an invalidated type", () => {
    const { index, T, engine } = setup();
    const U = index.declareType({ name: "U", ...MAIN, kind: "struct" });
    engine.catalogFor(T, index.siteAt(MAIN));
    engine.catalogFor(T, index.siteAt(MAIN));
    engine.catalogFor(U, index.siteAt(MAIN));

    expect(engine.cache.invalidate(T)).toBe(2);
    expect(engine.cache.size).toBe(1);
  });

  it("keeps the first published entry when a build re-enters", () => {
    const cache = new ConstructorCatalogCache();
    const index = new ProgramIndex();
    const key = {
      ownerType: nominalType("T", MAIN.moduleId),
      declarationSite: index.siteAt(MAIN),
      version: 0,
    };
    const inner = cache.getOrBuild(key, () => []);
    const outer = cache.getOrBuild(key, () => []);
    expect(outer).toBe(inner);

    const cache2 = new ConstructorCatalogCache();
    let nested: readonly unknown[] = [];
    const result = cache2.getOrBuild(key, () => {
      nested = cache2.getOrBuild(key, () => []);
      return [];
    });
    expect(result).toBe(nested);
    expect(cache2.builds).toBe(2);
    expect(cache2.size).toBe(1);
  });
});
