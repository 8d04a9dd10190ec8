import { readFile } from "node:fs/promises";
import type { NominalTypeKind } from "@expandc/compiler/semantics/expansion/catalog.js";
import type { VisibilityLevel } from "@expandc/compiler/semantics/visibility.js";
import type {
  Scenario,
  ScenarioArgument,
  ScenarioCall,
  ScenarioConstructor,
  ScenarioConstructorParameter,
  ScenarioFunction,
  ScenarioModule,
  ScenarioParameter,
  ScenarioSpan,
  ScenarioType,
} from "./types.js";

export class ScenarioError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.path = path;
  }
}

type JsonObject = { [key: string]: unknown };

const TYPE_KINDS: readonly NominalTypeKind[] = ["struct", "class", "interface", "enum"];
const VISIBILITY_LEVELS: readonly VisibilityLevel[] = [
  "object",
  "module",
  "package",
  "public",
];

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const expectObject = (value: unknown, path: string): JsonObject => {
  if (!isObject(value)) throw new ScenarioError(path, "expected an object");
  return value;
};

const expectArray = (value: unknown, path: string): unknown[] => {
  if (!Array.isArray(value)) throw new ScenarioError(path, "expected an array");
  return value;
};

const expectString = (value: unknown, path: string): string => {
  if (typeof value !== "string") throw new ScenarioError(path, "expected a string");
  return value;
};

const optionalString = (value: unknown, path: string): string | undefined =>
  value === undefined || value === null ? undefined : expectString(value, path);

const optionalBoolean = (value: unknown, path: string): boolean => {
  if (value === undefined) return false;
  if (typeof value !== "boolean") throw new ScenarioError(path, "expected a boolean");
  return value;
};

const optionalSpan = (value: unknown, path: string): ScenarioSpan | undefined => {
  if (value === undefined) return undefined;
  const [start, end, ...rest] = expectArray(value, path);
  if (
    typeof start !== "number" ||
    typeof end !== "number" ||
    rest.length > 0 ||
    start > end
  ) {
    throw new ScenarioError(path, "expected a [start, end] pair");
  }
  return [start, end];
};

const oneOf = <T extends string>(
  value: unknown,
  allowed: readonly T[],
  path: string
): T => {
  const found = allowed.find((option) => option === value);
  if (found === undefined) {
    throw new ScenarioError(path, `expected one of ${allowed.join(", ")}`);
  }
  return found;
};

const listOf = <T>(
  value: unknown,
  path: string,
  item: (entry: JsonObject, path: string) => T
): T[] =>
  expectArray(value ?? [], path).map((entry, index) => {
    const entryPath = `${path}[${index}]`;
    return item(expectObject(entry, entryPath), entryPath);
  });

const stringList = (value: unknown, path: string): string[] =>
  expectArray(value ?? [], path).map((entry, index) =>
    expectString(entry, `${path}[${index}]`)
  );

const parseModule = (entry: JsonObject, path: string): ScenarioModule => ({
  id: expectString(entry.id, `${path}.id`),
  package: expectString(entry.package, `${path}.package`),
});

const parseType = (entry: JsonObject, path: string): ScenarioType => ({
  name: expectString(entry.name, `${path}.name`),
  module: expectString(entry.module, `${path}.module`),
  kind: oneOf(entry.kind, TYPE_KINDS, `${path}.kind`),
  typeParams: stringList(entry.typeParams, `${path}.typeParams`),
  supertypes: stringList(entry.supertypes, `${path}.supertypes`),
});

const parseConstructorParameter = (
  entry: JsonObject,
  path: string
): ScenarioConstructorParameter => ({
  label: optionalString(entry.label, `${path}.label`),
  type: expectString(entry.type, `${path}.type`),
});

const parseConstructor = (entry: JsonObject, path: string): ScenarioConstructor => ({
  type: expectString(entry.type, `${path}.type`),
  module: expectString(entry.module, `${path}.module`),
  visibility:
    entry.visibility === undefined
      ? "public"
      : oneOf(entry.visibility, VISIBILITY_LEVELS, `${path}.visibility`),
  parameters: listOf(entry.parameters, `${path}.parameters`, parseConstructorParameter),
  afterFunctions: optionalBoolean(entry.afterFunctions, `${path}.afterFunctions`),
  span: optionalSpan(entry.span, `${path}.span`),
});

const parseParameter = (entry: JsonObject, path: string): ScenarioParameter => ({
  label: optionalString(entry.label, `${path}.label`),
  name: optionalString(entry.name, `${path}.name`),
  type: expectString(entry.type, `${path}.type`),
  expanded: optionalBoolean(entry.expanded, `${path}.expanded`),
  default: optionalBoolean(entry.default, `${path}.default`),
  byRef: optionalBoolean(entry.byRef, `${path}.byRef`),
  span: optionalSpan(entry.span, `${path}.span`),
});

const parseFunction = (entry: JsonObject, path: string): ScenarioFunction => ({
  name: expectString(entry.name, `${path}.name`),
  module: expectString(entry.module, `${path}.module`),
  enclosingType: optionalString(entry.enclosingType, `${path}.enclosingType`),
  typeParams: stringList(entry.typeParams, `${path}.typeParams`),
  parameters: listOf(entry.parameters, `${path}.parameters`, parseParameter),
  span: optionalSpan(entry.span, `${path}.span`),
});

const parseArgument = (entry: JsonObject, path: string): ScenarioArgument => ({
  label: optionalString(entry.label, `${path}.label`),
  value: expectString(entry.value, `${path}.value`),
  type: expectString(entry.type, `${path}.type`),
  trailingClosure: optionalBoolean(entry.trailingClosure, `${path}.trailingClosure`),
  span: optionalSpan(entry.span, `${path}.span`),
});

const parseCall = (entry: JsonObject, path: string): ScenarioCall => ({
  function: expectString(entry.function, `${path}.function`),
  module: expectString(entry.module, `${path}.module`),
  enclosingType: optionalString(entry.enclosingType, `${path}.enclosingType`),
  arguments: listOf(entry.arguments, `${path}.arguments`, parseArgument),
  span: optionalSpan(entry.span, `${path}.span`),
});

/** Checks that every module a declaration names is listed. */
const checkModules = (scenario: Scenario): void => {
  const known = new Set(scenario.modules.map((module) => module.id));
  const sections: [string, readonly { module: string }[]][] = [
    ["types", scenario.types],
    ["constructors", scenario.constructors],
    ["functions", scenario.functions],
    ["calls", scenario.calls],
  ];
  for (const [section, entries] of sections) {
    entries.forEach((entry, index) => {
      if (!known.has(entry.module)) {
        throw new ScenarioError(
          `$.${section}[${index}].module`,
          `unknown module ${entry.module}`
        );
      }
    });
  }
};

const checkDuplicateTypes = (scenario: Scenario): void => {
  const seen = new Set<string>();
  scenario.types.forEach((type, index) => {
    const key = `${type.module}::${type.name}`;
    if (seen.has(key)) {
      throw new ScenarioError(
        `$.types[${index}].name`,
        `duplicate type ${type.name} in module ${type.module}`
      );
    }
    seen.add(key);
  });
};

export const parseScenario = (value: unknown): Scenario => {
  const root = expectObject(value, "$");
  const scenario: Scenario = {
    file: optionalString(root.file, "$.file"),
    modules: listOf(root.modules, "$.modules", parseModule),
    types: listOf(root.types, "$.types", parseType),
    constructors: listOf(root.constructors, "$.constructors", parseConstructor),
    functions: listOf(root.functions, "$.functions", parseFunction),
    calls: listOf(root.calls, "$.calls", parseCall),
  };
  checkModules(scenario);
  checkDuplicateTypes(scenario);
  return scenario;
};

export const loadScenario = async (path: string): Promise<Scenario> => {
  const text = await readFile(path, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ScenarioError(path, `invalid JSON (${reason})`);
  }
  return parseScenario(json);
};
