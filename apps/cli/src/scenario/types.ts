import type { NominalTypeKind } from "@expandc/compiler/semantics/expansion/catalog.js";
import type { VisibilityLevel } from "@expandc/compiler/semantics/visibility.js";

/** Character range inside the scenario's source file. */
export type ScenarioSpan = readonly [start: number, end: number];

export type ScenarioModule = {
  id: string;
  package: string;
};

export type ScenarioType = {
  name: string;
  module: string;
  kind: NominalTypeKind;
  typeParams: string[];
  supertypes: string[];
};

export type ScenarioConstructorParameter = {
  label?: string;
  type: string;
};

export type ScenarioConstructor = {
  type: string;
  module: string;
  visibility: VisibilityLevel;
  parameters: ScenarioConstructorParameter[];
  /** Declared after every function, so no declaration site sees it. */
  afterFunctions: boolean;
  span?: ScenarioSpan;
};

export type ScenarioParameter = {
  label?: string;
  name?: string;
  type: string;
  expanded: boolean;
  default: boolean;
  byRef: boolean;
  span?: ScenarioSpan;
};

export type ScenarioFunction = {
  name: string;
  module: string;
  enclosingType?: string;
  typeParams: string[];
  parameters: ScenarioParameter[];
  span?: ScenarioSpan;
};

export type ScenarioArgument = {
  label?: string;
  value: string;
  type: string;
  trailingClosure: boolean;
  span?: ScenarioSpan;
};

export type ScenarioCall = {
  function: string;
  module: string;
  enclosingType?: string;
  arguments: ScenarioArgument[];
  span?: ScenarioSpan;
};

export type Scenario = {
  /** File name diagnostics point into. Defaults to the scenario's path. */
  file?: string;
  modules: ScenarioModule[];
  types: ScenarioType[];
  constructors: ScenarioConstructor[];
  functions: ScenarioFunction[];
  calls: ScenarioCall[];
};
