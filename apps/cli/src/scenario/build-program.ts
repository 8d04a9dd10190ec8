import type { SourceSpan } from "@expandc/compiler/diagnostics/index.js";
import {
  type CallArgument,
  type Signature,
  createCallArguments,
  createSignature,
} from "@expandc/compiler/semantics/expansion/index.js";
import {
  type Expression,
  ProgramIndex,
  STD_MODULE,
  closure,
  literal,
} from "@expandc/compiler/semantics/program/index.js";
import {
  type NominalTypeRef,
  type TypeRef,
  nominalType,
  typeParam,
} from "@expandc/compiler/semantics/type-ref.js";
import type { SiteContext, Visibility } from "@expandc/compiler/semantics/visibility.js";
import { ScenarioError } from "./parse-scenario.js";
import type { Scenario, ScenarioCall, ScenarioFunction, ScenarioSpan } from "./types.js";
import { TypeSyntaxError, parseTypeSyntax } from "./type-syntax.js";

export type ProgramFunction = {
  entry: ScenarioFunction;
  signature: Signature;
};

export type ProgramCall = {
  entry: ScenarioCall;
  target: ProgramFunction;
  arguments: readonly CallArgument<Expression>[];
  callSite: SiteContext;
  span?: SourceSpan;
};

export type ScenarioProgram = {
  index: ProgramIndex;
  functions: ProgramFunction[];
  calls: ProgramCall[];
};

type TypeScope = { moduleId: string; typeParams?: readonly string[] };

/**
 * Declares a scenario into a fresh {@link ProgramIndex}. Types come first,
 * then constructors, then functions, then any constructors marked
 * `afterFunctions`; call sites are stamped last.
 */
export const buildProgram = (scenario: Scenario, sourcePath: string): ScenarioProgram => {
  const index = new ProgramIndex();
  const file = scenario.file ?? sourcePath;
  const packages = new Map(scenario.modules.map((module) => [module.id, module.package]));

  const packageOf = (moduleId: string): string => {
    const packageId = packages.get(moduleId);
    if (packageId === undefined) {
      throw new Error(`module ${moduleId} was not checked when the scenario was parsed`);
    }
    return packageId;
  };

  const toSpan = (span: ScenarioSpan | undefined): SourceSpan | undefined =>
    span ? { file, start: span[0], end: span[1] } : undefined;

  const nominalNamed = (name: string, moduleId: string): NominalTypeRef => {
    const declared =
      scenario.types.find((type) => type.name === name && type.module === moduleId) ??
      scenario.types.find((type) => type.name === name);
    if (declared) {
      return nominalType(declared.name, declared.module);
    }
    return index.lookupType(name, STD_MODULE) ?? nominalType(name, moduleId);
  };

  const resolveType = (source: string, scope: TypeScope, path: string): TypeRef => {
    try {
      return parseTypeSyntax(source, (name, typeArgs) => {
        if (typeArgs.length === 0 && scope.typeParams?.includes(name)) {
          return typeParam(name);
        }
        const { moduleId } = nominalNamed(name, scope.moduleId);
        return nominalType(name, moduleId, typeArgs);
      });
    } catch (error) {
      if (error instanceof TypeSyntaxError) {
        throw new ScenarioError(path, `invalid type "${source}" (${error.message})`);
      }
      throw error;
    }
  };

  scenario.types.forEach((type) => {
    index.declareType({
      name: type.name,
      moduleId: type.module,
      packageId: packageOf(type.module),
      kind: type.kind,
      typeParams: type.typeParams,
      supertypes: type.supertypes.map((name) => nominalNamed(name, type.module)),
    });
  });

  const declareConstructors = (afterFunctions: boolean) =>
    scenario.constructors.forEach((ctor, position) => {
      if (ctor.afterFunctions !== afterFunctions) return;
      const path = `$.constructors[${position}]`;
      const owningType = nominalNamed(ctor.type, ctor.module);
      if (!index.describeType(owningType)) {
        throw new ScenarioError(`${path}.type`, `unknown type ${ctor.type}`);
      }
      const visibility: Visibility = { level: ctor.visibility };
      index.declareConstructor({
        owningType,
        moduleId: ctor.module,
        packageId: packageOf(ctor.module),
        visibility,
        span: toSpan(ctor.span),
        parameters: ctor.parameters.map((param, paramIndex) => ({
          label: param.label,
          type: resolveType(
            param.type,
            { moduleId: ctor.module },
            `${path}.parameters[${paramIndex}].type`
          ),
        })),
      });
    });

  const enclosing = (name: string | undefined, moduleId: string) =>
    name === undefined ? undefined : nominalNamed(name, moduleId);

  declareConstructors(false);

  const functions = scenario.functions.map((entry, position): ProgramFunction => {
    const path = `$.functions[${position}]`;
    const scope = { moduleId: entry.module, typeParams: entry.typeParams };
    const siblings = scenario.functions.filter(
      (other) => other.name === entry.name && other.module === entry.module
    );
    const signature = createSignature({
      name: entry.name,
      declarationSite: index.siteAt({
        moduleId: entry.module,
        packageId: packageOf(entry.module),
        enclosingType: enclosing(entry.enclosingType, entry.module),
      }),
      hasSiblingOverloads: siblings.length > 1,
      span: toSpan(entry.span),
      parameters: entry.parameters.map((param, paramIndex) => ({
        label: param.label,
        name: param.name,
        declaredType: resolveType(param.type, scope, `${path}.parameters[${paramIndex}].type`),
        isExpanded: param.expanded,
        hasDefaultValue: param.default,
        isByReference: param.byRef,
        span: toSpan(param.span),
      })),
    });
    return { entry, signature };
  });

  declareConstructors(true);

  const calls = scenario.calls.map((entry, position): ProgramCall => {
    const path = `$.calls[${position}]`;
    const target =
      functions.find(
        (fn) => fn.entry.name === entry.function && fn.entry.module === entry.module
      ) ?? functions.find((fn) => fn.entry.name === entry.function);
    if (!target) {
      throw new ScenarioError(`${path}.function`, `unknown function ${entry.function}`);
    }

    const args = createCallArguments(
      entry.arguments.map((arg, argIndex) => {
        const type = resolveType(
          arg.type,
          { moduleId: entry.module },
          `${path}.arguments[${argIndex}].type`
        );
        const value: Expression =
          type.kind === "function"
            ? closure(type.parameters, type.returnType)
            : literal(arg.value, type);
        return {
          label: arg.label,
          value,
          isTrailingClosureForm: arg.trailingClosure,
          span: toSpan(arg.span),
        };
      })
    );

    return {
      entry,
      target,
      arguments: args,
      callSite: index.siteAt({
        moduleId: entry.module,
        packageId: packageOf(entry.module),
        enclosingType: enclosing(entry.enclosingType, entry.module),
      }),
      span: toSpan(entry.span),
    };
  });

  return { index, functions, calls };
};
