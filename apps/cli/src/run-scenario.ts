import type { Diagnostic } from "@expandc/compiler/diagnostics/index.js";
import {
  type ExpansionEngine,
  type ResolutionResult,
  createExpansionEngine,
  formatConstructorCandidate,
  parameterDisplayName,
} from "@expandc/compiler/semantics/expansion/index.js";
import {
  type Expression,
  createTypeChecker,
  formatExpression,
} from "@expandc/compiler/semantics/program/index.js";
import type {
  ProgramCall,
  ProgramFunction,
  ScenarioProgram,
} from "./scenario/build-program.js";

export type CallOutcome =
  | { kind: "not-applicable" }
  | { kind: "direct"; parameter: string }
  | { kind: "defaulted"; parameter: string }
  | { kind: "constructed"; parameter: string; initializer: string; arguments: number }
  | { kind: "error"; code: string }
  | { kind: "skipped" };

export type FunctionReport = {
  name: string;
  module: string;
  diagnostics: Diagnostic[];
};

export type CallReport = {
  call: string;
  outcome: CallOutcome;
  remainder: number;
  diagnostics: Diagnostic[];
};

export type ScenarioReport = {
  functions: FunctionReport[];
  calls: CallReport[];
  diagnostics: Diagnostic[];
  hasErrors: boolean;
};

export const formatCall = (call: ProgramCall): string => {
  const args = call.arguments.map((arg) => {
    const value = formatExpression(arg.value);
    return arg.label === undefined ? value : `${arg.label}: ${value}`;
  });
  return `${call.target.signature.name}(${args.join(", ")})`;
};

const outcomeOf = (
  result: ResolutionResult<Expression>,
  diagnostics: readonly Diagnostic[]
): CallOutcome => {
  switch (result.kind) {
    case "not-applicable":
      return result;
    case "direct":
    case "defaulted":
      return { kind: result.kind, parameter: parameterDisplayName(result.parameter) };
    case "constructed":
      return {
        kind: "constructed",
        parameter: parameterDisplayName(result.parameter),
        initializer: formatConstructorCandidate(result.candidate),
        arguments: result.arguments.length,
      };
    case "error":
      return { kind: "error", code: diagnostics[0]?.code ?? result.error.kind };
  }
};

const remainderOf = (result: ResolutionResult<Expression>): number =>
  result.kind === "direct" || result.kind === "defaulted" || result.kind === "constructed"
    ? result.remainder.length
    : 0;

const reportCall = (
  engine: ExpansionEngine<Expression>,
  call: ProgramCall,
  invalid: ReadonlySet<ProgramFunction>
): CallReport => {
  if (invalid.has(call.target)) {
    return {
      call: formatCall(call),
      outcome: { kind: "skipped" },
      remainder: 0,
      diagnostics: [],
    };
  }
  const { result, diagnostics } = engine.resolveCallDiagnostics(
    call.target.signature,
    call.arguments,
    call.callSite,
    call.span
  );
  return {
    call: formatCall(call),
    outcome: outcomeOf(result, diagnostics),
    remainder: remainderOf(result),
    diagnostics,
  };
};

/**
 * Validates every function, then resolves every call whose target has a
 * valid signature.
 */
export const runScenario = (
  program: ScenarioProgram,
  { validateOnly = false }: { validateOnly?: boolean } = {}
): ScenarioReport => {
  const engine = createExpansionEngine<Expression>({
    index: program.index,
    typeChecks: createTypeChecker(program.index),
  });

  const invalid = new Set<ProgramFunction>();
  const functions = program.functions.map((fn): FunctionReport => {
    const diagnostics = engine.validateSignatureDiagnostics(fn.signature);
    if (diagnostics.length > 0) invalid.add(fn);
    return { name: fn.entry.name, module: fn.entry.module, diagnostics };
  });

  const calls = validateOnly
    ? []
    : program.calls.map((call) => reportCall(engine, call, invalid));

  const diagnostics = [
    ...functions.flatMap((fn) => fn.diagnostics),
    ...calls.flatMap((call) => call.diagnostics),
  ];

  return {
    functions,
    calls,
    diagnostics,
    hasErrors: diagnostics.some((diagnostic) => diagnostic.severity === "error"),
  };
};

export const describeOutcome = (outcome: CallOutcome): string => {
  switch (outcome.kind) {
    case "not-applicable":
      return "no expanded parameter";
    case "direct":
      return `passes ${outcome.parameter} directly`;
    case "defaulted":
      return `uses the default for ${outcome.parameter}`;
    case "constructed":
      return `constructs ${outcome.parameter} with ${outcome.initializer}`;
    case "error":
      return `error ${outcome.code}`;
    case "skipped":
      return "skipped (invalid signature)";
  }
};
