import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

const directValueHint: DiagnosticHint = {
  message:
    "Pass a value of the parameter's type directly by writing the parameter's own label first.",
};

type DiagnosticParamsMap = {
  SG0001: {
    kind: "invalid-expanded-placement";
    functionName: string;
    parameter: string;
    position: number;
  };
  SG0002: {
    kind: "multiple-expanded-parameters";
    functionName: string;
    parameters: readonly string[];
  };
  SG0003: { kind: "overload-conflict"; functionName: string };
  SG0004: {
    kind: "non-nominal-expanded-type";
    parameter: string;
    type: string;
    reason: string;
  };
  SG0005: { kind: "abstract-expanded-type"; parameter: string; type: string };
  SG0006: { kind: "by-reference-expanded"; parameter: string };
  SG0007: {
    kind: "default-adjacency";
    functionName: string;
    parameter: string;
  };
  EX0001: {
    kind: "no-matching-initializer";
    typeName: string;
    argumentShape: string;
    candidates: readonly string[];
  };
  EX0002: {
    kind: "ambiguous-initializer";
    typeName: string;
    candidates: readonly string[];
  };
  EX0003: {
    kind: "inaccessible-initializer";
    initializer: string;
    visibility: string;
  };
  EX0004: { kind: "trailing-closure-in-expansion"; argumentIndex: number };
  TY0001: {
    kind: "argument-type-mismatch";
    initializer: string;
    argumentIndex: number;
    expected: string;
  };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

const describeCandidates = (candidates: readonly string[]): string =>
  candidates.length === 0
    ? "no initializers are available for expansion"
    : `candidates:\n${candidates.map((candidate) => `  ${candidate}`).join("\n")}`;

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  SG0001: {
    code: "SG0001",
    message: (params) =>
      `expanded parameter ${params.parameter} of ${params.functionName} must be the first parameter (found at position ${params.position + 1})`,
    severity: "error",
    phase: "declaration",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SG0001"]>,
  SG0002: {
    code: "SG0002",
    message: (params) =>
      `${params.functionName} declares more than one expanded parameter (${params.parameters.join(", ")})`,
    severity: "error",
    phase: "declaration",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SG0002"]>,
  SG0003: {
    code: "SG0003",
    message: (params) =>
      `cannot overload ${params.functionName}; a function with an expanded parameter must be the only overload with its name`,
    severity: "error",
    phase: "declaration",
    hints: [
      {
        message:
          "Rename one of the overloads or remove the expanded marker from the parameter.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SG0003"]>,
  SG0004: {
    code: "SG0004",
    message: (params) =>
      `expanded parameter ${params.parameter} has type ${params.type}, which is not an expandable nominal type (${params.reason})`,
    severity: "error",
    phase: "declaration",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SG0004"]>,
  SG0005: {
    code: "SG0005",
    message: (params) =>
      `expanded parameter ${params.parameter} has interface type ${params.type}; the concrete type to construct is unknown`,
    severity: "error",
    phase: "declaration",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SG0005"]>,
  SG0006: {
    code: "SG0006",
    message: (params) =>
      `expanded parameter ${params.parameter} cannot be passed by reference`,
    severity: "error",
    phase: "declaration",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SG0006"]>,
  SG0007: {
    code: "SG0007",
    message: (params) =>
      `defaulted parameter ${params.parameter} cannot directly follow the expanded parameter of ${params.functionName} unless it is the last parameter`,
    severity: "error",
    phase: "declaration",
    hints: [
      { message: "Move the defaulted parameter to the end of the parameter list." },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SG0007"]>,
  EX0001: {
    code: "EX0001",
    message: (params) =>
      `no initializer of ${params.typeName} matches ${params.argumentShape}; ${describeCandidates(params.candidates)}`,
    severity: "error",
    phase: "expansion",
    hints: [directValueHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["EX0001"]>,
  EX0002: {
    code: "EX0002",
    message: (params) =>
      `ambiguous initializer of ${params.typeName}; ${describeCandidates(params.candidates)}`,
    severity: "error",
    phase: "expansion",
    hints: [
      {
        message:
          "Annotate the argument types, or construct the value explicitly and pass it by label.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["EX0002"]>,
  EX0003: {
    code: "EX0003",
    message: (params) =>
      `initializer ${params.initializer} is not accessible from this call (visibility: ${params.visibility})`,
    severity: "error",
    phase: "expansion",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["EX0003"]>,
  EX0004: {
    code: "EX0004",
    message: (params) =>
      `argument ${params.argumentIndex + 1} uses trailing closure syntax, which cannot be forwarded to an expanded initializer`,
    severity: "error",
    phase: "expansion",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["EX0004"]>,
  TY0001: {
    code: "TY0001",
    message: (params) =>
      `argument ${params.argumentIndex + 1} of ${params.initializer} does not match expected type ${params.expected}`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0001"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const isDiagnosticCode = (value: string): value is DiagnosticCode =>
  Object.prototype.hasOwnProperty.call(diagnosticsRegistry, value);

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry).filter(isDiagnosticCode);
