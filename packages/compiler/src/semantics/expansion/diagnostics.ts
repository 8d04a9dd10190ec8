import {
  type Diagnostic,
  type SourceSpan,
  diagnosticFromCode,
  normalizeSpan,
} from "../../diagnostics/index.js";
import { formatType } from "../type-ref.js";
import { formatVisibility } from "../visibility.js";
import { type CallArgument, formatLabelShape } from "./call.js";
import { formatConstructorCandidate } from "./catalog.js";
import type { CallResolutionError, SignatureError } from "./errors.js";
import { type Signature, parameterDisplayName } from "./signature.js";

const nonNominalReasonLabel = {
  function: "function types have no initializers",
  tuple: "tuple types have no initializers",
  structural: "structural types have no initializers",
  "type-parameter": "generic expanded parameters are not supported",
  generic: "generic expanded parameters are not supported",
  "sum-type": "enum types cannot be expanded",
  unresolved: "the type could not be resolved",
} as const;

const parameterAt = (signature: Signature, index: number) =>
  signature.parameters.find((param) => param.positionalIndex === index);

const parameterLabel = (signature: Signature, index: number): string => {
  const param = parameterAt(signature, index);
  return param ? parameterDisplayName(param) : `parameter ${index + 1}`;
};

const parameterSpan = (signature: Signature, index: number): SourceSpan =>
  normalizeSpan(parameterAt(signature, index)?.span, signature.span);

export const signatureErrorToDiagnostic = (
  error: SignatureError,
  signature: Signature
): Diagnostic => {
  switch (error.kind) {
    case "invalid-expanded-placement":
      return diagnosticFromCode({
        code: "SG0001",
        params: {
          kind: "invalid-expanded-placement",
          functionName: signature.name,
          parameter: parameterLabel(signature, error.parameterIndex),
          position: error.parameterIndex,
        },
        span: parameterSpan(signature, error.parameterIndex),
      });
    case "multiple-expanded-parameters":
      return diagnosticFromCode({
        code: "SG0002",
        params: {
          kind: "multiple-expanded-parameters",
          functionName: signature.name,
          parameters: error.parameterIndices.map((index) =>
            parameterLabel(signature, index)
          ),
        },
        span: normalizeSpan(signature.span, parameterSpan(signature, 0)),
      });
    case "overload-conflict-with-expanded":
      return diagnosticFromCode({
        code: "SG0003",
        params: { kind: "overload-conflict", functionName: error.functionName },
        span: normalizeSpan(signature.span),
      });
    case "non-nominal-expanded-type":
      return diagnosticFromCode({
        code: "SG0004",
        params: {
          kind: "non-nominal-expanded-type",
          parameter: parameterLabel(signature, error.parameterIndex),
          type: formatType(error.type),
          reason: nonNominalReasonLabel[error.reason],
        },
        span: parameterSpan(signature, error.parameterIndex),
      });
    case "abstract-type-not-expandable":
      return diagnosticFromCode({
        code: "SG0005",
        params: {
          kind: "abstract-expanded-type",
          parameter: parameterLabel(signature, error.parameterIndex),
          type: formatType(error.type),
        },
        span: parameterSpan(signature, error.parameterIndex),
      });
    case "by-reference-expanded-conflict":
      return diagnosticFromCode({
        code: "SG0006",
        params: {
          kind: "by-reference-expanded",
          parameter: parameterLabel(signature, error.parameterIndex),
        },
        span: parameterSpan(signature, error.parameterIndex),
      });
    case "default-argument-adjacency-violation":
      return diagnosticFromCode({
        code: "SG0007",
        params: {
          kind: "default-adjacency",
          functionName: signature.name,
          parameter: parameterLabel(signature, error.parameterIndex),
        },
        span: parameterSpan(signature, error.parameterIndex),
      });
  }
};

const spanForArguments = <TExpr>(
  args: readonly CallArgument<TExpr>[],
  indices: readonly number[],
  callSpan: SourceSpan | undefined
): SourceSpan => {
  const spans = indices.flatMap((index) => {
    const span = args[index]?.span;
    return span ? [span] : [];
  });
  const [first] = spans;
  const last = spans[spans.length - 1];
  if (!first || !last) {
    return normalizeSpan(callSpan);
  }
  return { file: first.file, start: first.start, end: last.end };
};

export const callErrorToDiagnostic = <TExpr>(
  error: CallResolutionError,
  { args, callSpan }: { args: readonly CallArgument<TExpr>[]; callSpan?: SourceSpan }
): Diagnostic => {
  switch (error.kind) {
    case "no-matching-initializer":
      return diagnosticFromCode({
        code: "EX0001",
        params: {
          kind: "no-matching-initializer",
          typeName: formatType(error.ownerType),
          argumentShape: formatLabelShape(error.argumentLabels),
          candidates: error.candidates.map(formatConstructorCandidate),
        },
        span: spanForArguments(args, error.argumentIndices, callSpan),
      });
    case "ambiguous-initializer":
      return diagnosticFromCode({
        code: "EX0002",
        params: {
          kind: "ambiguous-initializer",
          typeName: formatType(error.ownerType),
          candidates: error.candidates.map(formatConstructorCandidate),
        },
        span: spanForArguments(args, error.argumentIndices, callSpan),
      });
    case "inaccessible-initializer":
      return diagnosticFromCode({
        code: "EX0003",
        params: {
          kind: "inaccessible-initializer",
          initializer: formatConstructorCandidate(error.candidate),
          visibility: formatVisibility(error.candidate.visibility),
        },
        span: spanForArguments(args, error.argumentIndices, callSpan),
      });
    case "trailing-closure-not-allowed":
      return diagnosticFromCode({
        code: "EX0004",
        params: {
          kind: "trailing-closure-in-expansion",
          argumentIndex: error.argumentIndex,
        },
        span: spanForArguments(args, [error.argumentIndex], callSpan),
      });
    case "argument-type-mismatch":
      return diagnosticFromCode({
        code: "TY0001",
        params: {
          kind: "argument-type-mismatch",
          initializer: formatConstructorCandidate(error.candidate),
          argumentIndex: error.argumentIndex,
          expected: formatType(error.expectedType),
        },
        span: spanForArguments(args, [error.argumentIndex], callSpan),
      });
  }
};
