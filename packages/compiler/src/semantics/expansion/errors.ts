import type { ConstructibleTypeRef, TypeRef } from "../type-ref.js";
import type { SiteContext } from "../visibility.js";
import type { ConstructorCandidate } from "./catalog.js";

export type NonNominalReason =
  | "function"
  | "tuple"
  | "structural"
  | "type-parameter"
  | "generic"
  | "sum-type"
  | "unresolved";

export type SignatureError =
  | { kind: "invalid-expanded-placement"; parameterIndex: number }
  | {
      kind: "multiple-expanded-parameters";
      parameterIndices: readonly number[];
    }
  | {
      kind: "overload-conflict-with-expanded";
      functionName: string;
      parameterIndex: number;
    }
  | {
      kind: "non-nominal-expanded-type";
      parameterIndex: number;
      type: TypeRef;
      reason: NonNominalReason;
    }
  | {
      kind: "abstract-type-not-expandable";
      parameterIndex: number;
      type: TypeRef;
    }
  | { kind: "by-reference-expanded-conflict"; parameterIndex: number }
  | {
      kind: "default-argument-adjacency-violation";
      parameterIndex: number;
      expandedParameterIndex: number;
    };

export type CallResolutionError =
  | {
      kind: "no-matching-initializer";
      ownerType: ConstructibleTypeRef;
      argumentLabels: readonly (string | undefined)[];
      /** Call argument positions forming the expansion span. */
      argumentIndices: readonly number[];
      /** Candidates that were considered after label filtering, or the whole catalog. */
      candidates: readonly ConstructorCandidate[];
    }
  | {
      kind: "ambiguous-initializer";
      ownerType: ConstructibleTypeRef;
      argumentIndices: readonly number[];
      candidates: readonly ConstructorCandidate[];
    }
  | {
      kind: "inaccessible-initializer";
      candidate: ConstructorCandidate;
      argumentIndices: readonly number[];
      callSite: SiteContext;
    }
  | { kind: "trailing-closure-not-allowed"; argumentIndex: number }
  | {
      /** Forwarded to the host's ordinary type-checking failure channel. */
      kind: "argument-type-mismatch";
      candidate: ConstructorCandidate;
      argumentIndex: number;
      expectedType: TypeRef;
    };

export type ResolutionError = SignatureError | CallResolutionError;

export const isSignatureError = (
  error: ResolutionError
): error is SignatureError => {
  switch (error.kind) {
    case "invalid-expanded-placement":
    case "multiple-expanded-parameters":
    case "overload-conflict-with-expanded":
    case "non-nominal-expanded-type":
    case "abstract-type-not-expandable":
    case "by-reference-expanded-conflict":
    case "default-argument-adjacency-violation":
      return true;
    default:
      return false;
  }
};
