import type { Diagnostic, SourceSpan } from "../../diagnostics/index.js";
import type { ConstructibleTypeRef } from "../type-ref.js";
import type { SiteContext } from "../visibility.js";
import type { CallArgument } from "./call.js";
import type { ConstructorCandidate } from "./catalog.js";
import { ConstructorCatalogCache } from "./catalog-cache.js";
import {
  callErrorToDiagnostic,
  signatureErrorToDiagnostic,
} from "./diagnostics.js";
import { type SignatureError, isSignatureError } from "./errors.js";
import {
  type ExpansionHost,
  type ResolutionResult,
  catalogFor,
  resolveCall,
} from "./resolve-call.js";
import type { Signature } from "./signature.js";
import { validateSignature } from "./validate-signature.js";

export type ExpansionEngine<TExpr> = {
  readonly cache: ConstructorCatalogCache;
  validateSignature(signature: Signature): SignatureError[];
  validateSignatureDiagnostics(signature: Signature): Diagnostic[];
  resolveCall(
    signature: Signature,
    args: readonly CallArgument<TExpr>[],
    callSite: SiteContext
  ): ResolutionResult<TExpr>;
  resolveCallDiagnostics(
    signature: Signature,
    args: readonly CallArgument<TExpr>[],
    callSite: SiteContext,
    callSpan?: SourceSpan
  ): { result: ResolutionResult<TExpr>; diagnostics: Diagnostic[] };
  catalogFor(
    ownerType: ConstructibleTypeRef,
    declarationSite: SiteContext
  ): readonly ConstructorCandidate[];
};

/**
 * Binds a host to a shared catalog cache. Every method is pure apart from
 * populating that cache.
 */
export const createExpansionEngine = <TExpr>(
  host: ExpansionHost<TExpr>
): ExpansionEngine<TExpr> => {
  const cache = host.cache ?? new ConstructorCatalogCache();
  const boundHost: ExpansionHost<TExpr> = { ...host, cache };

  const engine: ExpansionEngine<TExpr> = {
    cache,
    validateSignature: (signature) =>
      validateSignature(signature, { index: host.index }),
    validateSignatureDiagnostics: (signature) =>
      engine
        .validateSignature(signature)
        .map((error) => signatureErrorToDiagnostic(error, signature)),
    resolveCall: (signature, args, callSite) =>
      resolveCall(signature, args, { host: boundHost, callSite }),
    resolveCallDiagnostics: (signature, args, callSite, callSpan) => {
      const result = engine.resolveCall(signature, args, callSite);
      if (result.kind !== "error") {
        return { result, diagnostics: [] };
      }
      const { error } = result;
      const diagnostic = isSignatureError(error)
        ? signatureErrorToDiagnostic(error, signature)
        : callErrorToDiagnostic(error, { args, callSpan });
      return { result, diagnostics: [diagnostic] };
    },
    catalogFor: (ownerType, declarationSite) =>
      catalogFor(boundHost, ownerType, declarationSite),
  };

  return engine;
};
