import type { SourceSpan } from "../ids.js";
import { type TypeRef, functionType } from "../type-ref.js";

/**
 * Minimal expression model for hosts that have no typed AST of their own.
 * Every expression already knows its static type.
 */
export type Expression =
  | { kind: "literal"; text: string; type: TypeRef; span?: SourceSpan }
  | { kind: "reference"; name: string; type: TypeRef; span?: SourceSpan }
  | {
      kind: "closure";
      parameters: readonly TypeRef[];
      returnType: TypeRef;
      span?: SourceSpan;
    };

export const literal = (text: string, type: TypeRef): Expression => ({
  kind: "literal",
  text,
  type,
});

export const reference = (name: string, type: TypeRef): Expression => ({
  kind: "reference",
  name,
  type,
});

export const closure = (
  parameters: readonly TypeRef[],
  returnType: TypeRef
): Expression => ({ kind: "closure", parameters, returnType });

export const staticTypeOf = (expr: Expression): TypeRef => {
  switch (expr.kind) {
    case "literal":
    case "reference":
      return expr.type;
    case "closure":
      return functionType(expr.parameters, expr.returnType);
  }
};

export const formatExpression = (expr: Expression): string => {
  switch (expr.kind) {
    case "literal":
      return expr.text;
    case "reference":
      return expr.name;
    case "closure":
      return "{ ... }";
  }
};
