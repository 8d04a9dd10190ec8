import type { SourceSpan } from "../ids.js";

export type CallArgument<TExpr> = {
  label?: string;
  value: TExpr;
  isTrailingClosureForm: boolean;
  span?: SourceSpan;
};

export type CallArgumentInput<TExpr> = Omit<
  CallArgument<TExpr>,
  "isTrailingClosureForm"
> & { isTrailingClosureForm?: boolean };

export const createCallArguments = <TExpr>(
  args: readonly CallArgumentInput<TExpr>[]
): readonly CallArgument<TExpr>[] =>
  Object.freeze(
    args.map((arg) =>
      Object.freeze({
        ...arg,
        isTrailingClosureForm: arg.isTrailingClosureForm ?? false,
      })
    )
  );

export const argumentLabels = <TExpr>(
  args: readonly CallArgument<TExpr>[]
): (string | undefined)[] => args.map((arg) => arg.label);

/** Renders a label shape such as `(a:_:)` for diagnostics. */
export const formatLabelShape = (
  labels: readonly (string | undefined)[]
): string => `(${labels.map((label) => `${label ?? "_"}:`).join("")})`;
