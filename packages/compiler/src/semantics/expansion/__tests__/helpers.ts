import type { TypeRef } from "../../type-ref.js";
import {
  type Expression,
  type ProgramIndex,
  createTypeChecker,
  literal,
  reference,
} from "../../program/index.js";
import { type CallArgument, createCallArguments } from "../call.js";
import type { ExpansionHost } from "../resolve-call.js";

export const MAIN = { moduleId: "src::main", packageId: "local" } as const;
export const SHAPES = { moduleId: "src::shapes", packageId: "local" } as const;
export const VENDOR = { moduleId: "pkg::vendor", packageId: "pkg:vendor" } as const;

export const createHost = (index: ProgramIndex): ExpansionHost<Expression> => ({
  index,
  typeChecks: createTypeChecker(index),
});

export const int = (index: ProgramIndex, value: number): Expression =>
  literal(`${value}`, index.std.Int);

export const bool = (index: ProgramIndex, value: boolean): Expression =>
  literal(`${value}`, index.std.Bool);

export const str = (index: ProgramIndex, value: string): Expression =>
  literal(JSON.stringify(value), index.std.String);

export const valueOf = (name: string, type: TypeRef): Expression =>
  reference(name, type);

type ArgSpec = [
  label: string | undefined,
  value: Expression,
  options?: { trailingClosure: boolean },
];

export const args = (
  ...specs: ArgSpec[]
): readonly CallArgument<Expression>[] =>
  createCallArguments(
    specs.map(([label, value, options]) => ({
      label,
      value,
      isTrailingClosureForm: options?.trailingClosure ?? false,
    }))
  );
