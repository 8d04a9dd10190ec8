import { describe, expect, it } from "vitest";
import { ProgramIndex } from "../../program/index.js";
import {
  functionType,
  nominalType,
  optionalType,
  structuralType,
  tupleType,
  typeParam,
} from "../../type-ref.js";
import { type ParameterInput, createSignature } from "../signature.js";
import { validateSignature } from "../validate-signature.js";
import { MAIN } from "./helpers.js";

const setup = () => {
  const index = new ProgramIndex();
  const T = index.declareType({ name: "T", ...MAIN, kind: "struct" });
  const Shape = index.declareType({ name: "Shape", ...MAIN, kind: "interface" });
  const Direction = index.declareType({ name: "Direction", ...MAIN, kind: "enum" });
  const Box = index.declareType({
    name: "Box",
    ...MAIN,
    kind: "struct",
    typeParams: ["Item"],
  });
  const validate = (
    parameters: readonly ParameterInput[],
    options: { hasSiblingOverloads?: boolean } = {}
  ) =>
    validateSignature(
      createSignature({
        name: "f",
        declarationSite: index.siteAt(MAIN),
        parameters,
        hasSiblingOverloads: options.hasSiblingOverloads,
      }),
      { index }
    );
  return { index, T, Shape, Direction, Box, validate };
};

describe("validateSignature", () => {
  it("accepts a well-formed expanded signature", () => {
    const { index, T, validate } = setup();
    expect(
      validate([
        { label: "x", declaredType: T, isExpanded: true },
        { label: "y", declaredType: index.std.Int },
      ])
    ).toEqual([]);
  });

  it("ignores signatures without an expanded parameter", () => {
    const { index, validate } = setup();
    expect(
      validate(
        [
          { label: "y", declaredType: index.std.Int, hasDefaultValue: true },
          { label: "z", declaredType: index.std.Bool },
        ],
        { hasSiblingOverloads: true }
      )
    ).toEqual([]);
  });

  it("requires the expanded parameter to come first", () => {
    const { index, T, validate } = setup();
    expect(
      validate([
        { label: "y", declaredType: index.std.Int },
        { label: "x", declaredType: T, isExpanded: true },
      ])
    ).toEqual([{ kind: "invalid-expanded-placement", parameterIndex: 1 }]);
  });

  it("rejects more than one expanded parameter", () => {
    const { T, validate } = setup();
    const errors = validate([
      { label: "x", declaredType: T, isExpanded: true },
      { label: "w", declaredType: T, isExpanded: true },
    ]);
    expect(errors).toContainEqual({
      kind: "multiple-expanded-parameters",
      parameterIndices: [0, 1],
    });
    expect(errors).toContainEqual({
      kind: "invalid-expanded-placement",
      parameterIndex: 1,
    });
  });

  it("rejects expanded signatures that share an overload set", () => {
    const { T, validate } = setup();
    expect(
      validate([{ label: "x", declaredType: T, isExpanded: true }], {
        hasSiblingOverloads: true,
      })
    ).toEqual([
      {
        kind: "overload-conflict-with-expanded",
        functionName: "f",
        parameterIndex: 0,
      },
    ]);
  });

  it.each([
    ["function", functionType([], nominalType("Int", "std"))],
    ["tuple", tupleType([nominalType("Int", "std")])],
    ["structural", structuralType([{ name: "a", type: nominalType("Int", "std") }])],
    ["type-parameter", typeParam("Element")],
    ["generic", nominalType("Box", MAIN.moduleId, [nominalType("Int", "std")])],
    ["unresolved", nominalType("Missing", MAIN.moduleId)],
  ] as const)("rejects %s types as non-nominal", (reason, declaredType) => {
    const { validate } = setup();
    expect(validate([{ label: "x", declaredType, isExpanded: true }])).toEqual([
      { kind: "non-nominal-expanded-type", parameterIndex: 0, type: declaredType, reason },
    ]);
  });

  it("rejects generic declarations referenced without arguments", () => {
    const { Box, validate } = setup();
    expect(validate([{ label: "x", declaredType: Box, isExpanded: true }])).toEqual([
      { kind: "non-nominal-expanded-type", parameterIndex: 0, type: Box, reason: "generic" },
    ]);
  });

  it("rejects enums as sum types", () => {
    const { Direction, validate } = setup();
    expect(
      validate([{ label: "x", declaredType: Direction, isExpanded: true }])
    ).toEqual([
      {
        kind: "non-nominal-expanded-type",
        parameterIndex: 0,
        type: Direction,
        reason: "sum-type",
      },
    ]);
  });

  it("rejects interface types regardless of call sites", () => {
    const { Shape, validate } = setup();
    expect(validate([{ label: "x", declaredType: Shape, isExpanded: true }])).toEqual([
      { kind: "abstract-type-not-expandable", parameterIndex: 0, type: Shape },
    ]);
  });

  it("looks through optional wrappers when classifying the type", () => {
    const { T, Shape, validate } = setup();
    expect(
      validate([{ label: "x", declaredType: optionalType(T), isExpanded: true }])
    ).toEqual([]);
    expect(
      validate([{ label: "x", declaredType: optionalType(Shape), isExpanded: true }])
    ).toEqual([
      {
        kind: "abstract-type-not-expandable",
        parameterIndex: 0,
        type: optionalType(Shape),
      },
    ]);
  });

  it("rejects by-reference expanded parameters", () => {
    const { T, validate } = setup();
    expect(
      validate([{ label: "x", declaredType: T, isExpanded: true, isByReference: true }])
    ).toEqual([{ kind: "by-reference-expanded-conflict", parameterIndex: 0 }]);
  });

  it("rejects a defaulted parameter right after the expanded one unless it is last", () => {
    const { index, T, validate } = setup();
    const { Int, Bool } = index.std;

    expect(
      validate([
        { label: "x", declaredType: T, isExpanded: true },
        { label: "y", declaredType: Int, hasDefaultValue: true },
        { label: "z", declaredType: Bool },
      ])
    ).toEqual([
      {
        kind: "default-argument-adjacency-violation",
        parameterIndex: 1,
        expandedParameterIndex: 0,
      },
    ]);

    expect(
      validate([
        { label: "x", declaredType: T, isExpanded: true },
        { label: "z", declaredType: Bool },
        { label: "y", declaredType: Int, hasDefaultValue: true },
      ])
    ).toEqual([]);
  });

  it("allows the expanded parameter itself to carry a default", () => {
    const { index, T, validate } = setup();
    expect(
      validate([
        { label: "x", declaredType: T, isExpanded: true, hasDefaultValue: true },
        { label: "y", declaredType: index.std.Int },
      ])
    ).toEqual([]);
  });

  it("does not treat a misplaced expanded parameter's own default as adjacency", () => {
    const { index, T, validate } = setup();
    expect(
      validate([
        { label: "a", declaredType: index.std.Int },
        { label: "x", declaredType: T, isExpanded: true, hasDefaultValue: true },
        { label: "z", declaredType: index.std.Bool },
      ])
    ).toEqual([{ kind: "invalid-expanded-placement", parameterIndex: 1 }]);
  });

  it("reports every violation together", () => {
    const { index, Shape, validate } = setup();
    const errors = validate(
      [
        { label: "y", declaredType: index.std.Int, hasDefaultValue: true },
        { label: "x", declaredType: Shape, isExpanded: true, isByReference: true },
        { label: "z", declaredType: index.std.Bool },
      ],
      { hasSiblingOverloads: true }
    );

    expect(errors.map((error) => error.kind)).toEqual([
      "invalid-expanded-placement",
      "overload-conflict-with-expanded",
      "abstract-type-not-expandable",
      "by-reference-expanded-conflict",
    ]);
  });
});
