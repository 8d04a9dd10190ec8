import { describe, expect, it } from "vitest";
import {
  functionType,
  nominalType,
  optionalType,
  structuralType,
  tupleType,
} from "../../type-ref.js";
import { closure, literal } from "../expressions.js";
import { ProgramIndex } from "../program-index.js";
import { createTypeChecker, typeSatisfies } from "../type-checker.js";

const MAIN = { moduleId: "src::main", packageId: "local" };

const setup = () => {
  const index = new ProgramIndex();
  const Shape = index.declareType({ name: "Shape", ...MAIN, kind: "interface" });
  const Circle = index.declareType({
    name: "Circle",
    ...MAIN,
    kind: "struct",
    supertypes: [Shape],
  });
  return { index, Shape, Circle };
};

describe("typeSatisfies", () => {
  it("accepts exact matches and declared supertypes", () => {
    const { index, Shape, Circle } = setup();
    expect(typeSatisfies(Circle, Circle, index)).toBe(true);
    expect(typeSatisfies(Circle, Shape, index)).toBe(true);
    expect(typeSatisfies(Shape, Circle, index)).toBe(false);
  });

  it("treats same-named types in different modules as distinct", () => {
    const { index, Circle } = setup();
    expect(typeSatisfies(nominalType("Circle", "src::other"), Circle, index)).toBe(
      false
    );
  });

  it("promotes values into optionals but not out of them", () => {
    const { index, Shape, Circle } = setup();
    expect(typeSatisfies(Circle, optionalType(Shape), index)).toBe(true);
    expect(typeSatisfies(optionalType(Circle), optionalType(Shape), index)).toBe(
      true
    );
    expect(typeSatisfies(optionalType(Circle), Circle, index)).toBe(false);
  });

  it("checks function parameters contravariantly", () => {
    const { index, Shape, Circle } = setup();
    const takesShape = functionType([Shape], index.std.Int);
    const takesCircle = functionType([Circle], index.std.Int);
    expect(typeSatisfies(takesShape, takesCircle, index)).toBe(true);
    expect(typeSatisfies(takesCircle, takesShape, index)).toBe(false);
  });

  it("compares tuples element by element", () => {
    const { index, Shape, Circle } = setup();
    expect(
      typeSatisfies(tupleType([Circle, Circle]), tupleType([Shape, Circle]), index)
    ).toBe(true);
    expect(typeSatisfies(tupleType([Circle]), tupleType([Circle, Circle]), index)).toBe(
      false
    );
  });

  it("only matches structural types exactly", () => {
    const { index } = setup();
    const point = structuralType([{ name: "x", type: index.std.Int }]);
    expect(
      typeSatisfies(point, structuralType([{ name: "x", type: index.std.Int }]), index)
    ).toBe(true);
    expect(
      typeSatisfies(point, structuralType([{ name: "y", type: index.std.Int }]), index)
    ).toBe(false);
  });
});

describe("createTypeChecker", () => {
  it("checks expressions by their static type", () => {
    const { index } = setup();
    const check = createTypeChecker(index);
    expect(check(literal("1", index.std.Int), index.std.Int)).toBe(true);
    expect(check(literal("1", index.std.Int), index.std.Float)).toBe(false);
    expect(
      check(closure([], index.std.Bool), functionType([], index.std.Bool))
    ).toBe(true);
  });
});
