import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import {
  addPos,
  angle,
  axial,
  cardinal,
  clampLength,
  clampLengthMin,
  clampPos,
  comparePos,
  createPos,
  cross,
  distance,
  dot,
  lerpPos,
  midpointPos,
  mulAddPos,
  normalizePos,
  perpCcw,
  perpCw,
  posLe,
  posLt,
  reflect,
  remEuclidPos,
  subPos,
  swapXY,
} from "../pos";
import { createSize } from "../size";
import { GeometryAssertionError } from "../debug-assert";

const arbPos = fc
  .record({
    x: fc.integer({ min: -1000, max: 1000 }),
    y: fc.integer({ min: -1000, max: 1000 }),
  })
  .map(({ x, y }) => createPos(x, y));

describe("arithmetic operands", () => {
  const p = createPos(1, 2);

  it("accepts a Pos, a Size, a scalar or a tuple", () => {
    expect(addPos(p, createPos(3, 4))).toEqual({ x: 4, y: 6 });
    expect(addPos(p, createSize(3, 4))).toEqual({ x: 4, y: 6 });
    expect(addPos(p, 1)).toEqual({ x: 2, y: 3 });
    expect(addPos(p, [10, 20])).toEqual({ x: 11, y: 22 });
  });

  it("mulAddPos multiplies then adds", () => {
    expect(mulAddPos(p, 3, [1, 1])).toEqual({ x: 4, y: 7 });
  });

  it("remEuclidPos wraps negatives", () => {
    expect(remEuclidPos(createPos(-1, 9), 8)).toEqual({ x: 7, y: 1 });
  });

  it("property: subtraction undoes addition", () => {
    fc.assert(
      fc.property(arbPos, arbPos, (a, b) => {
        expect(subPos(addPos(a, b), b)).toEqual(a);
      })
    );
  });
});

describe("ordering", () => {
  it("compares on both axes", () => {
    expect(posLt(createPos(0, 0), createPos(1, 1))).toBe(true);
    expect(posLt(createPos(0, 1), createPos(1, 1))).toBe(false);
    expect(posLe(createPos(0, 1), createPos(1, 1))).toBe(true);
  });

  it("reports incomparable points as undefined", () => {
    expect(comparePos(createPos(0, 0), createPos(1, 1))).toBe("less");
    expect(comparePos(createPos(2, 2), createPos(1, 1))).toBe("greater");
    expect(comparePos(createPos(1, 1), createPos(1, 1))).toBe("equal");
    expect(comparePos(createPos(1, 0), createPos(0, 1))).toBeUndefined();
  });
});

describe("metrics", () => {
  it("measures distance, dot and cross", () => {
    expect(distance(createPos(0, 0), createPos(3, 4))).toBe(5);
    expect(dot(createPos(1, 2), createPos(3, 4))).toBe(11);
    expect(cross(createPos(1, 2), createPos(3, 4))).toBe(-2);
  });

  it("normalizes to unit length", () => {
    expect(normalizePos(createPos(3, 4))).toEqual({ x: 0.6, y: 0.8 });
  });

  it("clamps vector length", () => {
    expect(clampLength(createPos(3, 4), 0, 2.5)).toEqual({ x: 1.5, y: 2 });
    expect(clampLength(createPos(3, 4), 0, 10)).toEqual({ x: 3, y: 4 });
    expect(clampLengthMin(createPos(3, 4), 10)).toEqual({ x: 6, y: 8 });
  });
});

describe("angles and directions", () => {
  it("measures angles with y pointing down", () => {
    expect(angle(createPos(1, 0))).toBeCloseTo(0);
    expect(angle(createPos(0, -1))).toBeCloseTo(Math.PI / 2);
  });

  it("maps vectors to compass octants", () => {
    expect(cardinal(createPos(1, 0))).toBe("e");
    expect(cardinal(createPos(1, -1))).toBe("ne");
    expect(cardinal(createPos(0, -1))).toBe("n");
    expect(cardinal(createPos(-1, 0))).toBe("w");
    expect(cardinal(createPos(0, 1))).toBe("s");
    expect(cardinal(createPos(1, 0.2))).toBe("e");
  });

  it("maps vectors to the nearest axis", () => {
    expect(axial(createPos(1, 0))).toBe("right");
    expect(axial(createPos(0, -1))).toBe("up");
    expect(axial(createPos(-1, 0))).toBe("left");
    expect(axial(createPos(0, 1))).toBe("down");
    expect(axial(createPos(5, 1))).toBe("right");
  });

  it("turns a quarter turn each way", () => {
    expect(perpCw(createPos(0.5, 0.25))).toEqual({ x: -0.25, y: 0.5 });
    expect(perpCcw(createPos(0.5, 0.25))).toEqual({ x: 0.25, y: -0.5 });
  });

  it("reflects about a unit normal", () => {
    expect(reflect(createPos(1, -1), createPos(0, 1))).toEqual({ x: 1, y: 1 });
  });

  it("swaps components", () => {
    expect(swapXY(createPos(1, 2))).toEqual({ x: 2, y: 1 });
  });
});

describe("interpolation and clamping", () => {
  it("lerps and finds midpoints", () => {
    expect(lerpPos(createPos(0, 0), createPos(10, 20), 0.5)).toEqual({ x: 5, y: 10 });
    expect(midpointPos(createPos(2, 4), createPos(6, 8))).toEqual({ x: 4, y: 6 });
  });

  it("clamps into a box", () => {
    expect(clampPos(createPos(15, -5), createPos(0, 0), createPos(10, 10))).toEqual({
      x: 10,
      y: 0,
    });
  });

  it("rejects an inverted box", () => {
    expect(() => clampPos(createPos(0, 0), createPos(10, 10), createPos(0, 0))).toThrow(
      GeometryAssertionError
    );
  });
});
