import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import {
  TAU,
  clamp,
  clamp01,
  divEuclid,
  int8,
  lerp,
  midpoint,
  normalizeAngle,
  remEuclid,
  saturatingInt8,
} from "../scalar";
import { GeometryAssertionError, withAssertions } from "../debug-assert";

describe("lerp / clamp", () => {
  it("interpolates linearly", () => {
    expect(lerp(0, 10, 0.25)).toBe(2.5);
    expect(lerp(4, 8, 0)).toBe(4);
    expect(lerp(4, 8, 1)).toBe(8);
  });

  it("clamps into range", () => {
    expect(clamp(5, 0, 3)).toBe(3);
    expect(clamp(-1, 0, 3)).toBe(0);
    expect(clamp(2, 0, 3)).toBe(2);
    expect(clamp01(1.5)).toBe(1);
  });
});

describe("midpoint", () => {
  it("averages ordinary values", () => {
    expect(midpoint(2, 6)).toBe(4);
    expect(midpoint(-3, 3)).toBe(0);
  });

  it("does not overflow near the float limit", () => {
    expect(midpoint(Number.MAX_VALUE, Number.MAX_VALUE)).toBe(Number.MAX_VALUE);
  });

  it("property: lies between its arguments", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: -1_000_000, max: 1_000_000 }),
        fc.integer({ min: -1_000_000, max: 1_000_000 }),
        (a, b) => {
          const m = midpoint(a, b);
          expect(m).toBeGreaterThanOrEqual(Math.min(a, b));
          expect(m).toBeLessThanOrEqual(Math.max(a, b));
        }
      )
    );
  });
});

describe("euclidean division", () => {
  it("remEuclid is never negative", () => {
    expect(remEuclid(-1, 8)).toBe(7);
    expect(remEuclid(9, 8)).toBe(1);
    expect(remEuclid(3, -8)).toBe(3);
  });

  it("divEuclid rounds toward negative infinity for positive divisors", () => {
    expect(divEuclid(7, 2)).toBe(3);
    expect(divEuclid(-7, 2)).toBe(-4);
  });
});

describe("normalizeAngle", () => {
  it("wraps negative angles into [0, 2π)", () => {
    expect(normalizeAngle(-Math.PI / 2)).toBeCloseTo((3 * Math.PI) / 2);
  });

  it("maps a full turn to zero", () => {
    expect(normalizeAngle(TAU)).toBe(0);
  });

  it("property: result is in [0, 2π)", () => {
    fc.assert(
      fc.property(fc.double({ min: -100, max: 100, noNaN: true }), (theta) => {
        const wrapped = normalizeAngle(theta);
        expect(wrapped).toBeGreaterThanOrEqual(0);
        expect(wrapped).toBeLessThan(TAU);
      })
    );
  });
});

describe("int8", () => {
  it("accepts integers in [-128, 127]", () => {
    expect(int8(127)).toBe(127);
    expect(int8(-128)).toBe(-128);
  });

  it("rejects out-of-range values while assertions are on", () => {
    expect(() => int8(200)).toThrow(GeometryAssertionError);
    expect(() => int8(1.5)).toThrow(GeometryAssertionError);
  });

  it("wraps like an 8-bit integer with assertions off", () => {
    expect(withAssertions(false, () => int8(200))).toBe(-56);
  });
});

describe("saturatingInt8", () => {
  it("truncates then saturates", () => {
    expect(saturatingInt8(3.9)).toBe(3);
    expect(saturatingInt8(-3.9)).toBe(-3);
    expect(saturatingInt8(300)).toBe(127);
    expect(saturatingInt8(-300)).toBe(-128);
  });

  it("maps NaN and negative fractions to zero", () => {
    expect(saturatingInt8(Number.NaN)).toBe(0);
    expect(saturatingInt8(-0.5)).toBe(0);
  });
});
