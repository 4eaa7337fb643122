import { debugAssert } from "./debug-assert";

export const TAU = Math.PI * 2;

export const lerp = (a: number, b: number, t: number): number => a + (b - a) * t;

export const clamp = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max);

export const clamp01 = (value: number): number => clamp(value, 0, 1);

const MIDPOINT_LO = Number.MIN_VALUE * 2;
const MIDPOINT_HI = Number.MAX_VALUE / 2;

/**
 * Midpoint of two scalars without overflowing to infinity when both are
 * near the representable limit.
 */
export const midpoint = (a: number, b: number): number => {
  const absA = Math.abs(a);
  const absB = Math.abs(b);
  if (absA <= MIDPOINT_HI && absB <= MIDPOINT_HI) return (a + b) / 2;
  if (absA < MIDPOINT_LO) return a + b / 2;
  if (absB < MIDPOINT_LO) return a / 2 + b;
  return a / 2 + b / 2;
};

export const half = (value: number): number => value * 0.5;
export const quarter = (value: number): number => value * 0.25;
export const third = (value: number): number => value * (1 / 3);
export const fifth = (value: number): number => value * 0.2;
export const tenth = (value: number): number => value * 0.1;

/** Remainder with the sign of the divisor's magnitude, always in `[0, |b|)`. */
export const remEuclid = (a: number, b: number): number => {
  const r = a % b;
  return r < 0 ? r + Math.abs(b) : r;
};

export const divEuclid = (a: number, b: number): number => {
  const q = Math.trunc(a / b);
  if (a % b < 0) return b > 0 ? q - 1 : q + 1;
  return q;
};

/** Wraps an angle in radians into `[0, 2π)`. */
export const normalizeAngle = (radians: number): number => {
  const wrapped = remEuclid(radians, TAU);
  // remEuclid can round up to exactly TAU for tiny negative inputs
  return wrapped >= TAU ? 0 : wrapped;
};

export const isPositive = (value: number): boolean => value >= 0;

export const INT8_MIN = -128;
export const INT8_MAX = 127;

/**
 * Stores an integer inset component. Out-of-range or fractional input is a
 * precondition violation; with assertions off the value wraps like an 8-bit
 * two's-complement integer.
 */
export const int8 = (value: number): number => {
  debugAssert(
    () => Number.isInteger(value) && value >= INT8_MIN && value <= INT8_MAX,
    `expected an integer in [${INT8_MIN}, ${INT8_MAX}], got ${value}`
  );
  return (value << 24) >> 24;
};

/** Float-to-int8 conversion: NaN becomes 0, the rest truncates then saturates. */
export const saturatingInt8 = (value: number): number => {
  if (Number.isNaN(value)) return 0;
  // `|| 0` folds -0 into 0; an int8 has no negative zero
  return clamp(Math.trunc(value), INT8_MIN, INT8_MAX) || 0;
};
