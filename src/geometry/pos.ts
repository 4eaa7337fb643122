import { debugAssert } from "./debug-assert";
import type { Axial, Cardinal } from "./direction";
import { AXIALS, CARDINALS } from "./direction";
import {
  clamp,
  clamp01,
  divEuclid,
  lerp,
  midpoint,
  normalizeAngle,
  remEuclid,
} from "./scalar";
import type { Dims, Size } from "./size";

/** A point in screen space: x grows rightward, y grows downward. */
export interface Pos {
  readonly x: number;
  readonly y: number;
}

/** Anything a Pos can be combined with component-wise. */
export type PosOperand = Pos | Size | Dims | number;

export type PosOrdering = "less" | "equal" | "greater";

export const createPos = (x: number, y: number): Pos => ({ x, y });

export const splatPos = (value: number): Pos => createPos(value, value);

/** Unit vector `(cos θ, sin θ)`. */
export const posFromAngle = (radians: number): Pos =>
  createPos(Math.cos(radians), Math.sin(radians));

export const posFromTuple = ([x, y]: Dims): Pos => createPos(x, y);

export const posToTuple = (p: Pos): Dims => [p.x, p.y];

export const POS_ZERO: Pos = createPos(0, 0);
export const POS_ONE: Pos = createPos(1, 1);
export const POS_HALF: Pos = createPos(0.5, 0.5);
export const POS_NEG_ONE: Pos = createPos(-1, -1);
export const POS_NEG_HALF: Pos = createPos(-0.5, -0.5);
export const POS_X: Pos = createPos(1, 0);
export const POS_NEG_X: Pos = createPos(-1, 0);
export const POS_Y: Pos = createPos(0, 1);
export const POS_NEG_Y: Pos = createPos(0, -1);

export const withX = (p: Pos, x: number): Pos => createPos(x, p.y);

export const withY = (p: Pos, y: number): Pos => createPos(p.x, y);

/** `(y, x)` */
export const swapXY = (p: Pos): Pos => createPos(p.y, p.x);

const operandDims = (rhs: PosOperand): Dims => {
  if (typeof rhs === "number") return [rhs, rhs];
  if ("width" in rhs) return [rhs.width, rhs.height];
  if ("x" in rhs) return [rhs.x, rhs.y];
  return rhs;
};

// ---------------------------------------------------------------------------
// Arithmetic
//
// Every operand form goes through the `*Dims` primitive so all overloads
// round identically.
// ---------------------------------------------------------------------------

export const addDims = (p: Pos, x: number, y: number): Pos => createPos(p.x + x, p.y + y);

export const subDims = (p: Pos, x: number, y: number): Pos => createPos(p.x - x, p.y - y);

export const mulDims = (p: Pos, x: number, y: number): Pos => createPos(p.x * x, p.y * y);

export const divDims = (p: Pos, x: number, y: number): Pos => createPos(p.x / x, p.y / y);

export const remDims = (p: Pos, x: number, y: number): Pos => createPos(p.x % x, p.y % y);

export const addPos = (p: Pos, rhs: PosOperand): Pos => addDims(p, ...operandDims(rhs));

export const subPos = (p: Pos, rhs: PosOperand): Pos => subDims(p, ...operandDims(rhs));

export const mulPos = (p: Pos, rhs: PosOperand): Pos => mulDims(p, ...operandDims(rhs));

export const divPos = (p: Pos, rhs: PosOperand): Pos => divDims(p, ...operandDims(rhs));

export const remPos = (p: Pos, rhs: PosOperand): Pos => remDims(p, ...operandDims(rhs));

/** `p * mul + add`, component-wise. */
export const mulAddPos = (p: Pos, mul: PosOperand, add: PosOperand): Pos => {
  const [mx, my] = operandDims(mul);
  const [ax, ay] = operandDims(add);
  return createPos(p.x * mx + ax, p.y * my + ay);
};

export const remEuclidPos = (p: Pos, rhs: PosOperand): Pos => {
  const [x, y] = operandDims(rhs);
  return createPos(remEuclid(p.x, x), remEuclid(p.y, y));
};

export const divEuclidPos = (p: Pos, rhs: PosOperand): Pos => {
  const [x, y] = operandDims(rhs);
  return createPos(divEuclid(p.x, x), divEuclid(p.y, y));
};

export const negatePos = (p: Pos): Pos => createPos(-p.x, -p.y);

// ---------------------------------------------------------------------------
// Ordering
//
// Comparisons hold only when they hold on both axes, so they form a partial
// order: (1, 0) and (0, 1) are incomparable.
// ---------------------------------------------------------------------------

export const posLt = (a: Pos, b: Pos): boolean => a.x < b.x && a.y < b.y;

export const posLe = (a: Pos, b: Pos): boolean => a.x <= b.x && a.y <= b.y;

export const posEq = (a: Pos, b: Pos): boolean => a.x === b.x && a.y === b.y;

export const posGe = (a: Pos, b: Pos): boolean => a.x >= b.x && a.y >= b.y;

export const posGt = (a: Pos, b: Pos): boolean => a.x > b.x && a.y > b.y;

/** Returns undefined when the two points are incomparable. */
export const comparePos = (a: Pos, b: Pos): PosOrdering | undefined => {
  if (posLt(a, b)) return "less";
  if (posGt(a, b)) return "greater";
  if (posEq(a, b)) return "equal";
  return undefined;
};

// ---------------------------------------------------------------------------
// Component-wise
// ---------------------------------------------------------------------------

export const mapPos = (p: Pos, fn: (component: number) => number): Pos =>
  createPos(fn(p.x), fn(p.y));

export const minPos = (a: Pos, b: Pos): Pos =>
  createPos(Math.min(a.x, b.x), Math.min(a.y, b.y));

export const maxPos = (a: Pos, b: Pos): Pos =>
  createPos(Math.max(a.x, b.x), Math.max(a.y, b.y));

/** `[min, max]` of two points. */
export const minMaxPos = (a: Pos, b: Pos): readonly [Pos, Pos] => [
  minPos(a, b),
  maxPos(b, a),
];

export const floorPos = (p: Pos): Pos => mapPos(p, Math.floor);
export const ceilPos = (p: Pos): Pos => mapPos(p, Math.ceil);
export const roundPos = (p: Pos): Pos => mapPos(p, Math.round);
export const truncPos = (p: Pos): Pos => mapPos(p, Math.trunc);
export const absPos = (p: Pos): Pos => mapPos(p, Math.abs);
export const signumPos = (p: Pos): Pos => mapPos(p, Math.sign);
export const recipPos = (p: Pos): Pos => mapPos(p, (v) => 1 / v);
export const fractPos = (p: Pos): Pos => mapPos(p, (v) => v - Math.trunc(v));
export const toDegreesPos = (p: Pos): Pos => mapPos(p, (v) => (v * 180) / Math.PI);
export const toRadiansPos = (p: Pos): Pos => mapPos(p, (v) => (v * Math.PI) / 180);

export const isFinitePos = (p: Pos): boolean =>
  Number.isFinite(p.x) && Number.isFinite(p.y);

export const isNanPos = (p: Pos): boolean => Number.isNaN(p.x) || Number.isNaN(p.y);

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

export const lengthSquared = (p: Pos): number => p.x * p.x + p.y * p.y;

export const posLength = (p: Pos): number => Math.sqrt(lengthSquared(p));

export const distanceSquared = (a: Pos, b: Pos): number =>
  lengthSquared(subDims(b, a.x, a.y));

export const distance = (a: Pos, b: Pos): number => Math.sqrt(distanceSquared(a, b));

export const dot = (a: Pos, b: Pos): number => a.x * b.x + a.y * b.y;

export const cross = (a: Pos, b: Pos): number => a.x * b.y - a.y * b.x;

/** Divides by the length; the zero vector yields NaN components. */
export const normalizePos = (p: Pos): Pos => {
  const length = posLength(p);
  return createPos(p.x / length, p.y / length);
};

// ---------------------------------------------------------------------------
// Angles and directions
// ---------------------------------------------------------------------------

/** Signed angle in radians with y pointing down, so "up" is +π/2. */
export const angle = (p: Pos): number => Math.atan2(-p.y, p.x);

/** `angle` wrapped into `[0, 2π)`. */
export const normalizedAngle = (p: Pos): number => normalizeAngle(angle(p));

/**
 * Compass octant of the vector. Each octant is 45° wide and centred on its
 * direction, so the boundaries sit at 22.5° past each one.
 */
export const cardinal = (p: Pos): Cardinal => {
  const theta = normalizedAngle(p);
  const octant = Math.floor(normalizeAngle(theta + Math.PI / 8) / (Math.PI / 4)) & 0b111;
  return CARDINALS[octant];
};

/** Closest of the four orthogonal directions. */
export const axial = (p: Pos): Axial => {
  const theta = normalizedAngle(p);
  const quadrant = Math.floor(normalizeAngle(theta + Math.PI / 4) / (Math.PI / 2)) & 0b11;
  return AXIALS[quadrant];
};

/** Quarter turn clockwise on screen: `(0.5, 0.25)` becomes `(-0.25, 0.5)`. */
export const perpCw = (p: Pos): Pos => createPos(-p.y, p.x);

/** Quarter turn counter-clockwise on screen. */
export const perpCcw = (p: Pos): Pos => createPos(p.y, -p.x);

/** Reflects `v` about a unit `normal`. */
export const reflect = (v: Pos, normal: Pos): Pos => {
  const d = 2 * dot(v, normal);
  return subDims(v, d * normal.x, d * normal.y);
};

/** Rotates `v` by the rotation encoded in the unit vector `rotation`. */
export const rotateBy = (v: Pos, rotation: Pos): Pos =>
  createPos(v.x * rotation.x - v.y * rotation.y, v.y * rotation.x + v.x * rotation.y);

// ---------------------------------------------------------------------------
// Interpolation and clamping
// ---------------------------------------------------------------------------

export const lerpPos = (a: Pos, b: Pos, t: number): Pos =>
  createPos(lerp(a.x, b.x, t), lerp(a.y, b.y, t));

export const clampedLerpPos = (a: Pos, b: Pos, t: number): Pos =>
  lerpPos(a, b, clamp01(t));

export const midpointPos = (a: Pos, b: Pos): Pos =>
  createPos(midpoint(a.x, b.x), midpoint(a.y, b.y));

export const clampPos = (p: Pos, min: Pos, max: Pos): Pos => {
  debugAssert(() => posLe(min, max), "clampPos: min must be <= max on both axes");
  return createPos(clamp(p.x, min.x, max.x), clamp(p.y, min.y, max.y));
};

export const clampBoth = (p: Pos, min: number, max: number): Pos =>
  createPos(clamp(p.x, min, max), clamp(p.y, min, max));

/** Clamps both components into `[0, 1]`. */
export const clampUv = (p: Pos): Pos => clampBoth(p, 0, 1);

const scaleToLength = (p: Pos, length: number, target: number): Pos => {
  const mult = target / length;
  return createPos(p.x * mult, p.y * mult);
};

/** Rescales `p` so its length lies in `[min, max]`; zero vectors give NaN. */
export const clampLength = (p: Pos, min: number, max: number): Pos => {
  const length = posLength(p);
  if (length >= min && length <= max) return p;
  return scaleToLength(p, length, clamp(length, min, max));
};

export const clampLengthMin = (p: Pos, min: number): Pos => {
  const length = posLength(p);
  if (length >= min) return p;
  return scaleToLength(p, length, Math.max(length, min));
};

export const clampLengthMax = (p: Pos, max: number): Pos => {
  const length = posLength(p);
  if (length <= max) return p;
  return scaleToLength(p, length, Math.min(length, max));
};
