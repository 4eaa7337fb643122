import { debugAssert } from "./debug-assert";

/**
 * Four values laid out as a 2x2 grid, stored left-top, right-top,
 * left-bottom, right-bottom so that slot `col | (row << 1)` holds the
 * quadrant at (col, row).
 */
export interface QuadSubdivide<T> {
  readonly quadrants: readonly [T, T, T, T];
}

export const createQuadSubdivide = <T>(
  leftTop: T,
  rightTop: T,
  leftBottom: T,
  rightBottom: T
): QuadSubdivide<T> => ({ quadrants: [leftTop, rightTop, leftBottom, rightBottom] });

const isBit = (value: number): boolean => value === 0 || value === 1;

/** Quadrant at column `col` and row `row`, each 0 or 1. */
export const quadrantAt = <T>(quads: QuadSubdivide<T>, col: number, row: number): T => {
  debugAssert(
    () => isBit(col) && isBit(row),
    `quadrantAt: col and row must be 0 or 1, got (${col}, ${row})`
  );
  return quads.quadrants[(col & 1) | ((row & 1) << 1)];
};

export const quadLeftTop = <T>(quads: QuadSubdivide<T>): T => quads.quadrants[0];
export const quadRightTop = <T>(quads: QuadSubdivide<T>): T => quads.quadrants[1];
export const quadLeftBottom = <T>(quads: QuadSubdivide<T>): T => quads.quadrants[2];
export const quadRightBottom = <T>(quads: QuadSubdivide<T>): T => quads.quadrants[3];

export const mapQuadrants = <T, U>(
  quads: QuadSubdivide<T>,
  fn: (value: T, index: number) => U
): QuadSubdivide<U> => {
  const [lt, rt, lb, rb] = quads.quadrants;
  return createQuadSubdivide(fn(lt, 0), fn(rt, 1), fn(lb, 2), fn(rb, 3));
};
