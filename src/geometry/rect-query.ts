import { InvalidRectError } from "./debug-assert";
import type { Axial, Intercardinal } from "./direction";
import { createPos, distance, floorPos, maxPos, minPos, posLe, type Pos } from "./pos";
import {
  RECT_ZERO,
  fromMinMax,
  fromMinSize,
  rectHeight,
  rectWidth,
  type Rect,
} from "./rect";
import { rectCorner } from "./rect-partition";
import { createSize } from "./size";

// ---------------------------------------------------------------------------
// Containment and overlap
// ---------------------------------------------------------------------------

/** Half-open: the min edges are inside, the max edges are not. */
export const contains = (rect: Rect, p: Pos): boolean =>
  p.x >= rect.min.x && p.x < rect.max.x && p.y >= rect.min.y && p.y < rect.max.y;

/** True when `inner` lies within `rect`, edges included. */
export const containsRect = (rect: Rect, inner: Rect): boolean =>
  posLe(rect.min, inner.min) && posLe(inner.max, rect.max);

export const insideRect = (rect: Rect, outer: Rect): boolean => containsRect(outer, rect);

/** Strict overlap; rects that only share an edge do not intersect. */
export const intersects = (a: Rect, b: Rect): boolean =>
  b.min.x < a.max.x && b.min.y < a.max.y && b.max.x > a.min.x && b.max.y > a.min.y;

/** Fully disjoint; rects that only share an edge count as outside each other. */
export const outsideRect = (rect: Rect, other: Rect): boolean => !intersects(rect, other);

export const intersection = (a: Rect, b: Rect): Rect | undefined => {
  if (!intersects(a, b)) return undefined;
  return fromMinMax(maxPos(a.min, b.min), minPos(a.max, b.max));
};

/** Intersection of every rect; undefined for no rects or a disjoint pair. */
export const intersectAll = (rects: ReadonlyArray<Rect>): Rect | undefined => {
  const [first, ...rest] = rects;
  if (first === undefined) return undefined;
  let acc: Rect = first;
  for (const rect of rest) {
    const next = intersection(acc, rect);
    if (next === undefined) return undefined;
    acc = next;
  }
  return acc;
};

/** Smallest rect covering both. */
export const extendedToFit = (rect: Rect, other: Rect): Rect =>
  fromMinMax(minPos(rect.min, other.min), maxPos(rect.max, other.max));

export const combineRects = (a: Rect, b: Rect): Rect => extendedToFit(a, b);

/** Smallest rect covering all of `rects`, or `RECT_ZERO` when there are none. */
export const minRect = (rects: ReadonlyArray<Rect>): Rect => {
  const [first, ...rest] = rects;
  if (first === undefined) return RECT_ZERO;
  return rest.reduce(extendedToFit, first);
};

// ---------------------------------------------------------------------------
// Grid subdivision
// ---------------------------------------------------------------------------

const cellIndex = (rect: Rect, p: Pos, cellWidth: number, cellHeight: number): Pos =>
  floorPos(
    createPos((p.x - rect.min.x) / cellWidth, (p.y - rect.min.y) / cellHeight)
  );

/** The cell of a `cols` x `rows` grid over `rect` that contains `p`. */
export const subdivisionContaining = (
  rect: Rect,
  p: Pos,
  cols: number,
  rows: number
): Rect | undefined => {
  if (!contains(rect, p) || cols === 0 || rows === 0) return undefined;
  const cellWidth = rectWidth(rect) / cols;
  const cellHeight = rectHeight(rect) / rows;
  const cell = cellIndex(rect, p, cellWidth, cellHeight);
  return fromMinSize(
    createPos(cell.x * cellWidth + rect.min.x, cell.y * cellHeight + rect.min.y),
    createSize(cellWidth, cellHeight)
  );
};

/**
 * The grid cell holding both corners of `inner`. When the corners fall in
 * different cells the whole rect is returned. A `max` corner sitting exactly
 * on a cell boundary counts as the next cell.
 */
export const subdivisionContainingRect = (
  rect: Rect,
  inner: Rect,
  cols: number,
  rows: number
): Rect | undefined => {
  if (!containsRect(rect, inner) || cols === 0 || rows === 0) return undefined;
  const cellWidth = rectWidth(rect) / cols;
  const cellHeight = rectHeight(rect) / rows;
  const minCell = cellIndex(rect, inner.min, cellWidth, cellHeight);
  const maxCell = cellIndex(rect, inner.max, cellWidth, cellHeight);
  if (minCell.x !== maxCell.x || minCell.y !== maxCell.y) return rect;
  const min = createPos(
    minCell.x * cellWidth + rect.min.x,
    minCell.y * cellHeight + rect.min.y
  );
  return fromMinMax(min, createPos(min.x + cellWidth, min.y + cellHeight));
};

// ---------------------------------------------------------------------------
// Signed distance and closest point
// ---------------------------------------------------------------------------

/** Where a point sits relative to a rect's nine regions. */
export type RectRegion =
  | { readonly tag: "inside" }
  | { readonly tag: "edge"; readonly edge: Axial }
  | { readonly tag: "corner"; readonly corner: Intercardinal };

const edgeRegion = (edge: Axial): RectRegion => ({ tag: "edge", edge });
const cornerRegion = (corner: Intercardinal): RectRegion => ({ tag: "corner", corner });

/**
 * Classifies `p` against `rect` from the four tests `x >= min.x`,
 * `x < max.x`, `y >= min.y` and `y < max.y`, one case per combination.
 * Throws `InvalidRectError` when both tests fail on an axis, which a
 * well-formed rect never allows. NaN coordinates fail every test.
 */
export const rectRegion = (rect: Rect, p: Pos): RectRegion => {
  const key =
    (p.x >= rect.min.x ? 0b1000 : 0) |
    (p.x < rect.max.x ? 0b0100 : 0) |
    (p.y >= rect.min.y ? 0b0010 : 0) |
    (p.y < rect.max.y ? 0b0001 : 0);
  switch (key) {
    case 0b1111:
      return { tag: "inside" };
    case 0b1110:
      return edgeRegion("down");
    case 0b1101:
      return edgeRegion("up");
    case 0b1011:
      return edgeRegion("right");
    case 0b0111:
      return edgeRegion("left");
    case 0b1010:
      return cornerRegion("se");
    case 0b1001:
      return cornerRegion("ne");
    case 0b0110:
      return cornerRegion("sw");
    case 0b0101:
      return cornerRegion("nw");
    case 0b1100:
    case 0b1000:
    case 0b0100:
      throw new InvalidRectError("min.y is greater than max.y");
    case 0b0011:
    case 0b0010:
    case 0b0001:
      throw new InvalidRectError("min.x is greater than max.x");
    default:
      throw new InvalidRectError("min is greater than max");
  }
};

const edgeDistance = (rect: Rect, p: Pos, edge: Axial): number => {
  switch (edge) {
    case "left":
      return rect.min.x - p.x;
    case "right":
      return p.x - rect.max.x;
    case "up":
      return rect.min.y - p.y;
    case "down":
      return p.y - rect.max.y;
  }
};

const projectOntoEdge = (rect: Rect, p: Pos, edge: Axial): Pos => {
  switch (edge) {
    case "left":
      return createPos(rect.min.x, p.y);
    case "right":
      return createPos(rect.max.x, p.y);
    case "up":
      return createPos(p.x, rect.min.y);
    case "down":
      return createPos(p.x, rect.max.y);
  }
};

/**
 * Signed distance from `p` to the rect boundary: negative inside, zero on
 * the boundary, positive outside.
 */
export const sdf = (rect: Rect, p: Pos): number => {
  const region = rectRegion(rect, p);
  switch (region.tag) {
    case "inside":
      return Math.max(
        rect.min.x - p.x,
        p.x - rect.max.x,
        rect.min.y - p.y,
        p.y - rect.max.y
      );
    case "edge":
      return edgeDistance(rect, p, region.edge);
    case "corner":
      return distance(p, rectCorner(rect, region.corner));
  }
};

/**
 * Nearest point on the rect boundary. Inside the rect the nearest edge wins,
 * with ties going to left, then right, then top, then bottom.
 */
export const closestPoint = (rect: Rect, p: Pos): Pos => {
  const region = rectRegion(rect, p);
  switch (region.tag) {
    case "inside": {
      let best = p.x - rect.min.x;
      let closest = createPos(rect.min.x, p.y);
      const toRight = rect.max.x - p.x;
      if (toRight < best) {
        best = toRight;
        closest = createPos(rect.max.x, p.y);
      }
      const toTop = p.y - rect.min.y;
      if (toTop < best) {
        best = toTop;
        closest = createPos(p.x, rect.min.y);
      }
      const toBottom = rect.max.y - p.y;
      if (toBottom < best) {
        closest = createPos(p.x, rect.max.y);
      }
      return closest;
    }
    case "edge":
      return projectOntoEdge(rect, p, region.edge);
    case "corner":
      return rectCorner(rect, region.corner);
  }
};

export const snapToRect = (p: Pos, rect: Rect): Pos => closestPoint(rect, p);
