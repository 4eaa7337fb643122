import type { Anchor } from "./anchor";
import { debugAssert } from "./debug-assert";
import {
  addDims,
  createPos,
  distance,
  distanceSquared,
  maxPos,
  minPos,
  posEq,
  posLe,
  subDims,
  subPos,
  addPos,
  lerpPos,
  floorPos,
  ceilPos,
  roundPos,
  type Pos,
} from "./pos";
import { clamp01, half, isPositive, lerp, midpoint } from "./scalar";
import {
  aspectRatio,
  createSize,
  halfHeight,
  halfSize,
  halfWidth,
  isPositiveSize,
  swapDims,
  type Size,
} from "./size";

/**
 * Axis-aligned rectangle stored as its two extreme corners. Well-formed when
 * `min <= max` on both axes; width, height, edges and center are derived.
 */
export interface Rect {
  readonly min: Pos;
  readonly max: Pos;
}

const fmt = (p: Pos): string => `(${p.x}, ${p.y})`;

const assertPositiveSize = (size: Size, caller: string): void =>
  debugAssert(
    () => isPositiveSize(size),
    `${caller}: size must be non-negative, got ${size.width}x${size.height}`
  );

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/** Builds a rect without checking `min <= max`. */
export const rectUnchecked = (min: Pos, max: Pos): Rect => ({ min, max });

/** Primary constructor. Requires `min <= max` on both axes. */
export const fromMinMax = (min: Pos, max: Pos): Rect => {
  debugAssert(() => posLe(min, max), `fromMinMax: min ${fmt(min)} must be <= max ${fmt(max)}`);
  return rectUnchecked(min, max);
};

export const RECT_ZERO: Rect = rectUnchecked(createPos(0, 0), createPos(0, 0));
export const RECT_ONE: Rect = rectUnchecked(createPos(0, 0), createPos(1, 1));

/** Rect at `(x, y)` with the given width and height (both `>= 0`). */
export const createRect = (x: number, y: number, width: number, height: number): Rect => {
  assertPositiveSize(createSize(width, height), "createRect");
  return fromMinMax(createPos(x, y), createPos(x + width, y + height));
};

export const fromMinSize = (min: Pos, size: Size): Rect => {
  assertPositiveSize(size, "fromMinSize");
  return fromMinMax(min, addDims(min, size.width, size.height));
};

export const squareFromMinSize = (min: Pos, sideLength: number): Rect => {
  debugAssert(
    () => isPositive(sideLength),
    `squareFromMinSize: side length must be non-negative, got ${sideLength}`
  );
  return fromMinMax(min, addDims(min, sideLength, sideLength));
};

/** Rect of `size` whose center is `center`. */
export const centeredRect = (center: Pos, size: Size): Rect => {
  assertPositiveSize(size, "centeredRect");
  const h = halfSize(size);
  return fromMinMax(
    subDims(center, h.width, h.height),
    addDims(center, h.width, h.height)
  );
};

export const centeredSquare = (center: Pos, sideLength: number): Rect => {
  debugAssert(
    () => isPositive(sideLength),
    `centeredSquare: side length must be non-negative, got ${sideLength}`
  );
  const h = half(sideLength);
  return fromMinMax(subDims(center, h, h), addDims(center, h, h));
};

/** Rect of `size` placed so that its `anchor` point lands on `pivot`. */
export const fromAnchoredPivot = (anchor: Anchor, pivot: Pos, size: Size): Rect => {
  assertPositiveSize(size, "fromAnchoredPivot");
  switch (anchor) {
    case "leftTop":
      return fromMinSize(pivot, size);
    case "leftCenter":
      return fromMinSize(createPos(pivot.x, pivot.y - halfHeight(size)), size);
    case "leftBottom":
      return fromMinSize(createPos(pivot.x, pivot.y - size.height), size);
    case "bottomCenter":
      return fromMinSize(
        createPos(pivot.x - halfWidth(size), pivot.y - size.height),
        size
      );
    case "rightBottom":
      return fromMinSize(
        createPos(pivot.x - size.width, pivot.y - size.height),
        size
      );
    case "rightCenter":
      return fromMinSize(
        createPos(pivot.x - size.width, pivot.y - halfHeight(size)),
        size
      );
    case "rightTop":
      return fromMinSize(createPos(pivot.x - size.width, pivot.y), size);
    case "topCenter":
      return fromMinSize(createPos(pivot.x - halfWidth(size), pivot.y), size);
    case "center": {
      const h = halfSize(size);
      return fromMinSize(createPos(pivot.x - h.width, pivot.y - h.height), size);
    }
  }
};

/** Bounding rect of two points given in any order. */
export const fromPoints = (a: Pos, b: Pos): Rect =>
  rectUnchecked(minPos(a, b), maxPos(b, a));

/** Like `fromPoints`, using the first two entries of `points`. */
export const fromPointsSlice = (points: ReadonlyArray<Pos>): Rect => {
  debugAssert(
    () => points.length >= 2,
    `fromPointsSlice: need at least 2 points, got ${points.length}`
  );
  return fromPoints(points[0], points[1]);
};

/** Re-sorts the corners so that `min` really is the minimum. */
export const fixedRect = (rect: Rect): Rect => fromPoints(rect.min, rect.max);

export const isWellFormed = (rect: Rect): boolean => posLe(rect.min, rect.max);

export const rectsEqual = (a: Rect, b: Rect): boolean =>
  posEq(a.min, b.min) && posEq(a.max, b.max);

// ---------------------------------------------------------------------------
// Dimensions
// ---------------------------------------------------------------------------

export const rectWidth = (rect: Rect): number => rect.max.x - rect.min.x;

export const rectHeight = (rect: Rect): number => rect.max.y - rect.min.y;

export const rectSize = (rect: Rect): Size => createSize(rectWidth(rect), rectHeight(rect));

export const rectAspectRatio = (rect: Rect): number => aspectRatio(rectSize(rect));

/** Length of the diagonal. */
export const hypotenuse = (rect: Rect): number => distance(rect.min, rect.max);

export const hypotenuseSquared = (rect: Rect): number =>
  distanceSquared(rect.min, rect.max);

/** Same `min`, new size. */
export const withSize = (rect: Rect, size: Size): Rect =>
  fromMinMax(rect.min, addDims(rect.min, size.width, size.height));

/** Same center, new size. */
export const withSizeCentered = (rect: Rect, size: Size): Rect => {
  const mid = rectCenter(rect);
  const h = halfSize(size);
  return fromMinMax(subDims(mid, h.width, h.height), addDims(mid, h.width, h.height));
};

/** New size with the given anchor point held in place. */
export const withSizeAnchored = (rect: Rect, size: Size, anchor: Anchor): Rect =>
  fromAnchoredPivot(anchor, rectAnchor(rect, anchor), size);

export const withWidth = (rect: Rect, width: number): Rect =>
  rectUnchecked(rect.min, createPos(rect.min.x + width, rect.max.y));

export const withWidthCentered = (rect: Rect, width: number): Rect => {
  const midX = rect.min.x + half(rectWidth(rect));
  return rectUnchecked(
    createPos(midX - half(width), rect.min.y),
    createPos(midX + half(width), rect.max.y)
  );
};

/** New width keeping the right edge where it is. */
export const withWidthRight = (rect: Rect, width: number): Rect =>
  rectUnchecked(createPos(rect.max.x - width, rect.min.y), rect.max);

export const withHeight = (rect: Rect, height: number): Rect =>
  rectUnchecked(rect.min, createPos(rect.max.x, rect.min.y + height));

export const withHeightCentered = (rect: Rect, height: number): Rect => {
  const midY = rect.min.y + half(rectHeight(rect));
  return rectUnchecked(
    createPos(rect.min.x, midY - half(height)),
    createPos(rect.max.x, midY + half(height))
  );
};

/** New height keeping the bottom edge where it is. */
export const withHeightBottom = (rect: Rect, height: number): Rect =>
  rectUnchecked(createPos(rect.min.x, rect.max.y - height), rect.max);

// ---------------------------------------------------------------------------
// Edges
//
// `withLeft` and friends move the whole rect; `withLeftBound` and friends
// move only that edge.
// ---------------------------------------------------------------------------

export const rectLeft = (rect: Rect): number => rect.min.x;
export const rectTop = (rect: Rect): number => rect.min.y;
export const rectRight = (rect: Rect): number => rect.max.x;
export const rectBottom = (rect: Rect): number => rect.max.y;

export const withLeft = (rect: Rect, left: number): Rect =>
  rectUnchecked(
    createPos(left, rect.min.y),
    createPos(left + rectWidth(rect), rect.max.y)
  );

export const withRight = (rect: Rect, right: number): Rect =>
  rectUnchecked(
    createPos(right - rectWidth(rect), rect.min.y),
    createPos(right, rect.max.y)
  );

export const withTop = (rect: Rect, top: number): Rect =>
  rectUnchecked(
    createPos(rect.min.x, top),
    createPos(rect.max.x, top + rectHeight(rect))
  );

export const withBottom = (rect: Rect, bottom: number): Rect =>
  rectUnchecked(
    createPos(rect.min.x, bottom - rectHeight(rect)),
    createPos(rect.max.x, bottom)
  );

export const withLeftBound = (rect: Rect, left: number): Rect =>
  rectUnchecked(createPos(left, rect.min.y), rect.max);

export const withRightBound = (rect: Rect, right: number): Rect =>
  rectUnchecked(rect.min, createPos(right, rect.max.y));

export const withTopBound = (rect: Rect, top: number): Rect =>
  rectUnchecked(createPos(rect.min.x, top), rect.max);

export const withBottomBound = (rect: Rect, bottom: number): Rect =>
  rectUnchecked(rect.min, createPos(rect.max.x, bottom));

// ---------------------------------------------------------------------------
// Anchor points
// ---------------------------------------------------------------------------

export const leftTop = (rect: Rect): Pos => rect.min;

export const rightTop = (rect: Rect): Pos => createPos(rect.max.x, rect.min.y);

export const leftBottom = (rect: Rect): Pos => createPos(rect.min.x, rect.max.y);

export const rightBottom = (rect: Rect): Pos => rect.max;

export const leftCenter = (rect: Rect): Pos =>
  createPos(rect.min.x, midpoint(rect.min.y, rect.max.y));

export const topCenter = (rect: Rect): Pos =>
  createPos(midpoint(rect.min.x, rect.max.x), rect.min.y);

export const rightCenter = (rect: Rect): Pos =>
  createPos(rect.max.x, midpoint(rect.min.y, rect.max.y));

export const bottomCenter = (rect: Rect): Pos =>
  createPos(midpoint(rect.min.x, rect.max.x), rect.max.y);

export const rectCenter = (rect: Rect): Pos =>
  createPos(midpoint(rect.min.x, rect.max.x), midpoint(rect.min.y, rect.max.y));

// Size-preserving setters: the named point moves to `p`, the size stays.

export const withLeftTop = (rect: Rect, p: Pos): Rect => {
  const size = rectSize(rect);
  return rectUnchecked(p, addDims(p, size.width, size.height));
};

export const withRightTop = (rect: Rect, p: Pos): Rect => {
  const size = rectSize(rect);
  return rectUnchecked(
    createPos(p.x - size.width, p.y),
    createPos(p.x, p.y + size.height)
  );
};

export const withLeftBottom = (rect: Rect, p: Pos): Rect => {
  const size = rectSize(rect);
  return rectUnchecked(
    createPos(p.x, p.y - size.height),
    createPos(p.x + size.width, p.y)
  );
};

export const withRightBottom = (rect: Rect, p: Pos): Rect => {
  const size = rectSize(rect);
  return rectUnchecked(subDims(p, size.width, size.height), p);
};

export const withLeftCenter = (rect: Rect, p: Pos): Rect => {
  const size = rectSize(rect);
  const hh = halfHeight(size);
  return rectUnchecked(
    createPos(p.x, p.y - hh),
    createPos(p.x + size.width, p.y + hh)
  );
};

export const withTopCenter = (rect: Rect, p: Pos): Rect => {
  const size = rectSize(rect);
  const hw = halfWidth(size);
  return rectUnchecked(
    createPos(p.x - hw, p.y),
    createPos(p.x + hw, p.y + size.height)
  );
};

export const withRightCenter = (rect: Rect, p: Pos): Rect => {
  const size = rectSize(rect);
  const hh = halfHeight(size);
  return rectUnchecked(
    createPos(p.x - size.width, p.y - hh),
    createPos(p.x, p.y + hh)
  );
};

export const withBottomCenter = (rect: Rect, p: Pos): Rect => {
  const size = rectSize(rect);
  const hw = halfWidth(size);
  return rectUnchecked(
    createPos(p.x - hw, p.y - size.height),
    createPos(p.x + hw, p.y)
  );
};

export const withCenter = (rect: Rect, p: Pos): Rect => {
  const h = halfSize(rectSize(rect));
  return rectUnchecked(subDims(p, h.width, h.height), addDims(p, h.width, h.height));
};

// Bound setters: only the two edges meeting at the corner move.

export const withLeftTopBound = (rect: Rect, p: Pos): Rect => rectUnchecked(p, rect.max);

export const withRightTopBound = (rect: Rect, p: Pos): Rect =>
  rectUnchecked(createPos(rect.min.x, p.y), createPos(p.x, rect.max.y));

export const withLeftBottomBound = (rect: Rect, p: Pos): Rect =>
  rectUnchecked(createPos(p.x, rect.min.y), createPos(rect.max.x, p.y));

export const withRightBottomBound = (rect: Rect, p: Pos): Rect => rectUnchecked(rect.min, p);

export const rectAnchor = (rect: Rect, anchor: Anchor): Pos => {
  switch (anchor) {
    case "leftTop":
      return leftTop(rect);
    case "leftCenter":
      return leftCenter(rect);
    case "leftBottom":
      return leftBottom(rect);
    case "bottomCenter":
      return bottomCenter(rect);
    case "rightBottom":
      return rightBottom(rect);
    case "rightCenter":
      return rightCenter(rect);
    case "rightTop":
      return rightTop(rect);
    case "topCenter":
      return topCenter(rect);
    case "center":
      return rectCenter(rect);
  }
};

/** Moves the rect, size unchanged, so that `rectAnchor(result, anchor)` is `p`. */
export const withPlacedAnchor = (rect: Rect, anchor: Anchor, p: Pos): Rect => {
  switch (anchor) {
    case "leftTop":
      return withLeftTop(rect, p);
    case "leftCenter":
      return withLeftCenter(rect, p);
    case "leftBottom":
      return withLeftBottom(rect, p);
    case "bottomCenter":
      return withBottomCenter(rect, p);
    case "rightBottom":
      return withRightBottom(rect, p);
    case "rightCenter":
      return withRightCenter(rect, p);
    case "rightTop":
      return withRightTop(rect, p);
    case "topCenter":
      return withTopCenter(rect, p);
    case "center":
      return withCenter(rect, p);
  }
};

/**
 * Moves the edges that `anchor` lies on to `p`, resizing the rect. Edge
 * midpoints move a single edge; the center has no edge and moves the rect.
 */
export const withPlacedAnchorBound = (rect: Rect, anchor: Anchor, p: Pos): Rect => {
  switch (anchor) {
    case "leftTop":
      return withLeftTopBound(rect, p);
    case "leftCenter":
      return withLeftBound(rect, p.x);
    case "leftBottom":
      return withLeftBottomBound(rect, p);
    case "bottomCenter":
      return withBottomBound(rect, p.y);
    case "rightBottom":
      return withRightBottomBound(rect, p);
    case "rightCenter":
      return withRightBound(rect, p.x);
    case "rightTop":
      return withRightTopBound(rect, p);
    case "topCenter":
      return withTopBound(rect, p.y);
    case "center":
      return withCenter(rect, p);
  }
};

/**
 * Flips the rect across `anchor`: the point currently at `anchor` becomes
 * the opposite anchor of the result, which occupies the far side.
 */
export const movedToAnchor = (rect: Rect, anchor: Anchor): Rect => {
  switch (anchor) {
    case "leftTop":
      return withRightBottom(rect, leftTop(rect));
    case "leftCenter":
      return withRightCenter(rect, leftCenter(rect));
    case "leftBottom":
      return withRightTop(rect, leftBottom(rect));
    case "bottomCenter":
      return withTopCenter(rect, bottomCenter(rect));
    case "rightBottom":
      return withLeftTop(rect, rightBottom(rect));
    case "rightCenter":
      return withLeftCenter(rect, rightCenter(rect));
    case "rightTop":
      return withLeftBottom(rect, rightTop(rect));
    case "topCenter":
      return withBottomCenter(rect, topCenter(rect));
    case "center":
      return rect;
  }
};

// ---------------------------------------------------------------------------
// Translation
// ---------------------------------------------------------------------------

export const translateRect = (rect: Rect, offset: Pos): Rect =>
  rectUnchecked(addPos(rect.min, offset), addPos(rect.max, offset));

export const untranslateRect = (rect: Rect, offset: Pos): Rect =>
  rectUnchecked(subPos(rect.min, offset), subPos(rect.max, offset));

/** Steps the rect by whole multiples of its own size. */
export const movedOnGrid = (rect: Rect, cols: number, rows: number): Rect =>
  translateRect(rect, createPos(rectWidth(rect) * cols, rectHeight(rect) * rows));

/** Point at a `[0, 1]` UV coordinate inside the rect. */
export const uvPos = (rect: Rect, uv: Pos): Pos =>
  createPos(lerp(rect.min.x, rect.max.x, uv.x), lerp(rect.min.y, rect.max.y, uv.y));

/** Moves the rect so that its `uv` point sits at `p`. */
export const withUvPos = (rect: Rect, uv: Pos, p: Pos): Rect =>
  translateRect(rect, subPos(p, uvPos(rect, uv)));

/**
 * Moves `pivot` to `p` and carries the rect along, keeping its offset from
 * the pivot.
 */
export const withRelativePosition = (rect: Rect, pivot: Pos, p: Pos): Rect =>
  rectUnchecked(addPos(p, subPos(rect.min, pivot)), addPos(p, subPos(rect.max, pivot)));

// ---------------------------------------------------------------------------
// Interpolation and rounding
// ---------------------------------------------------------------------------

export const lerpRect = (a: Rect, b: Rect, t: number): Rect =>
  fromMinMax(lerpPos(a.min, b.min, t), lerpPos(a.max, b.max, t));

export const clampedLerpRect = (a: Rect, b: Rect, t: number): Rect =>
  lerpRect(a, b, clamp01(t));

export const floorRect = (rect: Rect): Rect => fromMinMax(floorPos(rect.min), floorPos(rect.max));

export const ceilRect = (rect: Rect): Rect => fromMinMax(ceilPos(rect.min), ceilPos(rect.max));

export const roundRect = (rect: Rect): Rect => fromMinMax(roundPos(rect.min), roundPos(rect.max));

/** Floors `min` and ceils `max`: the smallest integer rect covering this one. */
export const floorCeilRect = (rect: Rect): Rect =>
  fromMinMax(floorPos(rect.min), ceilPos(rect.max));

/** Ceils `min` and floors `max`: the largest integer rect inside this one. */
export const ceilFloorRect = (rect: Rect): Rect =>
  fromMinMax(ceilPos(rect.min), floorPos(rect.max));

// ---------------------------------------------------------------------------
// Swapped lengths
// ---------------------------------------------------------------------------

/** Swaps width and height, keeping `min`. */
export const swappedLengths = (rect: Rect): Rect =>
  fromMinSize(rect.min, swapDims(rectSize(rect)));

export const centeredSwappedLengths = (rect: Rect): Rect =>
  centeredRect(rectCenter(rect), swapDims(rectSize(rect)));

export const anchoredSwappedLengths = (rect: Rect, anchor: Anchor): Rect =>
  fromAnchoredPivot(anchor, rectAnchor(rect, anchor), swapDims(rectSize(rect)));
