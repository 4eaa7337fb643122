import type { Anchor } from "./anchor";
import type { Axial, Intercardinal } from "./direction";
import type { Placement } from "./placement";
import { addDims, createPos, subDims, type Pos } from "./pos";
import { createQuadSubdivide, type QuadSubdivide } from "./quad-subdivide";
import {
  centeredRect,
  centeredSquare,
  fromMinMax,
  leftBottom,
  leftCenter,
  leftTop,
  rectAnchor,
  rectCenter,
  rectUnchecked,
  rightBottom,
  rightCenter,
  rightTop,
  topCenter,
  bottomCenter,
  type Rect,
} from "./rect";
import { half, midpoint } from "./scalar";
import type { Size } from "./size";

// ---------------------------------------------------------------------------
// Splits
//
// A split length outside `[0, width]` (or height) is not checked and yields
// a malformed piece.
// ---------------------------------------------------------------------------

/** `[left, right]`, where `left` is `length` wide. */
export const splitFromLeft = (rect: Rect, length: number): readonly [Rect, Rect] => {
  const x = rect.min.x + length;
  return [
    rectUnchecked(rect.min, createPos(x, rect.max.y)),
    rectUnchecked(createPos(x, rect.min.y), rect.max),
  ];
};

/** `[top, bottom]`, where `top` is `length` tall. */
export const splitFromTop = (rect: Rect, length: number): readonly [Rect, Rect] => {
  const y = rect.min.y + length;
  return [
    rectUnchecked(rect.min, createPos(rect.max.x, y)),
    rectUnchecked(createPos(rect.min.x, y), rect.max),
  ];
};

/** `[right, left]`, where `right` is `length` wide. */
export const splitFromRight = (rect: Rect, length: number): readonly [Rect, Rect] => {
  const x = rect.max.x - length;
  return [
    rectUnchecked(createPos(x, rect.min.y), rect.max),
    rectUnchecked(rect.min, createPos(x, rect.max.y)),
  ];
};

/** `[bottom, top]`, where `bottom` is `length` tall. */
export const splitFromBottom = (rect: Rect, length: number): readonly [Rect, Rect] => {
  const y = rect.max.y - length;
  return [
    rectUnchecked(createPos(rect.min.x, y), rect.max),
    rectUnchecked(rect.min, createPos(rect.max.x, y)),
  ];
};

/** `[left, right]` halves. */
export const splitHorizontal = (rect: Rect): readonly [Rect, Rect] => {
  const middle = midpoint(rect.min.x, rect.max.x);
  return [
    fromMinMax(rect.min, createPos(middle, rect.max.y)),
    fromMinMax(createPos(middle, rect.min.y), rect.max),
  ];
};

/** `[top, bottom]` halves. */
export const splitVertical = (rect: Rect): readonly [Rect, Rect] => {
  const middle = midpoint(rect.min.y, rect.max.y);
  return [
    fromMinMax(rect.min, createPos(rect.max.x, middle)),
    fromMinMax(createPos(rect.min.x, middle), rect.max),
  ];
};

export const intoQuadrants = (rect: Rect): QuadSubdivide<Rect> => {
  const mid = rectCenter(rect);
  return createQuadSubdivide(
    fromMinMax(rect.min, mid),
    fromMinMax(createPos(mid.x, rect.min.y), createPos(rect.max.x, mid.y)),
    fromMinMax(createPos(rect.min.x, mid.y), createPos(mid.x, rect.max.y)),
    fromMinMax(mid, rect.max)
  );
};

// ---------------------------------------------------------------------------
// Adjacent rects
// ---------------------------------------------------------------------------

/** Strip of the given thickness touching the left edge from outside. */
export const leftAdjacent = (rect: Rect, length: number): Rect =>
  rectUnchecked(createPos(rect.min.x - length, rect.min.y), leftBottom(rect));

export const topAdjacent = (rect: Rect, length: number): Rect =>
  rectUnchecked(createPos(rect.min.x, rect.min.y - length), rightTop(rect));

export const rightAdjacent = (rect: Rect, length: number): Rect =>
  rectUnchecked(rightTop(rect), createPos(rect.max.x + length, rect.max.y));

export const bottomAdjacent = (rect: Rect, length: number): Rect =>
  rectUnchecked(leftBottom(rect), createPos(rect.max.x, rect.max.y + length));

/** Rect of `size` touching the left-top corner diagonally from outside. */
export const leftTopAdjacent = (rect: Rect, size: Size): Rect =>
  fromMinMax(subDims(rect.min, size.width, size.height), rect.min);

export const rightTopAdjacent = (rect: Rect, size: Size): Rect =>
  fromMinMax(
    createPos(rect.max.x, rect.min.y - size.height),
    createPos(rect.max.x + size.width, rect.min.y)
  );

export const leftBottomAdjacent = (rect: Rect, size: Size): Rect =>
  fromMinMax(
    createPos(rect.min.x - size.width, rect.max.y),
    createPos(rect.min.x, rect.max.y + size.height)
  );

export const rightBottomAdjacent = (rect: Rect, size: Size): Rect =>
  fromMinMax(rect.max, addDims(rect.max, size.width, size.height));

// ---------------------------------------------------------------------------
// Handles
// ---------------------------------------------------------------------------

const span = (minX: number, minY: number, maxX: number, maxY: number): Rect =>
  rectUnchecked(createPos(minX, minY), createPos(maxX, maxY));

const insideHandle = (rect: Rect, anchor: Anchor, s: number): Rect => {
  const { min, max } = rect;
  switch (anchor) {
    case "leftTop":
      return span(min.x, min.y, min.x + s, min.y + s);
    case "leftCenter":
      return span(min.x, min.y + s, min.x + s, max.y - s);
    case "leftBottom":
      return span(min.x, max.y - s, min.x + s, max.y);
    case "bottomCenter":
      return span(min.x + s, max.y - s, max.x - s, max.y);
    case "rightBottom":
      return span(max.x - s, max.y - s, max.x, max.y);
    case "rightCenter":
      return span(max.x - s, min.y + s, max.x, max.y - s);
    case "rightTop":
      return span(max.x - s, min.y, max.x, min.y + s);
    case "topCenter":
      return span(min.x + s, min.y, max.x - s, min.y + s);
    case "center":
      return span(min.x + s, min.y + s, max.x - s, max.y - s);
  }
};

// `h` is half the handle size: the handle straddles the edge.
const middleHandle = (rect: Rect, anchor: Anchor, h: number): Rect => {
  const { min, max } = rect;
  switch (anchor) {
    case "leftTop":
      return span(min.x - h, min.y - h, min.x + h, min.y + h);
    case "leftCenter":
      return span(min.x - h, min.y + h, min.x + h, max.y - h);
    case "leftBottom":
      return span(min.x - h, max.y - h, min.x + h, max.y + h);
    case "bottomCenter":
      return span(min.x + h, max.y - h, max.x - h, max.y + h);
    case "rightBottom":
      return span(max.x - h, max.y - h, max.x + h, max.y + h);
    case "rightCenter":
      return span(max.x - h, min.y + h, max.x + h, max.y - h);
    case "rightTop":
      return span(max.x - h, min.y - h, max.x + h, min.y + h);
    case "topCenter":
      return span(min.x + h, min.y - h, max.x - h, min.y + h);
    case "center":
      return span(min.x + h, min.y + h, max.x - h, max.y - h);
  }
};

const outsideHandle = (rect: Rect, anchor: Anchor, s: number): Rect => {
  const { min, max } = rect;
  switch (anchor) {
    case "leftTop":
      return span(min.x - s, min.y - s, min.x, min.y);
    case "leftCenter":
      return span(min.x - s, min.y, min.x, max.y);
    case "leftBottom":
      return span(min.x - s, max.y, min.x, max.y + s);
    case "bottomCenter":
      return span(min.x, max.y, max.x, max.y + s);
    case "rightBottom":
      return span(max.x, max.y, max.x + s, max.y + s);
    case "rightCenter":
      return span(max.x, min.y, max.x + s, max.y);
    case "rightTop":
      return span(max.x, min.y - s, max.x + s, min.y);
    case "topCenter":
      return span(min.x, min.y - s, max.x, min.y);
    case "center":
      return rect;
  }
};

/**
 * A handle of thickness `size` on the given anchor of `rect`. Corner
 * handles are squares inside the corner, centred on it, or diagonally
 * outside it. Edge handles run along the edge between the corner squares
 * (inside, middle) or along its full length (outside). The center handle is
 * the rect shrunk by `size` or `size / 2` on every side, or the rect itself
 * when placed outside.
 */
export const handleRect = (
  rect: Rect,
  anchor: Anchor,
  placement: Placement,
  size: number
): Rect => {
  switch (placement) {
    case "inside":
      return insideHandle(rect, anchor, size);
    case "middle":
      return middleHandle(rect, anchor, half(size));
    case "outside":
      return outsideHandle(rect, anchor, size);
  }
};

export const anchorRect = handleRect;

/** Rect of `size` centred on the given anchor point. */
export const pivotRect = (rect: Rect, anchor: Anchor, size: Size): Rect =>
  centeredRect(rectAnchor(rect, anchor), size);

export const squarePivotRect = (rect: Rect, anchor: Anchor, sideLength: number): Rect =>
  centeredSquare(rectAnchor(rect, anchor), sideLength);

// ---------------------------------------------------------------------------
// Corners and edges
// ---------------------------------------------------------------------------

/** `[leftTop, rightTop, leftBottom, rightBottom]` */
export const corners = (rect: Rect): readonly [Pos, Pos, Pos, Pos] => [
  leftTop(rect),
  rightTop(rect),
  leftBottom(rect),
  rightBottom(rect),
];

/** Clockwise on screen from the left-top corner. */
export const cornersCw = (rect: Rect): readonly [Pos, Pos, Pos, Pos] => [
  leftTop(rect),
  rightTop(rect),
  rightBottom(rect),
  leftBottom(rect),
];

/** Counter-clockwise on screen from the left-top corner. */
export const cornersCcw = (rect: Rect): readonly [Pos, Pos, Pos, Pos] => [
  leftTop(rect),
  leftBottom(rect),
  rightBottom(rect),
  rightTop(rect),
];

export const rectCorner = (rect: Rect, corner: Intercardinal): Pos => {
  switch (corner) {
    case "nw":
      return leftTop(rect);
    case "ne":
      return rightTop(rect);
    case "se":
      return rightBottom(rect);
    case "sw":
      return leftBottom(rect);
  }
};

export const edgeMidpoint = (rect: Rect, edge: Axial): Pos => {
  switch (edge) {
    case "left":
      return leftCenter(rect);
    case "up":
      return topCenter(rect);
    case "right":
      return rightCenter(rect);
    case "down":
      return bottomCenter(rect);
  }
};

/** End points of an edge in clockwise order. */
export const edgePointsCw = (rect: Rect, edge: Axial): readonly [Pos, Pos] => {
  switch (edge) {
    case "left":
      return [leftBottom(rect), leftTop(rect)];
    case "up":
      return [leftTop(rect), rightTop(rect)];
    case "right":
      return [rightTop(rect), rightBottom(rect)];
    case "down":
      return [rightBottom(rect), leftBottom(rect)];
  }
};

export const edgePointsCcw = (rect: Rect, edge: Axial): readonly [Pos, Pos] => {
  switch (edge) {
    case "left":
      return [leftTop(rect), leftBottom(rect)];
    case "up":
      return [rightTop(rect), leftTop(rect)];
    case "right":
      return [rightBottom(rect), rightTop(rect)];
    case "down":
      return [leftBottom(rect), rightBottom(rect)];
  }
};

/** End points of an edge, lower coordinate first. */
export const edgePointsMinMax = (rect: Rect, edge: Axial): readonly [Pos, Pos] => {
  switch (edge) {
    case "left":
      return [leftTop(rect), leftBottom(rect)];
    case "up":
      return [leftTop(rect), rightTop(rect)];
    case "right":
      return [rightTop(rect), rightBottom(rect)];
    case "down":
      return [leftBottom(rect), rightBottom(rect)];
  }
};

/** End points of an edge, higher coordinate first. */
export const edgePointsMaxMin = (rect: Rect, edge: Axial): readonly [Pos, Pos] => {
  switch (edge) {
    case "left":
      return [leftBottom(rect), leftTop(rect)];
    case "up":
      return [rightTop(rect), leftTop(rect)];
    case "right":
      return [rightBottom(rect), rightTop(rect)];
    case "down":
      return [rightBottom(rect), leftBottom(rect)];
  }
};
