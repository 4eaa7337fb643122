import type { Anchor } from "./anchor";
import { marginX, marginY, type AnyMargin } from "./margin";
import type { AnyPadding } from "./padding";
import { addDims, subDims } from "./pos";
import {
  centeredRect,
  fromAnchoredPivot,
  fromMinMax,
  rectAnchor,
  rectCenter,
  rectSize,
  withSize,
  withSizeAnchored,
  withSizeCentered,
  type Rect,
} from "./rect";
import {
  aspectRatio,
  growSize,
  minDim,
  scaleSize,
  shrinkSize,
  type Size,
} from "./size";

// ---------------------------------------------------------------------------
// Inflate / deflate
// ---------------------------------------------------------------------------

/** Pushes every edge outward by `amount`. */
export const inflate = (rect: Rect, amount: number): Rect => inflate2(rect, amount, amount);

export const inflate2 = (rect: Rect, x: number, y: number): Rect =>
  fromMinMax(subDims(rect.min, x, y), addDims(rect.max, x, y));

/** Pulls every edge inward by `amount`. */
export const deflate = (rect: Rect, amount: number): Rect => deflate2(rect, amount, amount);

export const deflate2 = (rect: Rect, x: number, y: number): Rect =>
  fromMinMax(addDims(rect.min, x, y), subDims(rect.max, x, y));

// ---------------------------------------------------------------------------
// Size
// ---------------------------------------------------------------------------

/** Grows `max` by `size`; `min` stays put. */
export const addSizeToRect = (rect: Rect, size: Size): Rect =>
  fromMinMax(rect.min, addDims(rect.max, size.width, size.height));

export const subSizeFromRect = (rect: Rect, size: Size): Rect =>
  fromMinMax(rect.min, subDims(rect.max, size.width, size.height));

/** Pushes each edge outward by the size; the total grows by twice as much. */
export const addSizeCentered = (rect: Rect, size: Size): Rect =>
  inflate2(rect, size.width, size.height);

export const subSizeCentered = (rect: Rect, size: Size): Rect =>
  deflate2(rect, size.width, size.height);

// ---------------------------------------------------------------------------
// Padding
// ---------------------------------------------------------------------------

/** Shrinks the rect by the padding on each side. */
export const addPadding = (rect: Rect, padding: AnyPadding): Rect =>
  fromMinMax(
    addDims(rect.min, padding.left, padding.top),
    subDims(rect.max, padding.right, padding.bottom)
  );

/** Undoes `addPadding`. */
export const subPadding = (rect: Rect, padding: AnyPadding): Rect =>
  fromMinMax(
    subDims(rect.min, padding.left, padding.top),
    addDims(rect.max, padding.right, padding.bottom)
  );

// ---------------------------------------------------------------------------
// Margin
// ---------------------------------------------------------------------------

/** Grows the rect by the margin's total width and height, keeping `min`. */
export const addMargin = (rect: Rect, margin: AnyMargin): Rect =>
  fromMinMax(rect.min, addDims(rect.max, marginX(margin), marginY(margin)));

export const subMargin = (rect: Rect, margin: AnyMargin): Rect =>
  fromMinMax(rect.min, subDims(rect.max, marginX(margin), marginY(margin)));

/** Pushes each edge outward by its own side of the margin. */
export const addMarginCentered = (rect: Rect, margin: AnyMargin): Rect =>
  fromMinMax(
    subDims(rect.min, margin.left, margin.top),
    addDims(rect.max, margin.right, margin.bottom)
  );

export const subMarginCentered = (rect: Rect, margin: AnyMargin): Rect =>
  fromMinMax(
    addDims(rect.min, margin.left, margin.top),
    subDims(rect.max, margin.right, margin.bottom)
  );

/** Grows by the margin's total width and height with `anchor` held in place. */
export const addMarginAnchored = (rect: Rect, margin: AnyMargin, anchor: Anchor): Rect =>
  fromAnchoredPivot(anchor, rectAnchor(rect, anchor), growSize(rectSize(rect), margin));

export const subMarginAnchored = (rect: Rect, margin: AnyMargin, anchor: Anchor): Rect =>
  fromAnchoredPivot(anchor, rectAnchor(rect, anchor), shrinkSize(rectSize(rect), margin));

/**
 * `rect + insets`: a margin grows every side outward, a padding shrinks
 * every side inward.
 */
export const applyInsets = (rect: Rect, insets: AnyMargin | AnyPadding): Rect => {
  switch (insets.tag) {
    case "margin":
    case "marginf":
      return addMarginCentered(rect, insets);
    case "padding":
    case "paddingf":
      return addPadding(rect, insets);
  }
};

/** `rect - insets`, the inverse of `applyInsets`. */
export const removeInsets = (rect: Rect, insets: AnyMargin | AnyPadding): Rect => {
  switch (insets.tag) {
    case "margin":
    case "marginf":
      return subMarginCentered(rect, insets);
    case "padding":
    case "paddingf":
      return subPadding(rect, insets);
  }
};

// ---------------------------------------------------------------------------
// Scale
// ---------------------------------------------------------------------------

/** Scales the size, keeping `min`. */
export const withScale = (rect: Rect, scalar: number): Rect =>
  withSize(rect, scaleSize(rectSize(rect), scalar));

export const withScaleCentered = (rect: Rect, scalar: number): Rect =>
  withSizeCentered(rect, scaleSize(rectSize(rect), scalar));

export const withScaleAnchored = (rect: Rect, scalar: number, anchor: Anchor): Rect =>
  withSizeAnchored(rect, scaleSize(rectSize(rect), scalar), anchor);

/** Largest rect with the proportions of `size` that fits inside, centred. */
export const scaleInside = (rect: Rect, size: Size): Rect => {
  const own = rectSize(rect);
  const scalar =
    aspectRatio(own) >= aspectRatio(size)
      ? own.height / size.height
      : own.width / size.width;
  return centeredRect(rectCenter(rect), scaleSize(size, scalar));
};

/** Smallest rect with the proportions of `size` that covers this one, centred. */
export const scaleOutside = (rect: Rect, size: Size): Rect => {
  const own = rectSize(rect);
  const scalar =
    aspectRatio(own) >= aspectRatio(size)
      ? own.width / size.width
      : own.height / size.height;
  return centeredRect(rectCenter(rect), scaleSize(size, scalar));
};

/**
 * Scales `size` so its shorter side matches this rect's shorter side,
 * centred.
 */
export const scaleMiddle = (rect: Rect, size: Size): Rect => {
  const own = rectSize(rect);
  const scaleBy = aspectRatio(own) >= 1 ? own.height : own.width;
  return centeredRect(rectCenter(rect), scaleSize(size, scaleBy / minDim(size)));
};

