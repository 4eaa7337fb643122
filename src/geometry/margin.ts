import { clamp01 } from "./scalar";
import {
  insetsX,
  insetsY,
  int8Insets,
  lerpInsets,
  lerpInt8Insets,
  relabelInsets,
  tagInsets,
  type TaggedInsets,
} from "./insets";
import type { Padding, Paddingf } from "./padding";

/** Integer outward inset; each side is an 8-bit signed value. */
export type Margin = TaggedInsets<"margin">;

/** Float outward inset. */
export type Marginf = TaggedInsets<"marginf">;

export type AnyMargin = Margin | Marginf;

// ---------------------------------------------------------------------------
// Margin (integer)
// ---------------------------------------------------------------------------

export const createMargin = (
  left: number,
  top: number,
  right: number,
  bottom: number
): Margin => int8Insets("margin", left, top, right, bottom);

export const sameMargin = (all: number): Margin => createMargin(all, all, all, all);

/** `x` for left/right, `y` for top/bottom. */
export const symmetricMargin = (x: number, y: number): Margin =>
  createMargin(x, y, x, y);

export const MARGIN_ZERO: Margin = sameMargin(0);

export const addMargins = (a: Margin, b: Margin): Margin =>
  createMargin(a.left + b.left, a.top + b.top, a.right + b.right, a.bottom + b.bottom);

export const subMargins = (a: Margin, b: Margin): Margin =>
  createMargin(a.left - b.left, a.top - b.top, a.right - b.right, a.bottom - b.bottom);

export const lerpMargin = (a: Margin, b: Margin, t: number): Margin =>
  lerpInt8Insets("margin", a, b, t);

export const clampedLerpMargin = (a: Margin, b: Margin, t: number): Margin =>
  lerpMargin(a, b, clamp01(t));

export const toMarginf = (margin: Margin): Marginf => relabelInsets(margin, "marginf");

/** Same values, read as a padding: the effect on a rect flips from grow to shrink. */
export const marginToPadding = (margin: Margin): Padding =>
  relabelInsets(margin, "padding");

// ---------------------------------------------------------------------------
// Marginf (float)
// ---------------------------------------------------------------------------

export const createMarginf = (
  left: number,
  top: number,
  right: number,
  bottom: number
): Marginf => tagInsets("marginf", left, top, right, bottom);

export const sameMarginf = (all: number): Marginf => createMarginf(all, all, all, all);

export const symmetricMarginf = (x: number, y: number): Marginf =>
  createMarginf(x, y, x, y);

export const MARGINF_ZERO: Marginf = sameMarginf(0);

export const addMarginfs = (a: Marginf, b: Marginf): Marginf =>
  createMarginf(a.left + b.left, a.top + b.top, a.right + b.right, a.bottom + b.bottom);

export const subMarginfs = (a: Marginf, b: Marginf): Marginf =>
  createMarginf(a.left - b.left, a.top - b.top, a.right - b.right, a.bottom - b.bottom);

export const lerpMarginf = (a: Marginf, b: Marginf, t: number): Marginf =>
  lerpInsets("marginf", a, b, t);

export const clampedLerpMarginf = (a: Marginf, b: Marginf, t: number): Marginf =>
  lerpMarginf(a, b, clamp01(t));

export const marginfToPaddingf = (margin: Marginf): Paddingf =>
  relabelInsets(margin, "paddingf");

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

export const marginX = (margin: AnyMargin): number => insetsX(margin);

export const marginY = (margin: AnyMargin): number => insetsY(margin);
