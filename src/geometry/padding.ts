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
import type { Margin, Marginf } from "./margin";

/** Integer inward inset; each side is an 8-bit signed value. */
export type Padding = TaggedInsets<"padding">;

/** Float inward inset. */
export type Paddingf = TaggedInsets<"paddingf">;

export type AnyPadding = Padding | Paddingf;

// ---------------------------------------------------------------------------
// Padding (integer)
// ---------------------------------------------------------------------------

export const createPadding = (
  left: number,
  top: number,
  right: number,
  bottom: number
): Padding => int8Insets("padding", left, top, right, bottom);

export const samePadding = (all: number): Padding => createPadding(all, all, all, all);

export const symmetricPadding = (x: number, y: number): Padding =>
  createPadding(x, y, x, y);

export const PADDING_ZERO: Padding = samePadding(0);

export const addPaddings = (a: Padding, b: Padding): Padding =>
  createPadding(a.left + b.left, a.top + b.top, a.right + b.right, a.bottom + b.bottom);

export const subPaddings = (a: Padding, b: Padding): Padding =>
  createPadding(a.left - b.left, a.top - b.top, a.right - b.right, a.bottom - b.bottom);

export const lerpPadding = (a: Padding, b: Padding, t: number): Padding =>
  lerpInt8Insets("padding", a, b, t);

export const clampedLerpPadding = (a: Padding, b: Padding, t: number): Padding =>
  lerpPadding(a, b, clamp01(t));

export const toPaddingf = (padding: Padding): Paddingf =>
  relabelInsets(padding, "paddingf");

export const paddingToMargin = (padding: Padding): Margin =>
  relabelInsets(padding, "margin");

// ---------------------------------------------------------------------------
// Paddingf (float)
// ---------------------------------------------------------------------------

export const createPaddingf = (
  left: number,
  top: number,
  right: number,
  bottom: number
): Paddingf => tagInsets("paddingf", left, top, right, bottom);

export const samePaddingf = (all: number): Paddingf =>
  createPaddingf(all, all, all, all);

export const symmetricPaddingf = (x: number, y: number): Paddingf =>
  createPaddingf(x, y, x, y);

export const PADDINGF_ZERO: Paddingf = samePaddingf(0);

export const addPaddingfs = (a: Paddingf, b: Paddingf): Paddingf =>
  createPaddingf(a.left + b.left, a.top + b.top, a.right + b.right, a.bottom + b.bottom);

export const subPaddingfs = (a: Paddingf, b: Paddingf): Paddingf =>
  createPaddingf(a.left - b.left, a.top - b.top, a.right - b.right, a.bottom - b.bottom);

export const lerpPaddingf = (a: Paddingf, b: Paddingf, t: number): Paddingf =>
  lerpInsets("paddingf", a, b, t);

export const clampedLerpPaddingf = (a: Paddingf, b: Paddingf, t: number): Paddingf =>
  lerpPaddingf(a, b, clamp01(t));

export const paddingfToMarginf = (padding: Paddingf): Marginf =>
  relabelInsets(padding, "marginf");

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

export const paddingX = (padding: AnyPadding): number => insetsX(padding);

export const paddingY = (padding: AnyPadding): number => insetsY(padding);
