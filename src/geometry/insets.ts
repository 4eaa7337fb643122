import { lerp, saturatingInt8, int8 } from "./scalar";

/** Four-sided offsets shared by margins and paddings. */
export interface Insets {
  readonly left: number;
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
}

/**
 * Which way an inset acts on a rect. Margins grow it, paddings shrink it;
 * the `f` variants hold floats, the others 8-bit integers.
 */
export type InsetTag = "margin" | "marginf" | "padding" | "paddingf";

export interface TaggedInsets<T extends InsetTag> extends Insets {
  readonly tag: T;
}

/** Total horizontal contribution: `left + right`. */
export const insetsX = (insets: Insets): number => insets.left + insets.right;

/** Total vertical contribution: `top + bottom`. */
export const insetsY = (insets: Insets): number => insets.top + insets.bottom;

export const tagInsets = <T extends InsetTag>(
  tag: T,
  left: number,
  top: number,
  right: number,
  bottom: number
): TaggedInsets<T> => ({ tag, left, top, right, bottom });

/** Same four values under a new tag. */
export const relabelInsets = <T extends InsetTag>(
  insets: Insets,
  tag: T
): TaggedInsets<T> =>
  tagInsets(tag, insets.left, insets.top, insets.right, insets.bottom);

export const int8Insets = <T extends InsetTag>(
  tag: T,
  left: number,
  top: number,
  right: number,
  bottom: number
): TaggedInsets<T> =>
  tagInsets(tag, int8(left), int8(top), int8(right), int8(bottom));

export const combineInsets = <T extends InsetTag>(
  tag: T,
  a: Insets,
  b: Insets,
  op: (lhs: number, rhs: number) => number
): TaggedInsets<T> =>
  tagInsets(
    tag,
    op(a.left, b.left),
    op(a.top, b.top),
    op(a.right, b.right),
    op(a.bottom, b.bottom)
  );

export const lerpInsets = <T extends InsetTag>(
  tag: T,
  a: Insets,
  b: Insets,
  t: number
): TaggedInsets<T> => combineInsets(tag, a, b, (lhs, rhs) => lerp(lhs, rhs, t));

/** Float lerp of integer insets, cast back with int8 saturation. */
export const lerpInt8Insets = <T extends InsetTag>(
  tag: T,
  a: Insets,
  b: Insets,
  t: number
): TaggedInsets<T> =>
  combineInsets(tag, a, b, (lhs, rhs) => saturatingInt8(lerp(lhs, rhs, t)));
