import { half } from "./scalar";
import { insetsX, insetsY, type Insets } from "./insets";

/** Width/height extent. Intended to be non-negative; see `isPositiveSize`. */
export interface Size {
  readonly width: number;
  readonly height: number;
}

/** A bare `[x, y]` / `[width, height]` pair. */
export type Dims = readonly [number, number];

export type SizeOperand = Size | Dims | number;

export const createSize = (width: number, height: number): Size => ({
  width,
  height,
});

export const squareSize = (sideLength: number): Size =>
  createSize(sideLength, sideLength);

export const SIZE_ZERO: Size = createSize(0, 0);
export const SIZE_ONE: Size = createSize(1, 1);
export const SIZE_W: Size = createSize(1, 0);
export const SIZE_H: Size = createSize(0, 1);

/** Common display resolutions. */
export const RESOLUTIONS = {
  vga: createSize(640, 360),
  sdNtsc: createSize(720, 480),
  sdPal: createSize(720, 576),
  hd: createSize(1280, 720),
  wxga: createSize(1280, 800),
  fhd: createSize(1920, 1080),
  qhd: createSize(2560, 1440),
  dci2k: createSize(2048, 1080),
  uhd4k: createSize(3840, 2160),
  dci4k: createSize(4096, 2160),
  uhd8k: createSize(7680, 4320),
  dci8k: createSize(8192, 4320),
} as const satisfies Record<string, Size>;

export const sizeToDims = (size: Size): Dims => [size.width, size.height];

export const sizeFromDims = ([width, height]: Dims): Size =>
  createSize(width, height);

const sizeOperandDims = (rhs: SizeOperand): Dims => {
  if (typeof rhs === "number") return [rhs, rhs];
  if ("width" in rhs) return [rhs.width, rhs.height];
  return rhs;
};

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export const area = (size: Size): number => size.width * size.height;

export const halfSize = (size: Size): Size =>
  createSize(half(size.width), half(size.height));

export const halfWidth = (size: Size): number => half(size.width);

export const halfHeight = (size: Size): number => half(size.height);

/** `width / height`; infinite or NaN when the height is zero. */
export const aspectRatio = (size: Size): number => size.width / size.height;

/** Exact equality of both sides. Prefer `isSquareFuzzy` for computed sizes. */
export const isSquare = (size: Size): boolean => size.width === size.height;

export const isSquareFuzzy = (size: Size, error: number): boolean =>
  Math.max(size.width, size.height) - Math.min(size.width, size.height) <= error;

export const isHorizontalSize = (size: Size): boolean => size.width > size.height;

export const isVerticalSize = (size: Size): boolean => size.height > size.width;

/** The well-formedness check for sizes: both sides `>= 0`. */
export const isPositiveSize = (size: Size): boolean =>
  size.width >= 0 && size.height >= 0;

export const minDim = (size: Size): number => Math.min(size.width, size.height);

export const maxDim = (size: Size): number => Math.max(size.width, size.height);

// ---------------------------------------------------------------------------
// Transforms
// ---------------------------------------------------------------------------

export const negateSize = (size: Size): Size => createSize(-size.width, -size.height);

export const scaleSize = (size: Size, scalar: number): Size =>
  createSize(size.width * scalar, size.height * scalar);

export const innerSquare = (size: Size): Size => squareSize(minDim(size));

export const swapDims = (size: Size): Size => createSize(size.height, size.width);

export const addSizeDims = (size: Size, width: number, height: number): Size =>
  createSize(size.width + width, size.height + height);

export const subSizeDims = (size: Size, width: number, height: number): Size =>
  createSize(size.width - width, size.height - height);

export const mulSizeDims = (size: Size, width: number, height: number): Size =>
  createSize(size.width * width, size.height * height);

export const divSizeDims = (size: Size, width: number, height: number): Size =>
  createSize(size.width / width, size.height / height);

export const remSizeDims = (size: Size, width: number, height: number): Size =>
  createSize(size.width % width, size.height % height);

export const addSize = (size: Size, rhs: SizeOperand): Size =>
  addSizeDims(size, ...sizeOperandDims(rhs));

export const subSize = (size: Size, rhs: SizeOperand): Size =>
  subSizeDims(size, ...sizeOperandDims(rhs));

export const mulSize = (size: Size, rhs: SizeOperand): Size =>
  mulSizeDims(size, ...sizeOperandDims(rhs));

export const divSize = (size: Size, rhs: SizeOperand): Size =>
  divSizeDims(size, ...sizeOperandDims(rhs));

export const remSize = (size: Size, rhs: SizeOperand): Size =>
  remSizeDims(size, ...sizeOperandDims(rhs));

/** Size after adding the total horizontal/vertical contribution of an inset. */
export const growSize = (size: Size, insets: Insets): Size =>
  addSizeDims(size, insetsX(insets), insetsY(insets));

export const shrinkSize = (size: Size, insets: Insets): Size =>
  subSizeDims(size, insetsX(insets), insetsY(insets));
