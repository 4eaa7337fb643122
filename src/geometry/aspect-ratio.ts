/** A width-to-height ratio kept as a single scalar. */
export interface AspectRatio {
  readonly ratio: number;
}

export const createAspectRatio = (ratio: number): AspectRatio => ({ ratio });

export const aspectRatioFromDims = (width: number, height: number): AspectRatio =>
  createAspectRatio(width / height);

/** Width that keeps the ratio for the given height. */
export const widthFromHeight = (ar: AspectRatio, height: number): number =>
  height * ar.ratio;

/** Height that keeps the ratio for the given width. */
export const heightFromWidth = (ar: AspectRatio, width: number): number =>
  width / ar.ratio;
