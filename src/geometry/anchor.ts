import { remEuclid } from "./scalar";

/** One of nine reference points on a rect: four corners, four edge midpoints, center. */
export type Anchor =
  | "leftTop"
  | "leftCenter"
  | "leftBottom"
  | "bottomCenter"
  | "rightBottom"
  | "rightCenter"
  | "rightTop"
  | "topCenter"
  | "center";

/** The eight perimeter anchors, counter-clockwise starting at the left-top corner. */
export const PERIMETER_ANCHORS: ReadonlyArray<Exclude<Anchor, "center">> = [
  "leftTop",
  "leftCenter",
  "leftBottom",
  "bottomCenter",
  "rightBottom",
  "rightCenter",
  "rightTop",
  "topCenter",
];

export const ANCHORS: ReadonlyArray<Anchor> = [...PERIMETER_ANCHORS, "center"];

/**
 * Steps a perimeter anchor counter-clockwise by `rotation` positions
 * (negative goes clockwise). The center never moves.
 */
export const rotateAnchor = (anchor: Anchor, rotation: number): Anchor => {
  if (anchor === "center") return anchor;
  const start = PERIMETER_ANCHORS.indexOf(anchor);
  return PERIMETER_ANCHORS[remEuclid(start + Math.trunc(rotation), 8)];
};

/** The anchor diagonally (or straight) across the center. */
export const oppositeAnchor = (anchor: Anchor): Anchor => {
  switch (anchor) {
    case "leftTop":
      return "rightBottom";
    case "leftCenter":
      return "rightCenter";
    case "leftBottom":
      return "rightTop";
    case "bottomCenter":
      return "topCenter";
    case "rightBottom":
      return "leftTop";
    case "rightCenter":
      return "leftCenter";
    case "rightTop":
      return "leftBottom";
    case "topCenter":
      return "bottomCenter";
    case "center":
      return "center";
  }
};

/** Mirrors left and right. */
export const invertAnchorHorizontal = (anchor: Anchor): Anchor => {
  switch (anchor) {
    case "leftTop":
      return "rightTop";
    case "leftCenter":
      return "rightCenter";
    case "leftBottom":
      return "rightBottom";
    case "rightBottom":
      return "leftBottom";
    case "rightCenter":
      return "leftCenter";
    case "rightTop":
      return "leftTop";
    case "bottomCenter":
    case "topCenter":
    case "center":
      return anchor;
  }
};

/** Mirrors top and bottom. */
export const invertAnchorVertical = (anchor: Anchor): Anchor => {
  switch (anchor) {
    case "leftTop":
      return "leftBottom";
    case "leftBottom":
      return "leftTop";
    case "bottomCenter":
      return "topCenter";
    case "rightBottom":
      return "rightTop";
    case "rightTop":
      return "rightBottom";
    case "topCenter":
      return "bottomCenter";
    case "leftCenter":
    case "rightCenter":
    case "center":
      return anchor;
  }
};
