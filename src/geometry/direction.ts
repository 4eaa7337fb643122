// ---------------------------------------------------------------------------
// Compass directions used as inputs/outputs of Pos and Rect queries
// ---------------------------------------------------------------------------

/** Eight compass directions, ordered counter-clockwise starting at East. */
export type Cardinal = "e" | "ne" | "n" | "nw" | "w" | "sw" | "s" | "se";

export const CARDINALS: ReadonlyArray<Cardinal> = [
  "e",
  "ne",
  "n",
  "nw",
  "w",
  "sw",
  "s",
  "se",
];

const CARDINAL_TEXT: Record<Cardinal, string> = {
  e: "East",
  ne: "Northeast",
  n: "North",
  nw: "Northwest",
  w: "West",
  sw: "Southwest",
  s: "South",
  se: "Southeast",
};

export const cardinalText = (c: Cardinal): string => CARDINAL_TEXT[c];

export const cardinalAntipode = (c: Cardinal): Cardinal => {
  switch (c) {
    case "e":
      return "w";
    case "ne":
      return "sw";
    case "n":
      return "s";
    case "nw":
      return "se";
    case "w":
      return "e";
    case "sw":
      return "ne";
    case "s":
      return "n";
    case "se":
      return "nw";
  }
};

export const isPrimaryCardinal = (c: Cardinal): boolean =>
  c === "n" || c === "e" || c === "s" || c === "w";

export const isSecondaryCardinal = (c: Cardinal): boolean => !isPrimaryCardinal(c);

/** The four orthogonal directions, counter-clockwise starting at Right. */
export type Axial = "right" | "up" | "left" | "down";

export const AXIALS: ReadonlyArray<Axial> = ["right", "up", "left", "down"];

export const axialOpposite = (a: Axial): Axial => {
  switch (a) {
    case "right":
      return "left";
    case "up":
      return "down";
    case "left":
      return "right";
    case "down":
      return "up";
  }
};

/** Up/down name the horizontal edges of a rect (top and bottom). */
export const isHorizontalAxial = (a: Axial): boolean => a === "up" || a === "down";

/** Left/right name the vertical edges of a rect. */
export const isVerticalAxial = (a: Axial): boolean => a === "left" || a === "right";

/** Rect corners by compass name. */
export type Intercardinal = "nw" | "ne" | "se" | "sw";

export const INTERCARDINALS: ReadonlyArray<Intercardinal> = ["nw", "ne", "se", "sw"];
