/**
 * Where a handle sits relative to a rect's boundary: flush inside it,
 * straddling it, or entirely beyond it.
 */
export type Placement = "inside" | "middle" | "outside";

export const PLACEMENTS: ReadonlyArray<Placement> = ["inside", "middle", "outside"];
