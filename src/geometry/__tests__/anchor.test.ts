import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import {
  ANCHORS,
  PERIMETER_ANCHORS,
  invertAnchorHorizontal,
  invertAnchorVertical,
  oppositeAnchor,
  rotateAnchor,
  type Anchor,
} from "../anchor";
import { PLACEMENTS } from "../placement";

const arbAnchor = fc.constantFrom<Anchor>(...ANCHORS);

describe("anchor lists", () => {
  it("holds nine anchors with the center last", () => {
    expect(ANCHORS).toHaveLength(9);
    expect(ANCHORS[8]).toBe("center");
    expect(PERIMETER_ANCHORS).not.toContain("center");
  });

  it("lists every placement", () => {
    expect(PLACEMENTS).toEqual(["inside", "middle", "outside"]);
  });
});

describe("rotateAnchor", () => {
  it("steps counter-clockwise around the perimeter", () => {
    expect(rotateAnchor("leftTop", 1)).toBe("leftCenter");
    expect(rotateAnchor("leftTop", 2)).toBe("leftBottom");
    expect(rotateAnchor("topCenter", 1)).toBe("leftTop");
  });

  it("steps clockwise for negative rotations", () => {
    expect(rotateAnchor("leftTop", -1)).toBe("topCenter");
    expect(rotateAnchor("leftTop", -9)).toBe("topCenter");
  });

  it("keeps the center fixed", () => {
    expect(rotateAnchor("center", 3)).toBe("center");
  });

  it("property: eight steps is the identity", () => {
    fc.assert(
      fc.property(arbAnchor, fc.integer({ min: -20, max: 20 }), (anchor, n) => {
        expect(rotateAnchor(anchor, n + 8)).toBe(rotateAnchor(anchor, n));
      })
    );
  });

  it("property: four steps lands on the opposite anchor", () => {
    fc.assert(
      fc.property(arbAnchor, (anchor) => {
        expect(rotateAnchor(anchor, 4)).toBe(oppositeAnchor(anchor));
      })
    );
  });
});

describe("inversions", () => {
  it("maps specific anchors", () => {
    expect(oppositeAnchor("leftBottom")).toBe("rightTop");
    expect(invertAnchorHorizontal("leftBottom")).toBe("rightBottom");
    expect(invertAnchorVertical("leftBottom")).toBe("leftTop");
    expect(invertAnchorHorizontal("topCenter")).toBe("topCenter");
    expect(invertAnchorVertical("rightCenter")).toBe("rightCenter");
  });

  it("property: every inversion is an involution", () => {
    fc.assert(
      fc.property(arbAnchor, (anchor) => {
        expect(oppositeAnchor(oppositeAnchor(anchor))).toBe(anchor);
        expect(invertAnchorHorizontal(invertAnchorHorizontal(anchor))).toBe(anchor);
        expect(invertAnchorVertical(invertAnchorVertical(anchor))).toBe(anchor);
      })
    );
  });

  it("property: horizontal then vertical inversion is the opposite", () => {
    fc.assert(
      fc.property(arbAnchor, (anchor) => {
        expect(invertAnchorVertical(invertAnchorHorizontal(anchor))).toBe(
          oppositeAnchor(anchor)
        );
      })
    );
  });
});
