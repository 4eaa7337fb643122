import { describe, it, expect } from "vitest";
import {
  MARGIN_ZERO,
  addMargins,
  clampedLerpMargin,
  createMargin,
  createMarginf,
  lerpMargin,
  marginToPadding,
  marginX,
  marginY,
  sameMargin,
  subMargins,
  symmetricMargin,
  toMarginf,
} from "../margin";
import {
  addPaddingfs,
  createPadding,
  createPaddingf,
  lerpPaddingf,
  paddingToMargin,
  paddingX,
  paddingfToMarginf,
  samePadding,
} from "../padding";
import { GeometryAssertionError, withAssertions } from "../debug-assert";

describe("Margin", () => {
  it("stores four tagged sides", () => {
    expect(createMargin(1, 2, 3, 4)).toEqual({
      tag: "margin",
      left: 1,
      top: 2,
      right: 3,
      bottom: 4,
    });
  });

  it("builds symmetric margins", () => {
    expect(symmetricMargin(3, 5)).toEqual(createMargin(3, 5, 3, 5));
    expect(sameMargin(0)).toEqual(MARGIN_ZERO);
  });

  it("rejects sides outside the 8-bit range", () => {
    expect(() => createMargin(200, 0, 0, 0)).toThrow(GeometryAssertionError);
  });

  it("wraps out-of-range sides with assertions off", () => {
    expect(withAssertions(false, () => createMargin(128, 0, 0, 0)).left).toBe(-128);
  });

  it("adds and subtracts side by side", () => {
    expect(addMargins(createMargin(1, 2, 3, 4), sameMargin(1))).toEqual(
      createMargin(2, 3, 4, 5)
    );
    expect(subMargins(createMargin(1, 2, 3, 4), sameMargin(1))).toEqual(
      createMargin(0, 1, 2, 3)
    );
  });

  it("lerps in float then truncates", () => {
    expect(lerpMargin(sameMargin(0), sameMargin(10), 0.55)).toEqual(sameMargin(5));
  });

  it("saturates an extrapolated lerp", () => {
    expect(lerpMargin(sameMargin(100), sameMargin(120), 2)).toEqual(sameMargin(127));
  });

  it("clamps t before lerping", () => {
    expect(clampedLerpMargin(sameMargin(0), sameMargin(10), 2)).toEqual(sameMargin(10));
  });

  it("reports total horizontal and vertical extent", () => {
    const m = createMarginf(1.5, 2, 2.5, 3);
    expect(marginX(m)).toBe(4);
    expect(marginY(m)).toBe(5);
  });

  it("widens to float without changing values", () => {
    expect(toMarginf(createMargin(1, 2, 3, 4))).toEqual(createMarginf(1, 2, 3, 4));
  });
});

describe("Padding", () => {
  it("adds float paddings", () => {
    expect(addPaddingfs(createPaddingf(0.5, 0, 0, 0), createPaddingf(0.25, 1, 1, 1))).toEqual(
      createPaddingf(0.75, 1, 1, 1)
    );
  });

  it("lerps float paddings without rounding", () => {
    expect(lerpPaddingf(createPaddingf(0, 0, 0, 0), createPaddingf(1, 2, 3, 4), 0.5)).toEqual(
      createPaddingf(0.5, 1, 1.5, 2)
    );
  });

  it("reports total horizontal extent", () => {
    expect(paddingX(createPadding(1, 0, 2, 0))).toBe(3);
  });
});

describe("Margin <-> Padding conversion", () => {
  it("copies the fields and relabels the tag", () => {
    const padding = marginToPadding(createMargin(1, 2, 3, 4));
    expect(padding).toEqual(createPadding(1, 2, 3, 4));
    expect(padding.tag).toBe("padding");
  });

  it("round-trips", () => {
    const margin = createMargin(-4, 7, 0, 12);
    expect(paddingToMargin(marginToPadding(margin))).toEqual(margin);
    expect(paddingfToMarginf(createPaddingf(0.5, 1, 1, 1)).tag).toBe("marginf");
    expect(paddingToMargin(samePadding(2))).toEqual(sameMargin(2));
  });
});
