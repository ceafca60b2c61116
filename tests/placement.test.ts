import { describe, it, expect } from "vitest";
import {
  CORNER_RADIUS,
  measureSpace,
  overlayPosition,
  resolvePlacement,
} from "../src/lib/placement";
import type { PlacementInput } from "../src/types/spotlight";

const base: PlacementInput = {
  spaceLeft: 100,
  spaceRight: 100,
  spaceAbove: 100,
  spaceBelow: 100,
  targetWidth: 40,
};

describe("measureSpace", () => {
  it("subtracts insets and the reserved top region", () => {
    expect(
      measureSpace({
        target: { left: 50, top: 100, width: 100, height: 50 },
        viewport: { width: 400, height: 800 },
        insets: { top: 20, right: 10, bottom: 30, left: 10 },
      })
    ).toEqual({
      spaceLeft: 50,
      spaceRight: 230,
      spaceAbove: 44,
      spaceBelow: 600,
      targetWidth: 100,
    });
  });

  it("takes a custom reserved top", () => {
    const input = measureSpace({
      target: { left: 0, top: 100, width: 10, height: 10 },
      viewport: { width: 100, height: 200 },
      reservedTop: 0,
    });
    expect(input.spaceAbove).toBe(100);
  });
});

describe("resolvePlacement", () => {
  it("places a centered target with more room right and below at BelowRight", () => {
    const input = measureSpace({
      target: { left: 150, top: 100, width: 80, height: 40 },
      viewport: { width: 400, height: 800 },
    });
    const placement = resolvePlacement(input);

    expect(placement).toEqual({
      location: "BelowRight",
      maxWidth: 186,
      maxHeight: 636,
      targetAnchor: "bottom-center",
      popupAnchor: "top-left",
      borderRadius: {
        "top-left": 0,
        "top-right": CORNER_RADIUS,
        "bottom-left": CORNER_RADIUS,
        "bottom-right": CORNER_RADIUS,
      },
      squareCorner: "top-left",
      arrow: "top-left",
      arrowLeading: true,
    });
  });

  it("favors left and above on ties", () => {
    const placement = resolvePlacement(base);
    expect(placement.location).toBe("AboveLeft");
    expect(placement.targetAnchor).toBe("top-center");
    expect(placement.popupAnchor).toBe("bottom-right");
    expect(placement.arrow).toBe("bottom-right");
    expect(placement.arrowLeading).toBe(false);
  });

  it("maps each quadrant to its popup anchor and square corner", () => {
    const cases = [
      { input: { ...base, spaceRight: 200 }, location: "AboveRight", corner: "bottom-left" },
      { input: { ...base, spaceBelow: 200 }, location: "BelowLeft", corner: "top-right" },
      {
        input: { ...base, spaceRight: 200, spaceBelow: 200 },
        location: "BelowRight",
        corner: "top-left",
      },
    ];

    for (const { input, location, corner } of cases) {
      const placement = resolvePlacement(input);
      expect(placement.location).toBe(location);
      expect(placement.popupAnchor).toBe(corner);
      expect(placement.squareCorner).toBe(corner);
      expect(placement.borderRadius[placement.squareCorner]).toBe(0);
    }
  });

  it("sizes the popup from the chosen side, half the target and the padding", () => {
    const placement = resolvePlacement({ ...base, spaceLeft: 300, spaceAbove: 250 });
    expect(placement.maxWidth).toBe(300 + 20 - 24);
    expect(placement.maxHeight).toBe(250 - 24);
  });

  it("never reports a negative size", () => {
    const placement = resolvePlacement({
      spaceLeft: 5,
      spaceRight: 0,
      spaceAbove: 10,
      spaceBelow: 0,
      targetWidth: 4,
    });
    expect(placement.maxWidth).toBe(0);
    expect(placement.maxHeight).toBe(0);
  });

  it("grows max dimensions monotonically with available space", () => {
    let previous = resolvePlacement({ ...base, spaceRight: 150, spaceBelow: 150 });
    for (let extra = 10; extra <= 200; extra += 10) {
      const next = resolvePlacement({
        ...base,
        spaceRight: 150 + extra,
        spaceBelow: 150 + extra,
      });
      expect(next.maxWidth).toBeGreaterThanOrEqual(previous.maxWidth);
      expect(next.maxHeight).toBeGreaterThanOrEqual(previous.maxHeight);
      previous = next;
    }
  });
});

describe("overlayPosition", () => {
  const rect = { left: 150, top: 100, width: 80, height: 40 };
  const viewport = { width: 400, height: 800 };

  it("pins the top-left corner below the target", () => {
    expect(
      overlayPosition({ targetAnchor: "bottom-center", popupAnchor: "top-left" }, rect, viewport)
    ).toEqual({ left: 190, top: 140 });
  });

  it("pins the bottom-right corner above the target", () => {
    expect(
      overlayPosition({ targetAnchor: "top-center", popupAnchor: "bottom-right" }, rect, viewport)
    ).toEqual({ right: 210, bottom: 700 });
  });

  it("pins the remaining corners", () => {
    expect(
      overlayPosition({ targetAnchor: "top-center", popupAnchor: "bottom-left" }, rect, viewport)
    ).toEqual({ left: 190, bottom: 700 });
    expect(
      overlayPosition({ targetAnchor: "bottom-center", popupAnchor: "top-right" }, rect, viewport)
    ).toEqual({ right: 210, top: 140 });
  });
});
