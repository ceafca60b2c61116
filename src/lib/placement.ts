import type {
  BorderRadius,
  Corner,
  EdgeInsets,
  LayoutGeometry,
  PlacementInput,
  PlacementResult,
  PopupLocation,
  Rect,
  Size,
  TargetAnchor,
} from "@/types/spotlight";

/** Kept clear between the popup and the edge of the free space. */
export const POPUP_PADDING = 24;
export const CORNER_RADIUS = 16;
/** Height of the app bar region a popup never covers. */
export const RESERVED_TOP = 56;

export const NO_INSETS: EdgeInsets = { top: 0, right: 0, bottom: 0, left: 0 };

export function measureSpace({
  target,
  viewport,
  insets = NO_INSETS,
  reservedTop = RESERVED_TOP,
}: LayoutGeometry): PlacementInput {
  const width = viewport.width - (insets.left + insets.right);
  const height = viewport.height - (insets.top + insets.bottom);

  return {
    spaceLeft: target.left,
    spaceRight: width - (target.left + target.width),
    spaceAbove: target.top - reservedTop,
    spaceBelow: height - (target.top + target.height),
    targetWidth: target.width,
  };
}

const POPUP_ANCHORS: Record<PopupLocation, Corner> = {
  AboveLeft: "bottom-right",
  AboveRight: "bottom-left",
  BelowLeft: "top-right",
  BelowRight: "top-left",
};

function roundedExcept(square: Corner): BorderRadius {
  return {
    "top-left": square === "top-left" ? 0 : CORNER_RADIUS,
    "top-right": square === "top-right" ? 0 : CORNER_RADIUS,
    "bottom-left": square === "bottom-left" ? 0 : CORNER_RADIUS,
    "bottom-right": square === "bottom-right" ? 0 : CORNER_RADIUS,
  };
}

/**
 * Picks the quadrant around the target with the most room (ties go left and
 * above) and derives size limits and anchoring from it. The corner pinned to
 * the target stays square so the popup reads as a speech bubble.
 *
 * Max width and height are the free space minus `POPUP_PADDING`, clamped at 0
 * so a cramped target never yields a negative size.
 */
export function resolvePlacement({
  spaceLeft,
  spaceRight,
  spaceAbove,
  spaceBelow,
  targetWidth,
}: PlacementInput): PlacementResult {
  const left = spaceLeft >= spaceRight;
  const above = spaceAbove >= spaceBelow;

  const location: PopupLocation = above
    ? left
      ? "AboveLeft"
      : "AboveRight"
    : left
      ? "BelowLeft"
      : "BelowRight";

  const horizontal = left ? spaceLeft : spaceRight;
  const vertical = above ? spaceAbove : spaceBelow;
  const popupAnchor = POPUP_ANCHORS[location];

  return {
    location,
    maxWidth: Math.max(0, horizontal + targetWidth / 2 - POPUP_PADDING),
    maxHeight: Math.max(0, vertical - POPUP_PADDING),
    targetAnchor: above ? "top-center" : "bottom-center",
    popupAnchor,
    borderRadius: roundedExcept(popupAnchor),
    squareCorner: popupAnchor,
    arrow: popupAnchor,
    arrowLeading: !left,
  };
}

export function anchorPoint(rect: Rect, anchor: TargetAnchor): { x: number; y: number } {
  return {
    x: rect.left + rect.width / 2,
    y: anchor === "top-center" ? rect.top : rect.top + rect.height,
  };
}

export interface OverlayPosition {
  top?: number;
  left?: number;
  right?: number;
  bottom?: number;
}

/** Fixed-position offsets that pin the popup anchor corner to the target anchor. */
export function overlayPosition(
  placement: Pick<PlacementResult, "targetAnchor" | "popupAnchor">,
  rect: Rect,
  viewport: Size
): OverlayPosition {
  const { x, y } = anchorPoint(rect, placement.targetAnchor);

  switch (placement.popupAnchor) {
    case "top-left":
      return { left: x, top: y };
    case "top-right":
      return { right: viewport.width - x, top: y };
    case "bottom-left":
      return { left: x, bottom: viewport.height - y };
    case "bottom-right":
      return { right: viewport.width - x, bottom: viewport.height - y };
  }
}
