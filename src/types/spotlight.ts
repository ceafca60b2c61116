/** Opaque popup identifier, unique within a page. */
export type PopupId = string;

/** Location of the popup relative to its target. */
export type PopupLocation = "AboveLeft" | "AboveRight" | "BelowLeft" | "BelowRight";

export type Corner = "top-left" | "top-right" | "bottom-left" | "bottom-right";

/** Point on the target the popup attaches to. */
export type TargetAnchor = "top-center" | "bottom-center";

export type PopupIndicator = "none" | "check" | "arrow";

export interface Rect {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface EdgeInsets {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

/** Free space around the target, already net of insets and the reserved top region. */
export interface PlacementInput {
  spaceLeft: number;
  spaceRight: number;
  spaceAbove: number;
  spaceBelow: number;
  targetWidth: number;
}

export type BorderRadius = Record<Corner, number>;

export interface PlacementResult {
  location: PopupLocation;
  maxWidth: number;
  maxHeight: number;
  targetAnchor: TargetAnchor;
  /** Corner of the popup pinned to the target anchor */
  popupAnchor: Corner;
  borderRadius: BorderRadius;
  squareCorner: Corner;
  /** Corner the pointer icon points toward */
  arrow: Corner;
  /** Whether the arrow renders before the content */
  arrowLeading: boolean;
}

/** Geometry a host hands over once layout has settled. */
export interface LayoutGeometry {
  target: Rect;
  viewport: Size;
  insets?: EdgeInsets;
  reservedTop?: number;
}

export interface SpotlightTheme {
  background: string;
  foreground: string;
}
