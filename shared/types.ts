/**
 * Un-cropped page size in PDF points, read from the page's media box.
 */
export interface PageGeometry {
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

/**
 * Sub-rectangle of a page that survives cropping, in page-local coordinates
 * (origin at the media box's lower-left corner).
 */
export interface CropBox {
  lowerLeft: Point;
  upperRight: Point;
}

/** Percentages cropped from each edge independently. */
export interface EdgeCrop {
  kind: "edges";
  top: number;
  bottom: number;
  left: number;
  right: number;
}

/**
 * Symmetric base crop with the horizontal share shifted toward the gutter.
 * gutterBias 1 crops both sides equally, 2 crops only the inner edge, 0 only the outer.
 */
export interface GutterBiasCrop {
  kind: "gutter";
  basePercent: number;
  gutterBias: number;
}

export type CropSpec = EdgeCrop | GutterBiasCrop;

export type SheetSlot = "left" | "right";

/** Affine transform from cropped-page-local coordinates into sheet coordinates. */
export interface Placement {
  scale: number;
  translateX: number;
  translateY: number;
}

/** Landscape canvas; each slot is width / 2 by height. */
export interface SheetSize {
  width: number;
  height: number;
}

export interface Offset {
  dx: number;
  dy: number;
}

export interface LayoutOptions {
  sheet: SheetSize;
  crop: CropSpec;
  offset: Offset;
}

export interface PagePlacement {
  pageIndex: number;
  slot: SheetSlot;
  cropBox: CropBox;
  placement: Placement;
}

export interface SheetPlan {
  sheetIndex: number;
  left: PagePlacement;
  right?: PagePlacement;
}

export interface ImposeSummary {
  inputPages: number;
  sheets: number;
}
