import type { CropBox, PageGeometry, Placement, SheetSize } from "../../../shared/types.js";

/** Read side of the document library: page count and media-box sizes. */
export interface PageSource {
  readonly pageCount: number;
  getPageGeometry(pageIndex: number): PageGeometry;
  /** Restricts the page to the given page-local rectangle. */
  setCropRegion(pageIndex: number, cropBox: CropBox): void;
}

/**
 * Write side: blank sheets, transformed pastes and final serialization.
 * Parameterized by the source type so an implementation can reach its own page objects.
 */
export interface SheetSink<S extends PageSource = PageSource> {
  readonly sheetCount: number;
  /** Appends a blank sheet and returns its index. */
  addBlankSheet(size: SheetSize): number;
  /** Draws the cropped page onto the sheet, mapping its crop box origin through the placement. */
  pastePage(sheetIndex: number, source: S, pageIndex: number, placement: Placement): Promise<void>;
  serialize(): Promise<Uint8Array>;
}
