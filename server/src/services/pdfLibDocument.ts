import { PDFDocument, type PDFPage } from "pdf-lib";
import type { CropBox, PageGeometry, Placement, SheetSize } from "../../../shared/types.js";
import { InputNotFoundError, InvalidParameterError, WriteFailureError, describeCause } from "../errors.js";
import type { PageSource, SheetSink } from "./document.js";

/** Rectangle in a page's content-stream coordinates, as `embedPage` takes it. */
export interface ContentBounds {
  left: number;
  bottom: number;
  right: number;
  top: number;
}

/**
 * Source document backed by pdf-lib.
 * Geometry is reported relative to each media box's origin; the origin is added back when cropping.
 */
export class PdfLibSource implements PageSource {
  private constructor(private readonly doc: PDFDocument) {}

  static async load(bytes: Uint8Array): Promise<PdfLibSource> {
    try {
      const doc = await PDFDocument.load(bytes, { ignoreEncryption: true });
      return new PdfLibSource(doc);
    } catch (e: unknown) {
      throw new InputNotFoundError(`Input is not a readable PDF: ${describeCause(e)}`, { cause: e });
    }
  }

  get pageCount(): number {
    return this.doc.getPageCount();
  }

  getPage(pageIndex: number): PDFPage {
    if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= this.pageCount) {
      throw new InvalidParameterError(`Page index ${pageIndex} is out of range (0..${this.pageCount - 1}).`);
    }
    return this.doc.getPage(pageIndex);
  }

  getPageGeometry(pageIndex: number): PageGeometry {
    const { width, height } = this.getPage(pageIndex).getMediaBox();
    return { width, height };
  }

  setCropRegion(pageIndex: number, cropBox: CropBox): void {
    const page = this.getPage(pageIndex);
    const media = page.getMediaBox();
    page.setCropBox(
      media.x + cropBox.lowerLeft.x,
      media.y + cropBox.lowerLeft.y,
      cropBox.upperRight.x - cropBox.lowerLeft.x,
      cropBox.upperRight.y - cropBox.lowerLeft.y,
    );
  }

  /** The page's current crop box as an embedding bounding box, in content-stream coordinates. */
  getCropBounds(pageIndex: number): ContentBounds {
    const { x, y, width, height } = this.getPage(pageIndex).getCropBox();
    return { left: x, bottom: y, right: x + width, top: y + height };
  }
}

/** Output document backed by pdf-lib. Pages are embedded as form XObjects clipped to their crop box. */
export class PdfLibSink implements SheetSink<PdfLibSource> {
  private readonly sheets: PDFPage[] = [];

  private constructor(private readonly doc: PDFDocument) {}

  static async create(): Promise<PdfLibSink> {
    return new PdfLibSink(await PDFDocument.create());
  }

  get sheetCount(): number {
    return this.sheets.length;
  }

  addBlankSheet(size: SheetSize): number {
    this.sheets.push(this.doc.addPage([size.width, size.height]));
    return this.sheets.length - 1;
  }

  async pastePage(sheetIndex: number, source: PdfLibSource, pageIndex: number, placement: Placement): Promise<void> {
    const sheet = this.sheets[sheetIndex];
    if (!sheet) {
      throw new InvalidParameterError(`Sheet index ${sheetIndex} does not exist.`);
    }
    const page = source.getPage(pageIndex);
    // Pages without a content stream are blank and cannot be embedded
    if (!page.node.Contents()) return;
    const embedded = await this.doc.embedPage(page, source.getCropBounds(pageIndex));
    sheet.drawPage(embedded, {
      x: placement.translateX,
      y: placement.translateY,
      xScale: placement.scale,
      yScale: placement.scale,
    });
  }

  async serialize(): Promise<Uint8Array> {
    try {
      return await this.doc.save();
    } catch (e: unknown) {
      throw new WriteFailureError("Could not serialize output document.", { cause: e });
    }
  }
}
