import { PDFDocument, rgb } from "pdf-lib";

/** Builds a PDF with one page per size, each carrying a filled rectangle so it has content to embed. */
export async function makePdf(sizes: Array<[number, number]>): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  for (const [width, height] of sizes) {
    const page = doc.addPage([width, height]);
    page.drawRectangle({ x: width / 4, y: height / 4, width: width / 2, height: height / 2, color: rgb(0.2, 0.2, 0.2) });
  }
  return doc.save();
}

export function a4Portrait(count: number): Array<[number, number]> {
  return Array.from({ length: count }, (): [number, number] => [595, 841]);
}
