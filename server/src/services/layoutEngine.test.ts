import { describe, expect, it } from "vitest";
import { imposeDocument } from "./layoutEngine.js";
import type { PageSource, SheetSink } from "./document.js";
import type { CropBox, LayoutOptions, PageGeometry, Placement, SheetSize } from "../../../shared/types.js";
import { InvalidParameterError } from "../errors.js";

type Call =
  | { op: "crop"; pageIndex: number; cropBox: CropBox }
  | { op: "sheet"; size: SheetSize }
  | { op: "paste"; sheetIndex: number; pageIndex: number; placement: Placement };

class RecordingSource implements PageSource {
  constructor(private readonly pages: PageGeometry[], private readonly calls: Call[]) {}

  get pageCount(): number {
    return this.pages.length;
  }

  getPageGeometry(pageIndex: number): PageGeometry {
    return this.pages[pageIndex];
  }

  setCropRegion(pageIndex: number, cropBox: CropBox): void {
    this.calls.push({ op: "crop", pageIndex, cropBox });
  }
}

class RecordingSink implements SheetSink<RecordingSource> {
  sheetCount = 0;

  constructor(private readonly calls: Call[]) {}

  addBlankSheet(size: SheetSize): number {
    this.calls.push({ op: "sheet", size });
    return this.sheetCount++;
  }

  async pastePage(sheetIndex: number, _source: RecordingSource, pageIndex: number, placement: Placement): Promise<void> {
    this.calls.push({ op: "paste", sheetIndex, pageIndex, placement });
  }

  async serialize(): Promise<Uint8Array> {
    return new Uint8Array();
  }
}

const options: LayoutOptions = {
  sheet: { width: 200, height: 100 },
  crop: { kind: "edges", top: 0, bottom: 0, left: 0, right: 0 },
  offset: { dx: 0, dy: 0 },
};

function run(pages: PageGeometry[]) {
  const calls: Call[] = [];
  const source = new RecordingSource(pages, calls);
  const sink = new RecordingSink(calls);
  return { calls, sink, result: imposeDocument(source, sink, options) };
}

describe("imposeDocument", () => {
  it("adds each sheet before pasting its pages, in input order", async () => {
    const square = { width: 100, height: 100 };
    const { calls, result } = run([square, square, square]);

    expect(await result).toEqual({ inputPages: 3, sheets: 2 });
    expect(calls.map((c) => (c.op === "sheet" ? "sheet" : `${c.op}:${c.pageIndex}`))).toEqual([
      "sheet",
      "crop:0",
      "paste:0",
      "crop:1",
      "paste:1",
      "sheet",
      "crop:2",
      "paste:2",
    ]);
  });

  it("passes the configured sheet size and computed placements to the sink", async () => {
    const square = { width: 100, height: 100 };
    const { calls, sink, result } = run([square, square]);
    await result;

    expect(sink.sheetCount).toBe(1);
    expect(calls[0]).toEqual({ op: "sheet", size: { width: 200, height: 100 } });
    expect(calls[4]).toEqual({
      op: "paste",
      sheetIndex: 0,
      pageIndex: 1,
      placement: { scale: 1, translateX: 100, translateY: 0 },
    });
  });

  it("produces an empty document for a source without pages", async () => {
    const { calls, result } = run([]);
    expect(await result).toEqual({ inputPages: 0, sheets: 0 });
    expect(calls).toEqual([]);
  });

  it("rejects a degenerate page before touching the sink", async () => {
    const { calls, result } = run([{ width: 100, height: 100 }, { width: 0, height: 100 }]);
    await expect(result).rejects.toBeInstanceOf(InvalidParameterError);
    expect(calls).toEqual([]);
  });
});
