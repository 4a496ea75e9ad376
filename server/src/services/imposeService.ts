import fs from "fs/promises";
import type { ImposeSummary, LayoutOptions } from "../../../shared/types.js";
import { InputNotFoundError, WriteFailureError } from "../errors.js";
import { imposeDocument } from "./layoutEngine.js";
import { PdfLibSink, PdfLibSource } from "./pdfLibDocument.js";

export interface ImposeResult {
  bytes: Uint8Array;
  summary: ImposeSummary;
}

/** Runs the whole pipeline in memory: parse, lay out, serialize. */
export async function imposeBytes(input: Uint8Array, options: LayoutOptions): Promise<ImposeResult> {
  const source = await PdfLibSource.load(input);
  const sink = await PdfLibSink.create();
  const summary = await imposeDocument(source, sink, options);
  const bytes = await sink.serialize();
  return { bytes, summary };
}

async function readInput(inputPath: string): Promise<Uint8Array> {
  try {
    return await fs.readFile(inputPath);
  } catch (e: unknown) {
    const code = e instanceof Error && "code" in e ? e.code : undefined;
    const reason = code === "ENOENT" ? "was not found" : "could not be read";
    throw new InputNotFoundError(`The file '${inputPath}' ${reason}.`, { cause: e });
  }
}

/**
 * Reads a PDF from disk, imposes it and writes the result.
 * The output file is only opened once every page has been placed and serialized.
 */
export async function imposeFile(
  inputPath: string,
  outputPath: string,
  options: LayoutOptions,
  onLoaded?: (pageCount: number) => void,
): Promise<ImposeSummary> {
  const input = await readInput(inputPath);
  const source = await PdfLibSource.load(input);
  onLoaded?.(source.pageCount);

  const sink = await PdfLibSink.create();
  const summary = await imposeDocument(source, sink, options);
  const bytes = await sink.serialize();

  try {
    await fs.writeFile(outputPath, bytes);
  } catch (e: unknown) {
    throw new WriteFailureError(`Could not write to output file '${outputPath}'.`, { cause: e });
  }
  return summary;
}
