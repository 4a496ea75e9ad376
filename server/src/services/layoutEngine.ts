import type { ImposeSummary, LayoutOptions, PageGeometry } from "../../../shared/types.js";
import { planLayout } from "../utils/layoutPlanner.js";
import { debugLog } from "../utils/debug.js";
import type { PageSource, SheetSink } from "./document.js";

/**
 * Lays every source page onto 2-up sheets in the sink.
 * Sheets are added and filled strictly in input order; nothing is serialized here.
 */
export async function imposeDocument<S extends PageSource>(
  source: S,
  sink: SheetSink<S>,
  options: LayoutOptions,
): Promise<ImposeSummary> {
  const pages: PageGeometry[] = [];
  for (let i = 0; i < source.pageCount; i++) {
    pages.push(source.getPageGeometry(i));
  }

  // Planning validates every page before the sink is touched.
  const plan = planLayout(pages, options);

  for (const sheet of plan) {
    const sheetIndex = sink.addBlankSheet(options.sheet);
    for (const placed of [sheet.left, sheet.right]) {
      if (!placed) continue;
      source.setCropRegion(placed.pageIndex, placed.cropBox);
      await sink.pastePage(sheetIndex, source, placed.pageIndex, placed.placement);
      debugLog(
        `[Layout] page ${placed.pageIndex + 1} -> sheet ${sheetIndex + 1} ${placed.slot}`,
        placed.placement,
      );
    }
  }

  return { inputPages: pages.length, sheets: plan.length };
}
