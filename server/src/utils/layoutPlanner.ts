import type {
    LayoutOptions,
    PageGeometry,
    PagePlacement,
    SheetPlan,
    SheetSlot,
} from "../../../shared/types.js";
import { cropBoxSize, resolveCropBox } from "./cropResolver.js";
import { computePlacement, overflowsSheet } from "./placement.js";
import { debugLog } from "./debug.js";

export function sheetCountFor(pageCount: number): number {
    return Math.ceil(pageCount / 2);
}

export function slotForPage(pageIndex: number): SheetSlot {
    return pageIndex % 2 === 0 ? "left" : "right";
}

export function placePage(page: PageGeometry, pageIndex: number, options: LayoutOptions): PagePlacement {
    const slot = slotForPage(pageIndex);
    const cropBox = resolveCropBox(page, options.crop, slot);
    const cropped = cropBoxSize(cropBox);
    const placement = computePlacement(cropped, options.sheet, options.offset, slot);
    if (overflowsSheet(cropped, placement, options.sheet)) {
        debugLog(`[Layout] Page ${pageIndex + 1} extends past the sheet edge (offset ${options.offset.dx}, ${options.offset.dy})`);
    }
    return { pageIndex, slot, cropBox, placement };
}

/**
 * Pairs pages in input order: pages 2k and 2k+1 share sheet k.
 * An odd trailing page gets a sheet with only the left slot filled.
 */
export function planLayout(pages: PageGeometry[], options: LayoutOptions): SheetPlan[] {
    const sheets: SheetPlan[] = [];
    const sheetCount = sheetCountFor(pages.length);
    for (let sheetIndex = 0; sheetIndex < sheetCount; sheetIndex++) {
        const i = sheetIndex * 2;
        const left = placePage(pages[i], i, options);
        const plan: SheetPlan = { sheetIndex, left };
        if (i + 1 < pages.length) {
            plan.right = placePage(pages[i + 1], i + 1, options);
        }
        sheets.push(plan);
    }
    return sheets;
}
