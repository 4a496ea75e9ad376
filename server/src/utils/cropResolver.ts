import type { CropBox, CropSpec, PageGeometry, SheetSlot } from "../../../shared/types.js";
import { InvalidParameterError } from "../errors.js";

export interface GutterMargins {
    innerX: number;
    outerX: number;
    baseY: number;
}

/**
 * Splits the gutter-biased horizontal crop into inner and outer shares.
 * innerX + outerX always equals twice the base crop; the bias only moves it between edges.
 */
export function gutterMargins(page: PageGeometry, basePercent: number, gutterBias: number): GutterMargins {
    const baseX = page.width * (basePercent / 100);
    const baseY = page.height * (basePercent / 100);
    return {
        innerX: Math.max(0, baseX * gutterBias),
        outerX: Math.max(0, baseX * (2 - gutterBias)),
        baseY,
    };
}

/**
 * Derives the crop box for one page.
 * @param slot Position of the page within its pair; only gutter crops depend on it.
 */
export function resolveCropBox(page: PageGeometry, crop: CropSpec, slot: SheetSlot): CropBox {
    const { width: w, height: h } = page;
    if (!Number.isFinite(w) || !Number.isFinite(h) || w <= 0 || h <= 0) {
        throw new InvalidParameterError(`Page has unusable dimensions ${w}x${h}.`);
    }

    if (crop.kind === "edges") {
        const cropTop = h * (crop.top / 100);
        const cropBottom = h * (crop.bottom / 100);
        const cropLeft = w * (crop.left / 100);
        const cropRight = w * (crop.right / 100);
        return {
            lowerLeft: { x: cropLeft, y: cropBottom },
            upperRight: { x: w - cropRight, y: h - cropTop },
        };
    }

    const { innerX, outerX, baseY } = gutterMargins(page, crop.basePercent, crop.gutterBias);
    // The left page of a spread binds on its right edge, the right page on its left.
    const cropLeft = slot === "left" ? outerX : innerX;
    const cropRight = slot === "left" ? innerX : outerX;
    return {
        lowerLeft: { x: cropLeft, y: baseY },
        upperRight: { x: w - cropRight, y: h - baseY },
    };
}

export function cropBoxSize(box: CropBox): { width: number; height: number } {
    return {
        width: box.upperRight.x - box.lowerLeft.x,
        height: box.upperRight.y - box.lowerLeft.y,
    };
}
