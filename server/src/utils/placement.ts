import type { Offset, Placement, SheetSize, SheetSlot } from "../../../shared/types.js";

/**
 * Scales cropped content uniformly to fit one half of the sheet and centers it in that half.
 * Offsets are added as-is; content pushed past the sheet edge is not corrected.
 */
export function computePlacement(
    cropped: { width: number; height: number },
    sheet: SheetSize,
    offset: Offset,
    slot: SheetSlot
): Placement {
    const cellWidth = sheet.width / 2;
    const cellHeight = sheet.height;

    const scale = Math.min(cellWidth / cropped.width, cellHeight / cropped.height);
    const scaledWidth = cropped.width * scale;
    const scaledHeight = cropped.height * scale;

    const slotOrigin = slot === "left" ? 0 : cellWidth;
    return {
        scale,
        translateX: slotOrigin + (cellWidth - scaledWidth) / 2 + offset.dx,
        translateY: (cellHeight - scaledHeight) / 2 + offset.dy,
    };
}

/** True when the placed content leaves the sheet on any side. */
export function overflowsSheet(
    cropped: { width: number; height: number },
    placement: Placement,
    sheet: SheetSize
): boolean {
    const epsilon = 1e-6;
    const right = placement.translateX + cropped.width * placement.scale;
    const top = placement.translateY + cropped.height * placement.scale;
    return (
        placement.translateX < -epsilon ||
        placement.translateY < -epsilon ||
        right > sheet.width + epsilon ||
        top > sheet.height + epsilon
    );
}
