import { z } from "zod";
import type { EdgeCrop, GutterBiasCrop, Offset } from "../../../shared/types.js";
import { InvalidParameterError } from "../errors.js";

// Blank strings become NaN so they fail as "must be a number" instead of coercing to 0.
const blankAsNaN = (value: unknown) => (typeof value === "string" && value.trim() === "" ? Number.NaN : value);

const numeric = () => z.coerce.number({ invalid_type_error: "must be a number" }).finite("must be a finite number");

const cropPercent = z
    .preprocess(
        blankAsNaN,
        numeric().min(0, "must be between 0 and 50 (50 excluded)").lt(50, "must be between 0 and 50 (50 excluded)")
    )
    .default(0);

const gutterBias = z
    .preprocess(blankAsNaN, numeric().min(0, "must be between 0 and 2").max(2, "must be between 0 and 2"))
    .default(1);

const offsetPoints = z.preprocess(blankAsNaN, numeric()).default(0);

export const edgeCropSchema = z.object({
    cropTop: cropPercent,
    cropBottom: cropPercent,
    cropLeft: cropPercent,
    cropRight: cropPercent,
    xOffset: offsetPoints,
    yOffset: offsetPoints,
});

export const gutterCropSchema = z.object({
    crop: cropPercent,
    gutterBias,
    xOffset: offsetPoints,
    yOffset: offsetPoints,
});

/** CLI spelling of each parameter, used in error messages. */
export const PARAMETER_FLAGS: Record<string, string> = {
    cropTop: "--crop_top",
    cropBottom: "--crop_bottom",
    cropLeft: "--crop_left",
    cropRight: "--crop_right",
    crop: "--crop",
    gutterBias: "--gutter_bias",
    xOffset: "--x_offset",
    yOffset: "--y_offset",
};

/** Maps a parameter key to the name shown in error messages. */
export type ParameterLabel = (key: string) => string;

export const cliFlagLabel: ParameterLabel = (key) => PARAMETER_FLAGS[key] ?? key;

function parseOrThrow<T extends z.ZodTypeAny>(
    schema: T,
    raw: Record<string, unknown>,
    label: ParameterLabel
): z.output<T> {
    const parsed = schema.safeParse(raw);
    if (parsed.success) return parsed.data;

    const issue = parsed.error.issues[0];
    const name = label(String(issue?.path[0] ?? ""));
    throw new InvalidParameterError(`Invalid value for ${name}: ${issue?.message ?? "rejected"}.`, {
        cause: parsed.error,
    });
}

export interface ResolvedParams<C> {
    crop: C;
    offset: Offset;
}

/** Validates independent per-edge crop percentages and offsets. Missing values take their defaults. */
export function parseEdgeCropParams(
    raw: Record<string, unknown>,
    label: ParameterLabel = cliFlagLabel
): ResolvedParams<EdgeCrop> {
    const p = parseOrThrow(edgeCropSchema, raw, label);
    return {
        crop: { kind: "edges", top: p.cropTop, bottom: p.cropBottom, left: p.cropLeft, right: p.cropRight },
        offset: { dx: p.xOffset, dy: p.yOffset },
    };
}

export function parseGutterCropParams(
    raw: Record<string, unknown>,
    label: ParameterLabel = cliFlagLabel
): ResolvedParams<GutterBiasCrop> {
    const p = parseOrThrow(gutterCropSchema, raw, label);
    return {
        crop: { kind: "gutter", basePercent: p.crop, gutterBias: p.gutterBias },
        offset: { dx: p.xOffset, dy: p.yOffset },
    };
}
