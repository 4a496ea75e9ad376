import { parseArgs, type ParseArgsConfig } from "util";
import type { CropSpec, LayoutOptions } from "../../shared/types.js";
import { loadSheetSize } from "./config.js";
import { TwoUpError, WriteFailureError, describeCause } from "./errors.js";
import { imposeFile } from "./services/imposeService.js";
import { parseEdgeCropParams, parseGutterCropParams, type ResolvedParams } from "./utils/cropParams.js";
import { debugLog, isDebugEnabled, setDebugEnabled } from "./utils/debug.js";

const EDGES_USAGE = `Usage: twoup-edges <input.pdf> <output.pdf> [options]

Crops each page's margins independently per edge and lays pages out 2-up on landscape sheets.

Options:
  --crop_top P      Percentage to crop from the top margin (0 <= P < 50, default 0)
  --crop_bottom P   Percentage to crop from the bottom margin
  --crop_left P     Percentage to crop from the left margin
  --crop_right P    Percentage to crop from the right margin
  --x_offset F      Horizontal shift in points, positive is right (default 0)
  --y_offset F      Vertical shift in points, positive is up (default 0)
  -h, --help        Show this help`;

const GUTTER_USAGE = `Usage: twoup-gutter <input.pdf> <output.pdf> [options]

Crops each page by a base margin shifted toward the binding and lays pages out 2-up on landscape sheets.

Options:
  --crop P          Base percentage cropped from every edge (0 <= P < 50, default 0)
  --gutter_bias B   Share of the horizontal crop taken from the inner edge (0 <= B <= 2, default 1)
  --x_offset F      Horizontal shift in points, positive is right (default 0)
  --y_offset F      Vertical shift in points, positive is up (default 0)
  -h, --help        Show this help`;

interface Variant {
  usage: string;
  flags: Record<string, string>;
  resolve(raw: Record<string, unknown>): ResolvedParams<CropSpec>;
}

const EDGES: Variant = {
  usage: EDGES_USAGE,
  flags: {
    crop_top: "cropTop",
    crop_bottom: "cropBottom",
    crop_left: "cropLeft",
    crop_right: "cropRight",
    x_offset: "xOffset",
    y_offset: "yOffset",
  },
  resolve: parseEdgeCropParams,
};

const GUTTER: Variant = {
  usage: GUTTER_USAGE,
  flags: {
    crop: "crop",
    gutter_bias: "gutterBias",
    x_offset: "xOffset",
    y_offset: "yOffset",
  },
  resolve: parseGutterCropParams,
};

export function describeCrop(crop: CropSpec): string {
  if (crop.kind === "edges") {
    return `Top=${crop.top}%, Bottom=${crop.bottom}%, Left=${crop.left}%, Right=${crop.right}%`;
  }
  return `Base=${crop.basePercent}%, Gutter bias=${crop.gutterBias}`;
}

type ParsedCommand =
  | { kind: "help" }
  | { kind: "run"; inputPath: string; outputPath: string; raw: Record<string, unknown> };

class UsageError extends Error {}

const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/**
 * Joins a negative number onto the value flag before it (`--y_offset -12` -> `--y_offset=-12`),
 * which parseArgs would otherwise read as an option of its own.
 */
export function attachNumericValues(argv: string[], valueFlags: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (valueFlags.includes(arg) && next !== undefined && next.startsWith("-") && NUMERIC.test(next)) {
      out.push(`${arg}=${next}`);
      i++;
      continue;
    }
    out.push(arg);
  }
  return out;
}

function parseFlags(variant: Variant, argv: string[]) {
  const options: NonNullable<ParseArgsConfig["options"]> = {
    help: { type: "boolean", short: "h" },
  };
  for (const flag of Object.keys(variant.flags)) {
    options[flag] = { type: "string" };
  }
  const args = attachNumericValues(argv, Object.keys(variant.flags).map((flag) => `--${flag}`));
  try {
    return parseArgs({ args, options, allowPositionals: true, strict: true });
  } catch (e: unknown) {
    throw new UsageError(describeCause(e));
  }
}

function parseCommand(variant: Variant, argv: string[]): ParsedCommand {
  const parsed = parseFlags(variant, argv);

  if (parsed.values.help === true) return { kind: "help" };

  if (parsed.positionals.length !== 2) {
    throw new UsageError(`Expected <input.pdf> and <output.pdf>, got ${parsed.positionals.length} argument(s).`);
  }

  const raw: Record<string, unknown> = {};
  for (const [flag, key] of Object.entries(variant.flags)) {
    const value = parsed.values[flag];
    if (typeof value === "string") raw[key] = value;
  }
  const [inputPath, outputPath] = parsed.positionals;
  return { kind: "run", inputPath, outputPath, raw };
}

async function run(variant: Variant, argv: string[]): Promise<number> {
  try {
    const command = parseCommand(variant, argv);
    if (command.kind === "help") {
      console.log(variant.usage);
      return 0;
    }

    // Parameters and configuration are validated before the input is touched.
    const { crop, offset } = variant.resolve(command.raw);
    const sheet = loadSheetSize();
    setDebugEnabled(isDebugEnabled(process.env.DEBUG));
    const options: LayoutOptions = { sheet, crop, offset };
    debugLog("[Impose] Layout options", options);

    const summary = await imposeFile(command.inputPath, command.outputPath, options, (pageCount) => {
      console.log(`Processing ${pageCount} pages with custom crop settings...`);
      console.log(`Crop settings: ${describeCrop(crop)}`);
    });

    console.log(`Success! Created '${command.outputPath}' with ${summary.sheets} pages.`);
    return 0;
  } catch (e: unknown) {
    if (e instanceof UsageError) {
      console.error(`Error: ${e.message}`);
      console.error(variant.usage);
      return 1;
    }
    if (e instanceof TwoUpError) {
      console.error(`Error: ${e.message}`);
      if (e instanceof WriteFailureError && e.cause !== undefined) {
        console.error(describeCause(e.cause));
      }
      return 1;
    }
    console.error("[Impose] Unexpected failure:", e);
    return 1;
  }
}

/** Per-edge crop variant. Resolves to the process exit code. */
export function runEdgesCli(argv: string[]): Promise<number> {
  return run(EDGES, argv);
}

/** Gutter-biased crop variant. Resolves to the process exit code. */
export function runGutterCli(argv: string[]): Promise<number> {
  return run(GUTTER, argv);
}
