import type { SheetSize } from "../../shared/types.js";
import { InvalidParameterError } from "./errors.js";
import { isDebugEnabled } from "./utils/debug.js";

/** A4 landscape in points (1 pt = 1/72 in). */
export const A4_LANDSCAPE: SheetSize = { width: 841.89, height: 595.276 };

export interface AppConfig {
  port: number;
  sheet: SheetSize;
  debug: boolean;
}

function readPositive(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidParameterError(`${key} must be a positive number of points (got "${raw}").`);
  }
  return n;
}

/** Output sheet size, overridable through TWOUP_SHEET_WIDTH / TWOUP_SHEET_HEIGHT. */
export function loadSheetSize(env: NodeJS.ProcessEnv = process.env): SheetSize {
  return {
    width: readPositive(env, "TWOUP_SHEET_WIDTH", A4_LANDSCAPE.width),
    height: readPositive(env, "TWOUP_SHEET_HEIGHT", A4_LANDSCAPE.height),
  };
}

/**
 * Reads runtime configuration from the environment.
 * The sheet size is handed to the layout engine explicitly; nothing downstream reads these variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = env.PORT === undefined || env.PORT === "" ? 3001 : Number(env.PORT);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidParameterError(`PORT must be an integer between 0 and 65535 (got "${env.PORT}").`);
  }

  return {
    port,
    sheet: loadSheetSize(env),
    debug: isDebugEnabled(env.DEBUG),
  };
}
