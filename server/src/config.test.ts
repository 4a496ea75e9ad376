import { describe, expect, it } from "vitest";
import { A4_LANDSCAPE, loadConfig } from "./config.js";
import { InvalidParameterError } from "./errors.js";

describe("loadConfig", () => {
  it("defaults to port 3001 and an A4 landscape sheet", () => {
    expect(loadConfig({})).toEqual({ port: 3001, sheet: A4_LANDSCAPE, debug: false });
    expect(A4_LANDSCAPE).toEqual({ width: 841.89, height: 595.276 });
  });

  it("reads the sheet size and debug flag from the environment", () => {
    expect(
      loadConfig({ PORT: "0", TWOUP_SHEET_WIDTH: "1190.55", TWOUP_SHEET_HEIGHT: "841.89", DEBUG: "true" }),
    ).toEqual({ port: 0, sheet: { width: 1190.55, height: 841.89 }, debug: true });
  });

  it("treats blank sheet values as unset", () => {
    expect(loadConfig({ TWOUP_SHEET_WIDTH: " " }).sheet.width).toBe(841.89);
  });

  it("rejects non-positive sheet sizes", () => {
    expect(() => loadConfig({ TWOUP_SHEET_HEIGHT: "-1" })).toThrow(
      new InvalidParameterError('TWOUP_SHEET_HEIGHT must be a positive number of points (got "-1").'),
    );
  });

  it("rejects invalid ports", () => {
    expect(() => loadConfig({ PORT: "http" })).toThrow(InvalidParameterError);
    expect(() => loadConfig({ PORT: "70000" })).toThrow(InvalidParameterError);
  });
});
