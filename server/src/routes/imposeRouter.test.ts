import { beforeAll, beforeEach, afterEach, describe, expect, it, vi } from "vitest";
import request from "supertest";
import type { Express } from "express";
import { createApp } from "../index.js";
import { A4_LANDSCAPE } from "../config.js";
import { statusForError } from "./imposeRouter.js";
import { InputNotFoundError, InvalidParameterError, WriteFailureError } from "../errors.js";
import { a4Portrait, makePdf } from "../test-utils/pdfFixtures.js";
import { isDebugLogging } from "../utils/debug.js";

describe("Impose Router", () => {
  let app: Express;
  let threePages: Buffer;

  beforeAll(async () => {
    threePages = Buffer.from(await makePdf(a4Portrait(3)));
  });

  beforeEach(() => {
    app = createApp({ port: 0, sheet: A4_LANDSCAPE, debug: false });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("applies the configured debug flag", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => { });
    const debugApp = createApp({ port: 0, sheet: A4_LANDSCAPE, debug: true });
    expect(isDebugLogging()).toBe(true);

    await request(debugApp).post("/api/impose/edges").attach("document", threePages, "book.pdf").expect(200);
    const lines = logSpy.mock.calls.map((args) => args.slice(1).join(" "));
    expect(lines).toContain("[Impose] book.pdf: 3 pages -> 2 sheets");

    createApp({ port: 0, sheet: A4_LANDSCAPE, debug: false });
    expect(isDebugLogging()).toBe(false);
  });

  it("reports health", async () => {
    const res = await request(app).get("/health").expect(200);
    expect(res.body.status).toBe("ok");
    expect(res.body.sheet).toEqual({ width: 841.89, height: 595.276 });
  });

  it("imposes an uploaded PDF with edge crops", async () => {
    const res = await request(app)
      .post("/api/impose/edges")
      .field("cropTop", "10")
      .field("cropBottom", "10")
      .attach("document", threePages, "My Book.pdf")
      .expect(200);

    expect(res.headers["content-type"]).toBe("application/pdf");
    expect(res.headers["x-sheet-count"]).toBe("2");
    expect(res.headers["content-disposition"]).toBe('attachment; filename="My_Book-2up.pdf"');
  });

  it("imposes an uploaded PDF with a gutter crop", async () => {
    const res = await request(app)
      .post("/api/impose/gutter")
      .field("crop", "49.9")
      .field("gutterBias", "2")
      .attach("document", threePages, "book.pdf")
      .expect(200);

    expect(res.headers["x-sheet-count"]).toBe("2");
  });

  it("returns 400 when no document is attached", async () => {
    const res = await request(app).post("/api/impose/edges").field("cropTop", "10").expect(400);
    expect(res.body).toEqual({ error: "Missing file. Provide a PDF in the 'document' field." });
  });

  it("returns 400 for parameters out of range, named by form field", async () => {
    const res = await request(app)
      .post("/api/impose/gutter")
      .field("gutterBias", "2.1")
      .attach("document", threePages, "book.pdf")
      .expect(400);
    expect(res.body).toEqual({ error: "Invalid value for gutterBias: must be between 0 and 2." });
  });

  it("returns 422 for an upload that is not a PDF", async () => {
    const res = await request(app)
      .post("/api/impose/edges")
      .attach("document", Buffer.from("hello"), "hello.pdf")
      .expect(422);
    expect(res.body.error).toMatch(/^Input is not a readable PDF/);
  });

  it("returns 400 for an unexpected upload field", async () => {
    vi.spyOn(console, "error").mockImplementation(() => { });
    const res = await request(app)
      .post("/api/impose/edges")
      .attach("pdf", threePages, "book.pdf")
      .expect(400);
    expect(res.body.error).toBe("Unexpected field");
  });
});

describe("statusForError", () => {
  it("maps the error taxonomy to HTTP statuses", () => {
    expect(statusForError(new InvalidParameterError("bad"))).toBe(400);
    expect(statusForError(new InputNotFoundError("gone"))).toBe(422);
    expect(statusForError(new WriteFailureError("disk"))).toBe(500);
    expect(statusForError(new Error("other"))).toBe(500);
  });
});
