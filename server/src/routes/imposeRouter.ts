import express, { type Request, type Response } from "express";
import multer from "multer";
import type { CropSpec, SheetSize } from "../../../shared/types.js";
import { TwoUpError } from "../errors.js";
import { imposeBytes } from "../services/imposeService.js";
import {
  parseEdgeCropParams,
  parseGutterCropParams,
  type ParameterLabel,
  type ResolvedParams,
} from "../utils/cropParams.js";
import { debugLog } from "../utils/debug.js";

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 50 * 1024 * 1024, // 50MB per document
    files: 1,
  },
});

export function statusForError(error: unknown): number {
  if (error instanceof TwoUpError) {
    switch (error.code) {
      case "INVALID_PARAMETER":
        return 400;
      case "INPUT_NOT_FOUND":
        return 422;
      case "WRITE_FAILURE":
        return 500;
    }
  }
  if (error instanceof multer.MulterError) return 400;
  return 500;
}

// Form fields are reported by their own names rather than CLI flags
const formFieldLabel: ParameterLabel = (key) => key;

function formFields(body: unknown): Record<string, unknown> {
  return typeof body === "object" && body !== null ? { ...body } : {};
}

/**
 * Builds the /api/impose router.
 * @param sheet Output sheet size; every request uses the same one.
 */
export function createImposeRouter(sheet: SheetSize): express.Router {
  const router = express.Router();

  const handle = (resolve: (raw: Record<string, unknown>, label: ParameterLabel) => ResolvedParams<CropSpec>) =>
    async (req: Request, res: Response) => {
      const file = req.file;
      if (!file) {
        return res.status(400).json({ error: "Missing file. Provide a PDF in the 'document' field." });
      }

      try {
        const { crop, offset } = resolve(formFields(req.body), formFieldLabel);
        const { bytes, summary } = await imposeBytes(file.buffer, { sheet, crop, offset });
        debugLog(`[Impose] ${file.originalname}: ${summary.inputPages} pages -> ${summary.sheets} sheets`);

        const baseName = (file.originalname || "document.pdf").replace(/\.pdf$/i, "").replace(/[^\w.-]+/g, "_");
        res.setHeader("Content-Type", "application/pdf");
        res.setHeader("Content-Disposition", `attachment; filename="${baseName}-2up.pdf"`);
        res.setHeader("X-Sheet-Count", String(summary.sheets));
        return res.send(Buffer.from(bytes));
      } catch (e: unknown) {
        const status = statusForError(e);
        if (status >= 500) {
          console.error("[Impose] Request failed:", e);
        }
        const msg = e instanceof Error ? e.message : String(e);
        return res.status(status).json({ error: msg });
      }
    };

  // POST /api/impose/edges (multipart form: document + cropTop/cropBottom/cropLeft/cropRight/xOffset/yOffset)
  router.post("/edges", upload.single("document"), handle(parseEdgeCropParams));

  // POST /api/impose/gutter (multipart form: document + crop/gutterBias/xOffset/yOffset)
  router.post("/gutter", upload.single("document"), handle(parseGutterCropParams));

  return router;
}
