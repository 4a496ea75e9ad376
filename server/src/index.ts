import compression from "compression";
import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import type { Server } from "http";
import { fileURLToPath } from "url";
import { loadConfig, type AppConfig } from "./config.js";
import { createImposeRouter, statusForError } from "./routes/imposeRouter.js";
import { setDebugEnabled } from "./utils/debug.js";

/**
 * Build the Express app without listening, so tests can drive it in-process.
 */
export function createApp(config: AppConfig = loadConfig()): express.Express {
  setDebugEnabled(config.debug);
  const app = express();

  app.use(cors({
    origin: (_, cb) => cb(null, true),
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
    exposedHeaders: ["Content-Disposition", "X-Sheet-Count"],
    maxAge: 86400,
  }));

  // Compress JSON responses; PDFs are already deflated
  app.use(compression({
    filter: (req, res) => {
      if (res.getHeader("Content-Type")?.toString().includes("application/pdf")) {
        return false;
      }
      return compression.filter(req, res);
    },
  }));

  app.use(express.json({ limit: "1mb" }));

  const startTime = Date.now();

  app.get("/health", (req, res) => {
    res.json({
      status: "ok",
      uptime: Math.floor((Date.now() - startTime) / 1000),
      timestamp: new Date().toISOString(),
      sheet: config.sheet,
    });
  });

  app.use("/api/impose", createImposeRouter(config.sheet));

  // Upload errors (size limits, unexpected fields) arrive here from multer
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusForError(err);
    if (status >= 500) {
      console.error("[Server] Unhandled error:", err);
    }
    const msg = err instanceof Error ? err.message : String(err);
    res.status(status).json({ error: msg });
  });

  return app;
}

/**
 * Start the Express server on the specified port.
 * If port is 0, a random available port will be used.
 * @returns Promise resolving to the listening server and its actual port
 */
export function startServer(config: AppConfig = loadConfig()): Promise<{ server: Server; port: number }> {
  const app = createApp(config);

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, "0.0.0.0", () => {
      const addr = server.address();
      const actualPort = typeof addr === "string" || addr === null ? config.port : addr.port;
      console.log(`[Server] Listening on port ${actualPort} (sheet ${config.sheet.width}x${config.sheet.height} pt)`);
      resolve({ server, port: actualPort });
    });
    server.on("error", reject);
  });
}

// Graceful shutdown handler
function handleShutdown(server: Server, signal: string): void {
  console.log(`\n[Server] ${signal} received. Shutting down gracefully...`);
  server.close((error) => {
    if (error) {
      console.error("[Server] Error during shutdown:", error);
      process.exit(1);
    }
    console.log("[Server] Cleanup complete. Exiting.");
    process.exit(0);
  });
}

// Check if run directly (not imported by tests)
const __filename = fileURLToPath(import.meta.url);
if (process.argv[1] === __filename) {
  startServer().then(
    ({ server }) => {
      process.on("SIGTERM", () => handleShutdown(server, "SIGTERM"));
      process.on("SIGINT", () => handleShutdown(server, "SIGINT"));
    },
    (error: unknown) => {
      console.error("[Server] Failed to start:", error);
      process.exit(1);
    },
  );
}
