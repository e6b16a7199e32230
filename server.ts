import express from "express";
import { createServer as createViteServer } from "vite";
import path from "path";
import { fileURLToPath } from "url";
import { createApp, toIngestStatus } from "./server/app";
import { loadConfig } from "./server/config";
import { openDatabase } from "./server/db";
import { createEnricher } from "./server/enrich";
import { ensureLoaded } from "./server/ingest";
import type { IngestStatus } from "./src/types";

const config = loadConfig();

/** SQLite database — auto-created on first run. */
const db = openDatabase(config.databasePath);

// ---------------------------------------------------------------------------
// 1. INGESTION — Load the forecast document once if the table is empty.
//    A failure is logged and reported by /api/status; the server still starts.
// ---------------------------------------------------------------------------
let ingestStatus: IngestStatus = { state: "pending" };

try {
  const result = ensureLoaded(config.sourcePath, db);
  ingestStatus = toIngestStatus(result);
  if (!result.ok) {
    console.error(`Ingestion failed [${result.error.code}]: ${result.error.message}`);
  } else if (result.status === "already-loaded") {
    console.log(`Forecast table already holds ${result.rowCount} row(s); skipping ingestion`);
  }
} catch (err) {
  console.error("Ingestion aborted:", err);
  ingestStatus = {
    state: "failed",
    code: "STORAGE_ERROR",
    message: err instanceof Error ? err.message : String(err),
  };
}

const app = createApp({
  db,
  enricher: createEnricher(),
  getIngestStatus: () => ingestStatus,
});

// ---------------------------------------------------------------------------
// 2. SERVER STARTUP — Dev mode embeds Vite as middleware; production serves
//    the pre-built dist/ folder and falls back to index.html for SPA routing.
// ---------------------------------------------------------------------------

async function startServer() {
  if (!config.production) {
    const vite = await createViteServer({
      server: { middlewareMode: true },
      appType: "spa",
    });
    app.use(vite.middlewares);
  } else {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const distPath = path.join(__dirname, "dist");

    app.use(express.static(distPath));

    app.get("*", (_req, res) => {
      res.sendFile(path.join(distPath, "index.html"));
    });
  }

  app.listen(config.port, "0.0.0.0", () => {
    console.log(`Server running on http://localhost:${config.port}`);
  });
}

startServer().catch(err => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
