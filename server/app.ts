import express from "express";
import { isValid, parseISO } from "date-fns";
import { z } from "zod";
import { ALL_LOCATIONS } from "../src/constants";
import type { ForecastsResponse, IngestStatus, LocationsResponse, StatusResponse } from "../src/types";
import { type Db, weatherTableVersion } from "./db";
import type { Enricher } from "./enrich";
import type { IngestResult } from "./ingest";
import { runQuery } from "./query";

export interface AppDeps {
  db: Db;
  enricher: Enricher;
  getIngestStatus: () => IngestStatus;
  /** Random source for the simulated humidity index. */
  random?: () => number;
}

/** Render an ingest outcome for the status endpoint and the UI. */
export function toIngestStatus(result: IngestResult): IngestStatus {
  if (!result.ok) {
    return { state: "failed", code: result.error.code, message: result.error.message };
  }
  if (result.status === "already-loaded") {
    return { state: "already-loaded", rowCount: result.rowCount };
  }
  return { state: "ingested", inserted: result.inserted, skipped: result.skipped };
}

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
  .refine(value => isValid(parseISO(value)), "not a calendar date");

const forecastQuerySchema = z
  .object({
    start: isoDate.optional(),
    end: isoDate.optional(),
    location: z.string().min(1).default(ALL_LOCATIONS),
  })
  .refine(q => !q.start || !q.end || q.start <= q.end, "start must not be after end");

export function createApp({ db, enricher, getIngestStatus, random }: AppDeps) {
  const app = express();
  app.use(express.json());

  // ---------------------------------------------------------------------------
  // API ROUTES — JSON endpoints consumed by the React frontend.
  // ---------------------------------------------------------------------------

  /** GET /api/status — Ingestion outcome and stored row count. */
  app.get("/api/status", (_req, res) => {
    try {
      const body: StatusResponse = {
        ingest: getIngestStatus(),
        storedRows: weatherTableVersion(db).rowCount,
      };
      res.json(body);
    } catch (err) {
      console.error("GET /api/status error:", err);
      res.status(500).json({ error: "Failed to load status" });
    }
  });

  /** GET /api/locations — Selector choices and the synthetic date window. */
  app.get("/api/locations", (_req, res) => {
    try {
      const result = enricher.loadAndEnrich(db);
      const body: LocationsResponse =
        result.kind === "empty-store"
          ? { state: "empty-store" }
          : {
              state: "ready",
              locations: result.locations,
              excludedCount: result.excludedCount,
              dateWindow: result.dateWindow,
            };
      res.json(body);
    } catch (err) {
      console.error("GET /api/locations error:", err);
      res.status(500).json({ error: "Failed to load locations" });
    }
  });

  /** GET /api/forecasts — Filtered records plus aggregates. Dates default to the synthetic window. */
  app.get("/api/forecasts", (req, res) => {
    const parsed = forecastQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return res.status(400).json({ error: issue ? issue.message : "Invalid query" });
    }

    try {
      const result = enricher.loadAndEnrich(db);
      if (result.kind === "empty-store") {
        const body: ForecastsResponse = { state: "empty-store" };
        return res.json(body);
      }

      const { start, end, location } = parsed.data;
      const query = runQuery(
        result.records,
        {
          startDate: start ?? result.dateWindow.start,
          endDate: end ?? result.dateWindow.end,
          location,
        },
        random
      );
      const body: ForecastsResponse =
        query.status === "no-data"
          ? { state: "no-data" }
          : { state: "ok", records: query.records, aggregates: query.aggregates };
      res.json(body);
    } catch (err) {
      console.error("GET /api/forecasts error:", err);
      res.status(500).json({ error: "Failed to load forecasts" });
    }
  });

  app.all("/api/*", (_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  return app;
}
