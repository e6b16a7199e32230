import type { Server } from "http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { IngestStatus } from "../src/types";
import { createApp, toIngestStatus } from "./app";
import { type Db, openDatabase } from "./db";
import { createEnricher } from "./enrich";
import { SourceNotFoundError } from "./errors";
import { ensureLoaded } from "./ingest";
import { forecastDocument, locationEntry, writeTempSource } from "./testing";

const TODAY = new Date(2026, 9, 19, 12, 0, 0);

describe("HTTP API", () => {
  let db: Db;
  let server: Server;
  let baseUrl: string;
  let ingestStatus: IngestStatus;

  const start = () =>
    new Promise<void>(resolve => {
      const app = createApp({
        db,
        enricher: createEnricher({ now: () => TODAY }),
        getIngestStatus: () => ingestStatus,
        random: () => 0,
      });
      server = app.listen(0, "127.0.0.1", () => {
        const address = server.address();
        if (address && typeof address === "object") baseUrl = `http://127.0.0.1:${address.port}`;
        resolve();
      });
    });

  const get = async (path: string) => {
    const res = await fetch(`${baseUrl}${path}`);
    return { status: res.status, body: await res.json() };
  };

  beforeEach(() => {
    db = openDatabase(":memory:");
    ingestStatus = { state: "pending" };
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
    db.close();
    vi.restoreAllMocks();
  });

  describe("with ingested data", () => {
    beforeEach(async () => {
      const source = writeTempSource(
        forecastDocument([
          locationEntry("南部地區", "21", "29", "晴"),
          locationEntry("北部地區", "18", "24", "多雲"),
          locationEntry("金門縣", "16", "21", "多雲"),
        ])
      );
      ingestStatus = toIngestStatus(ensureLoaded(source, db));
      await start();
    });

    it("reports the ingest outcome", async () => {
      const { status, body } = await get("/api/status");

      expect(status).toBe(200);
      expect(body).toEqual({ ingest: { state: "ingested", inserted: 3, skipped: [] }, storedRows: 3 });
    });

    it("lists locations with the excluded count and date window", async () => {
      const { body } = await get("/api/locations");

      expect(body).toEqual({
        state: "ready",
        locations: ["北部地區", "南部地區"],
        excludedCount: 1,
        dateWindow: { start: "2026-10-19", end: "2026-10-21" },
      });
    });

    it("defaults to the full window and every location", async () => {
      const { status, body } = await get("/api/forecasts");

      expect(status).toBe(200);
      expect(body.state).toBe("ok");
      expect(body.records.map((r: { location: string; date: string }) => [r.location, r.date])).toEqual([
        ["南部地區", "2026-10-19"],
        ["北部地區", "2026-10-20"],
      ]);
      expect(body.aggregates).toEqual({
        avgMaxTemp: 26.5,
        avgMinTemp: 19.5,
        growingDegreeDays: 26,
        humidityIndex: 60,
      });
    });

    it("filters by location and date", async () => {
      const { body } = await get(`/api/forecasts?start=2026-10-20&end=2026-10-21&location=${encodeURIComponent("北部地區")}`);

      expect(body.state).toBe("ok");
      expect(body.records).toHaveLength(1);
      expect(body.records[0].location).toBe("北部地區");
    });

    it("answers no-data for an empty selection", async () => {
      const { body } = await get("/api/forecasts?start=2026-11-01&end=2026-11-03");

      expect(body).toEqual({ state: "no-data" });
    });

    it("rejects a malformed date", async () => {
      const { status, body } = await get("/api/forecasts?start=19-10-2026");

      expect(status).toBe(400);
      expect(body).toEqual({ error: "expected YYYY-MM-DD" });
    });

    it("rejects an inverted range", async () => {
      const { status, body } = await get("/api/forecasts?start=2026-10-21&end=2026-10-19");

      expect(status).toBe(400);
      expect(body).toEqual({ error: "start must not be after end" });
    });

    it("answers 404 for unknown API paths", async () => {
      const { status, body } = await get("/api/nothing-here");

      expect(status).toBe(404);
      expect(body).toEqual({ error: "Not found" });
    });
  });

  describe("with an empty store", () => {
    beforeEach(async () => {
      ingestStatus = toIngestStatus({ ok: false, error: new SourceNotFoundError("missing.json") });
      await start();
    });

    it("keeps serving and reports the failure", async () => {
      const { body } = await get("/api/status");

      expect(body).toEqual({
        ingest: {
          state: "failed",
          code: "SOURCE_NOT_FOUND",
          message: "Forecast source not found: missing.json",
        },
        storedRows: 0,
      });
    });

    it("signals the empty store on both data endpoints", async () => {
      expect((await get("/api/locations")).body).toEqual({ state: "empty-store" });
      expect((await get("/api/forecasts")).body).toEqual({ state: "empty-store" });
    });
  });
});
