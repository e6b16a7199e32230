/** A single stored forecast row from the `weather` table. */
export interface ForecastRecord {
  id: number;
  location: string;
  min_temp: number;
  max_temp: number;
  description: string;
}

/** A stored row joined with its coordinates and a synthetic display date (YYYY-MM-DD). */
export interface EnrichedRecord extends ForecastRecord {
  lat: number;
  lon: number;
  date: string;
}

export interface Coordinates {
  lat: number;
  lon: number;
}

/** Summary figures for a filtered selection. */
export interface ForecastAggregates {
  avgMaxTemp: number;
  avgMinTemp: number;
  growingDegreeDays: number;
  /** Simulated value, redrawn on every request. Not derived from the data. */
  humidityIndex: number;
}

export interface ForecastFilters {
  startDate: string;
  endDate: string;
  /** A location name or ALL_LOCATIONS. */
  location: string;
}

export type IngestStatus =
  | { state: "pending" }
  | { state: "ingested"; inserted: number; skipped: string[] }
  | { state: "already-loaded"; rowCount: number }
  | { state: "failed"; code: string; message: string };

export interface StatusResponse {
  ingest: IngestStatus;
  storedRows: number;
}

export type LocationsResponse =
  | { state: "empty-store" }
  | {
      state: "ready";
      locations: string[];
      excludedCount: number;
      dateWindow: { start: string; end: string };
    };

export type ForecastsResponse =
  | { state: "empty-store" }
  | { state: "no-data" }
  | { state: "ok"; records: EnrichedRecord[]; aggregates: ForecastAggregates };
