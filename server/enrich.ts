import { addDays, format, startOfDay } from "date-fns";
import { DATE_WINDOW_DAYS, LOCATION_COORDINATES } from "../src/constants";
import type { Coordinates, EnrichedRecord, ForecastRecord } from "../src/types";
import { type Db, weatherTableVersion } from "./db";

const ISO_DATE = "yyyy-MM-dd";

/** Maps a location name to coordinates. Stand-in for real geocoding. */
export interface CoordinateResolver {
  resolve(location: string): Coordinates | undefined;
  /** Every name the resolver can answer for, in table order. */
  knownLocations(): string[];
}

/** Assigns a display date to the record at a dense 0-based position. */
export interface DateSynthesizer {
  dateFor(position: number, today: Date): string;
  window(today: Date): { start: string; end: string };
}

export class StaticCoordinateResolver implements CoordinateResolver {
  constructor(private readonly table: Readonly<Record<string, Coordinates>> = LOCATION_COORDINATES) {}

  resolve(location: string): Coordinates | undefined {
    return Object.prototype.hasOwnProperty.call(this.table, location) ? this.table[location] : undefined;
  }

  knownLocations(): string[] {
    return Object.keys(this.table);
  }
}

/** today, today+1, ... today+(cycle-1), then repeats. */
export class RollingDateSynthesizer implements DateSynthesizer {
  constructor(private readonly cycleDays: number = DATE_WINDOW_DAYS) {}

  dateFor(position: number, today: Date): string {
    return format(addDays(startOfDay(today), position % this.cycleDays), ISO_DATE);
  }

  window(today: Date): { start: string; end: string } {
    const start = startOfDay(today);
    return {
      start: format(start, ISO_DATE),
      end: format(addDays(start, this.cycleDays - 1), ISO_DATE),
    };
  }
}

export type EnrichResult =
  | { kind: "empty-store" }
  | {
      kind: "ready";
      records: EnrichedRecord[];
      /** Selector choices. Falls back to every known location when nothing matched. */
      locations: string[];
      excludedCount: number;
      dateWindow: { start: string; end: string };
    };

export function readForecastRecords(db: Db): ForecastRecord[] {
  return db
    .prepare<[], ForecastRecord>("SELECT id, location, min_temp, max_temp, description FROM weather ORDER BY id")
    .all();
}

/** Join rows against coordinates, drop the unmatched, and date the survivors. */
export function enrichRecords(
  rows: ForecastRecord[],
  resolver: CoordinateResolver,
  synthesizer: DateSynthesizer,
  today: Date
): EnrichResult {
  if (rows.length === 0) return { kind: "empty-store" };

  const matched: Array<ForecastRecord & Coordinates> = [];
  for (const row of rows) {
    const coords = resolver.resolve(row.location);
    if (coords) matched.push({ ...row, lat: coords.lat, lon: coords.lon });
  }

  const records: EnrichedRecord[] = matched.map((row, position) => ({
    ...row,
    date: synthesizer.dateFor(position, today),
  }));

  // With no survivors the selector still offers the full nominal list.
  const locations = records.length
    ? [...new Set(records.map(r => r.location))].sort()
    : resolver.knownLocations();

  return {
    kind: "ready",
    records,
    locations,
    excludedCount: rows.length - records.length,
    dateWindow: synthesizer.window(today),
  };
}

export interface EnricherOptions {
  resolver?: CoordinateResolver;
  synthesizer?: DateSynthesizer;
  now?: () => Date;
}

export interface Enricher {
  loadAndEnrich(db: Db): EnrichResult;
}

/**
 * Build an enricher that caches its output per database handle. The cache key
 * is the table's row count, last id and the current calendar day, so an
 * insert or a date change forces a fresh read.
 */
export function createEnricher(options: EnricherOptions = {}): Enricher {
  const resolver = options.resolver ?? new StaticCoordinateResolver();
  const synthesizer = options.synthesizer ?? new RollingDateSynthesizer();
  const now = options.now ?? (() => new Date());
  const cache = new WeakMap<Db, { key: string; result: EnrichResult }>();

  return {
    loadAndEnrich(db: Db): EnrichResult {
      const today = now();
      const { rowCount, maxId } = weatherTableVersion(db);
      if (rowCount === 0) return { kind: "empty-store" };

      const key = `${rowCount}:${maxId}:${format(today, ISO_DATE)}`;
      const hit = cache.get(db);
      if (hit && hit.key === key) return hit.result;

      const result = enrichRecords(readForecastRecords(db), resolver, synthesizer, today);
      cache.set(db, { key, result });
      return result;
    },
  };
}
