import fs from "fs";
import { z } from "zod";
import { type Db, WEATHER_TABLE_DDL, weatherTableVersion } from "./db";
import { IngestError, MalformedSourceError, SourceNotFoundError } from "./errors";

export interface NewForecastRow {
  location: string;
  min_temp: number;
  max_temp: number;
  description: string;
}

export type IngestResult =
  | { ok: true; status: "ingested"; inserted: number; skipped: string[] }
  | { ok: true; status: "already-loaded"; rowCount: number }
  | { ok: false; error: IngestError };

// ---------------------------------------------------------------------------
// Source document shape. Only the path down to the location list is required;
// everything inside a location entry is optional so that partial entries can
// be skipped instead of failing the whole import.
// ---------------------------------------------------------------------------

const sourceDocumentSchema = z.object({
  cwaopendata: z.object({
    resources: z.object({
      resource: z.object({
        data: z.object({
          agrWeatherForecasts: z.object({
            weatherForecasts: z.object({
              location: z.array(z.unknown()),
            }),
          }),
        }),
      }),
    }),
  }),
});

const scalar = z.union([z.string(), z.number()]).nullish();

// Only daily[0] is read, so later entries are never validated.
const dailySeries = z
  .object({ daily: z.array(z.unknown()) })
  .passthrough()
  .optional()
  .catch(undefined);

const temperatureEntrySchema = z.object({ temperature: scalar }).passthrough();
const weatherEntrySchema = z.object({ weather: z.string().nullish() }).passthrough();

const locationEntrySchema = z
  .object({
    locationName: z.string().nullish().catch(undefined),
    weatherElements: z
      .object({ MinT: dailySeries, MaxT: dailySeries, Wx: dailySeries })
      .passthrough()
      .optional()
      .catch(undefined),
  })
  .passthrough();

function firstDaily<T extends z.ZodTypeAny>(
  series: { daily: unknown[] } | undefined,
  schema: T
): z.infer<T> | undefined {
  const parsed = schema.safeParse(series?.daily[0]);
  return parsed.success ? parsed.data : undefined;
}

/** Parse a temperature that may arrive as a number or a numeric string. */
export function parseTemperature(value: string | number | null | undefined): number | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  const trimmed = value.trim();
  if (!trimmed) return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Flatten the nested forecast document into rows, using the first daily entry
 * of each element. Entries missing any of the four fields are reported in
 * `skipped` by name (or `#index` when unnamed).
 */
export function extractForecastRows(document: unknown): { rows: NewForecastRow[]; skipped: string[] } {
  const parsed = sourceDocumentSchema.safeParse(document);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedSourceError(
      "Forecast document is missing the location list",
      issue ? issue.path : []
    );
  }

  const entries = parsed.data.cwaopendata.resources.resource.data.agrWeatherForecasts.weatherForecasts.location;
  const rows: NewForecastRow[] = [];
  const skipped: string[] = [];

  entries.forEach((raw, index) => {
    const entry = locationEntrySchema.safeParse(raw);
    if (!entry.success) {
      skipped.push(`#${index}`);
      return;
    }

    const { locationName, weatherElements } = entry.data;
    const minTemp = parseTemperature(firstDaily(weatherElements?.MinT, temperatureEntrySchema)?.temperature);
    const maxTemp = parseTemperature(firstDaily(weatherElements?.MaxT, temperatureEntrySchema)?.temperature);
    const description = firstDaily(weatherElements?.Wx, weatherEntrySchema)?.weather?.trim();
    const location = locationName?.trim();

    if (location && minTemp !== undefined && maxTemp !== undefined && description) {
      rows.push({ location, min_temp: minTemp, max_temp: maxTemp, description });
    } else {
      skipped.push(location || `#${index}`);
    }
  });

  return { rows, skipped };
}

function readSourceDocument(sourcePath: string): unknown {
  if (!fs.existsSync(sourcePath)) throw new SourceNotFoundError(sourcePath);
  let text: string;
  try {
    text = fs.readFileSync(sourcePath, "utf-8");
  } catch (err) {
    throw new SourceNotFoundError(sourcePath, err instanceof Error ? err.message : String(err));
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new MalformedSourceError(`Forecast document is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Populate the `weather` table from the source document unless it already
 * holds rows. Table creation and inserts share one transaction.
 */
export function ensureLoaded(sourcePath: string, db: Db): IngestResult {
  const { rowCount } = weatherTableVersion(db);
  if (rowCount > 0) {
    return { ok: true, status: "already-loaded", rowCount };
  }

  let extracted: { rows: NewForecastRow[]; skipped: string[] };
  try {
    extracted = extractForecastRows(readSourceDocument(sourcePath));
  } catch (err) {
    if (err instanceof IngestError) return { ok: false, error: err };
    throw err;
  }

  const { rows, skipped } = extracted;
  if (skipped.length) {
    console.warn(`[ingest] skipped ${skipped.length} incomplete location(s): ${skipped.join(", ")}`);
  }

  const insertAll = db.transaction((toInsert: NewForecastRow[]) => {
    db.exec(WEATHER_TABLE_DDL);
    const insertStmt = db.prepare(
      "INSERT INTO weather (location, min_temp, max_temp, description) VALUES (?, ?, ?, ?)"
    );
    for (const row of toInsert) {
      insertStmt.run(row.location, row.min_temp, row.max_temp, row.description);
    }
  });
  insertAll(rows);

  console.log(`[ingest] stored ${rows.length} forecast row(s) from ${sourcePath}`);
  return { ok: true, status: "ingested", inserted: rows.length, skipped };
}
