import { ALL_LOCATIONS, GDD_BASE_TEMP, HUMIDITY_INDEX_RANGE } from "../src/constants";
import type { EnrichedRecord, ForecastAggregates, ForecastFilters } from "../src/types";

export type QueryResult =
  | { status: "no-data" }
  | { status: "ok"; records: EnrichedRecord[]; aggregates: ForecastAggregates };

/** Both date bounds are inclusive. Dates compare as ISO strings. */
export function filterRecords(records: EnrichedRecord[], filters: ForecastFilters): EnrichedRecord[] {
  return records.filter(
    record =>
      record.date >= filters.startDate &&
      record.date <= filters.endDate &&
      (filters.location === ALL_LOCATIONS || record.location === filters.location)
  );
}

const mean = (values: number[]) => values.reduce((sum, v) => sum + v, 0) / values.length;

/**
 * Summary statistics for a non-empty selection. `humidityIndex` is simulated
 * display noise in [60, 95) and changes on every call.
 */
export function aggregate(records: EnrichedRecord[], random: () => number = Math.random): ForecastAggregates {
  if (records.length === 0) {
    throw new Error("aggregate() needs at least one record");
  }

  const avgMaxTemp = mean(records.map(r => r.max_temp));
  const avgMinTemp = mean(records.map(r => r.min_temp));
  const distinctDates = new Set(records.map(r => r.date)).size;
  const growingDegreeDays = Math.max(0, (avgMaxTemp + avgMinTemp) / 2 - GDD_BASE_TEMP) * distinctDates;
  const { min, max } = HUMIDITY_INDEX_RANGE;

  return {
    avgMaxTemp,
    avgMinTemp,
    growingDegreeDays,
    humidityIndex: min + random() * (max - min),
  };
}

export function runQuery(
  records: EnrichedRecord[],
  filters: ForecastFilters,
  random?: () => number
): QueryResult {
  const selected = filterRecords(records, filters);
  if (selected.length === 0) return { status: "no-data" };
  return { status: "ok", records: selected, aggregates: aggregate(selected, random) };
}
