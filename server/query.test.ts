import { describe, expect, it } from "vitest";
import { ALL_LOCATIONS } from "../src/constants";
import type { EnrichedRecord } from "../src/types";
import { aggregate, filterRecords, runQuery } from "./query";

const record = (id: number, location: string, date: string, min = 15, max = 25): EnrichedRecord => ({
  id,
  location,
  min_temp: min,
  max_temp: max,
  description: "晴",
  lat: 24,
  lon: 121,
  date,
});

const records = [
  record(1, "北部地區", "2026-10-19"),
  record(2, "中部地區", "2026-10-20"),
  record(3, "南部地區", "2026-10-21"),
  record(4, "北部地區", "2026-10-19"),
];

describe("filterRecords", () => {
  it("includes records on both bounds", () => {
    const selected = filterRecords(records, {
      startDate: "2026-10-19",
      endDate: "2026-10-21",
      location: ALL_LOCATIONS,
    });

    expect(selected.map(r => r.id)).toEqual([1, 2, 3, 4]);
  });

  it("excludes records outside the range", () => {
    const selected = filterRecords(records, {
      startDate: "2026-10-20",
      endDate: "2026-10-20",
      location: ALL_LOCATIONS,
    });

    expect(selected.map(r => r.id)).toEqual([2]);
  });

  it("narrows to one location", () => {
    const selected = filterRecords(records, {
      startDate: "2026-10-19",
      endDate: "2026-10-21",
      location: "北部地區",
    });

    expect(selected.map(r => r.id)).toEqual([1, 4]);
  });
});

describe("aggregate", () => {
  it("averages temperatures", () => {
    const result = aggregate([record(1, "北部地區", "2026-10-19", 10, 20), record(2, "中部地區", "2026-10-19", 14, 30)], () => 0);

    expect(result.avgMinTemp).toBe(12);
    expect(result.avgMaxTemp).toBe(25);
  });

  it("multiplies growing degree days by distinct dates, not span", () => {
    const result = aggregate(
      [
        record(1, "北部地區", "2026-10-19", 10, 20),
        record(2, "中部地區", "2026-10-19", 10, 20),
        record(3, "南部地區", "2026-10-21", 10, 20),
      ],
      () => 0
    );

    expect(result.growingDegreeDays).toBe(10);
  });

  it("never reports negative growing degree days", () => {
    const result = aggregate(
      [record(1, "北部地區", "2026-10-19", 3, 5), record(2, "北部地區", "2026-10-20", 3, 5)],
      () => 0
    );

    expect(result.growingDegreeDays).toBe(0);
  });

  it("draws the humidity index from [60, 95)", () => {
    expect(aggregate(records, () => 0).humidityIndex).toBe(60);
    expect(aggregate(records, () => 0.5).humidityIndex).toBe(77.5);
    expect(aggregate(records, () => 0.999).humidityIndex).toBeLessThan(95);
  });

  it("refuses an empty selection", () => {
    expect(() => aggregate([])).toThrow("at least one record");
  });
});

describe("runQuery", () => {
  it("returns both rows of a two-row store over the full window", () => {
    const stored = [record(1, "北部地區", "2026-10-19", 18, 24), record(2, "中部地區", "2026-10-20", 19, 27)];

    const result = runQuery(
      stored,
      { startDate: "2026-10-19", endDate: "2026-10-21", location: ALL_LOCATIONS },
      () => 0
    );

    expect(result).toEqual({
      status: "ok",
      records: stored,
      aggregates: { avgMaxTemp: 25.5, avgMinTemp: 18.5, growingDegreeDays: 24, humidityIndex: 60 },
    });
  });

  it("reports no data instead of aggregating nothing", () => {
    const result = runQuery(records, { startDate: "2026-11-01", endDate: "2026-11-02", location: ALL_LOCATIONS });

    expect(result).toEqual({ status: "no-data" });
  });
});
