import Database from "better-sqlite3";

export type Db = Database.Database;

export const WEATHER_TABLE_DDL = `
  CREATE TABLE IF NOT EXISTS weather (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    location TEXT,
    min_temp REAL,
    max_temp REAL,
    description TEXT
  );
`;

/** Open (or create) the SQLite file. Pass ":memory:" for a throwaway store. */
export function openDatabase(filename: string): Db {
  return new Database(filename);
}

export function hasWeatherTable(db: Db): boolean {
  const row = db
    .prepare("SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = 'weather'")
    .get();
  return row !== undefined;
}

/**
 * Row count and highest id of the `weather` table, or zeros when the table
 * has not been created yet. The table is append-only, so the pair identifies
 * its contents.
 */
export function weatherTableVersion(db: Db): { rowCount: number; maxId: number } {
  if (!hasWeatherTable(db)) return { rowCount: 0, maxId: 0 };
  const row = db
    .prepare<[], { rowCount: number; maxId: number }>(
      "SELECT COUNT(*) AS rowCount, COALESCE(MAX(id), 0) AS maxId FROM weather"
    )
    .get();
  return row ?? { rowCount: 0, maxId: 0 };
}
