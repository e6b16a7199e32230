import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      databasePath: "data.db",
      sourcePath: "data/F-A0010-001.json",
      production: false,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      PORT: "8080",
      DATABASE_PATH: "/tmp/forecast.db",
      SOURCE_PATH: "/tmp/source.json",
      NODE_ENV: "production",
    });

    expect(config).toEqual({
      port: 8080,
      databasePath: "/tmp/forecast.db",
      sourcePath: "/tmp/source.json",
      production: true,
    });
  });

  it("ignores a non-numeric port", () => {
    expect(loadConfig({ PORT: "abc" }).port).toBe(3000);
  });
});
