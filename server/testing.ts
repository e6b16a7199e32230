import fs from "fs";
import os from "os";
import path from "path";

type Temperature = string | number | undefined;

/** One location entry in the shape of the agricultural forecast document. */
export function locationEntry(name: string | undefined, minTemp: Temperature, maxTemp: Temperature, weather: string | undefined) {
  return {
    locationName: name,
    weatherElements: {
      MinT: { daily: [{ dataDate: "2026-10-19", temperature: minTemp }] },
      MaxT: { daily: [{ dataDate: "2026-10-19", temperature: maxTemp }] },
      Wx: { daily: [{ dataDate: "2026-10-19", weather }] },
    },
  };
}

export function forecastDocument(locations: unknown[]) {
  return {
    cwaopendata: {
      resources: {
        resource: {
          data: { agrWeatherForecasts: { weatherForecasts: { location: locations } } },
        },
      },
    },
  };
}

/** Write `content` (serialised when not a string) to a fresh temp file and return its path. */
export function writeTempSource(content: unknown): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "forecast-src-"));
  const file = path.join(dir, "source.json");
  fs.writeFileSync(file, typeof content === "string" ? content : JSON.stringify(content), "utf-8");
  return file;
}
