import type { Coordinates } from "./types";

/** Selector value meaning "every location". */
export const ALL_LOCATIONS = "ALL";

/** Base temperature (°C) for growing degree days. */
export const GDD_BASE_TEMP = 10.0;

/** Length of the repeating synthetic date cycle, in days. */
export const DATE_WINDOW_DAYS = 3;

export const HUMIDITY_INDEX_RANGE = { min: 60, max: 95 } as const;

// Approximate centroids for the forecast regions and the counties/cities that
// appear in agricultural forecast documents. Names match `locationName`.
export const LOCATION_COORDINATES: Readonly<Record<string, Coordinates>> = {
  "北部地區": { lat: 25.0330, lon: 121.5654 },
  "中部地區": { lat: 24.1477, lon: 120.6736 },
  "南部地區": { lat: 22.9999, lon: 120.2270 },
  "東北部地區": { lat: 24.7021, lon: 121.7378 },
  "東部地區": { lat: 23.9872, lon: 121.6015 },
  "東南部地區": { lat: 22.7583, lon: 121.1444 },
  "臺北市": { lat: 25.0330, lon: 121.5654 },
  "新北市": { lat: 25.0120, lon: 121.4657 },
  "桃園市": { lat: 24.9936, lon: 121.3010 },
  "臺中市": { lat: 24.1477, lon: 120.6736 },
  "臺南市": { lat: 22.9999, lon: 120.2270 },
  "高雄市": { lat: 22.6273, lon: 120.3014 },
  "宜蘭縣": { lat: 24.7021, lon: 121.7378 },
  "花蓮縣": { lat: 23.9872, lon: 121.6015 },
  "臺東縣": { lat: 22.7583, lon: 121.1444 },
  "屏東縣": { lat: 22.5519, lon: 120.5487 },
  "嘉義縣": { lat: 23.4518, lon: 120.2555 },
  "南投縣": { lat: 23.9609, lon: 120.9719 },
  "澎湖縣": { lat: 23.5711, lon: 119.5793 },
};
