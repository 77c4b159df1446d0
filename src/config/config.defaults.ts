/**
 * Built-in configuration. The JSON file and then environment variables are merged over this.
 * Intervals are in seconds.
 */

export type ConfigValue = string | number | boolean | null | ConfigValue[] | ConfigTree;

export interface ConfigTree {
  [key: string]: ConfigValue;
}

export const PLACEHOLDER_WEATHER_API_KEY = "YOUR_OPENWEATHERMAP_API_KEY_HERE";

export const DEFAULT_API_UPDATE_INTERVAL_S = 300;

export const KNOWN_WEATHER_UNITS = ["metric", "imperial", "standard"];

export function createDefaultConfig(): ConfigTree {
  return {
    weather: {
      api_key: "",
      city: "London,UK",
      units: "metric",
      mock_mode: false,
      mock_fallback: true,
      refresh_interval: 600,
    },
    bitcoin: {
      refresh_interval: DEFAULT_API_UPDATE_INTERVAL_S,
      endpoints: {},
    },
    google_calendar: {
      access_token: "",
      calendar_id: "primary",
      max_results: 10,
      refresh_interval: 900,
    },
    app: {
      api_update_interval: DEFAULT_API_UPDATE_INTERVAL_S,
      debug_mode: false,
    },
  };
}

type EnvKind = "string" | "number" | "boolean";

/**
 * Environment variable → dotted config path
 */
export const ENV_CONFIG_MAPPING: ReadonlyArray<{ env: string; path: string; kind: EnvKind }> = [
  { env: "WEATHER_API_KEY", path: "weather.api_key", kind: "string" },
  { env: "WEATHER_CITY", path: "weather.city", kind: "string" },
  { env: "WEATHER_UNITS", path: "weather.units", kind: "string" },
  { env: "WEATHER_MOCK_MODE", path: "weather.mock_mode", kind: "boolean" },
  { env: "WEATHER_MOCK_FALLBACK", path: "weather.mock_fallback", kind: "boolean" },
  { env: "WEATHER_MOCK_TEMPERATURE", path: "weather.mock_temperature", kind: "number" },
  { env: "WEATHER_MOCK_CONDITION", path: "weather.mock_condition", kind: "string" },
  { env: "WEATHER_MOCK_HUMIDITY", path: "weather.mock_humidity", kind: "number" },
  { env: "WEATHER_MOCK_WIND_SPEED", path: "weather.mock_wind_speed", kind: "number" },
  { env: "WEATHER_REFRESH_INTERVAL", path: "weather.refresh_interval", kind: "number" },
  { env: "GOOGLE_CALENDAR_ACCESS_TOKEN", path: "google_calendar.access_token", kind: "string" },
  { env: "GOOGLE_CALENDAR_ID", path: "google_calendar.calendar_id", kind: "string" },
  { env: "CALENDAR_REFRESH_INTERVAL", path: "google_calendar.refresh_interval", kind: "number" },
  { env: "BITCOIN_REFRESH_INTERVAL", path: "bitcoin.refresh_interval", kind: "number" },
  { env: "API_UPDATE_INTERVAL", path: "app.api_update_interval", kind: "number" },
  { env: "DEBUG_MODE", path: "app.debug_mode", kind: "boolean" },
];
