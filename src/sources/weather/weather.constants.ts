import presets from "./weather-presets.json";
import type { WeatherPreset } from "./weather.types";

export const WEATHER_SOURCE_KEY = "weather";

export const WEATHER_ENDPOINTS = Object.freeze({
  current: "https://api.openweathermap.org/data/2.5/weather",
});

export const WEATHER_ICONS: Readonly<Record<string, string>> = Object.freeze({
  Clear: "☀️",
  Clouds: "☁️",
  Rain: "🌧️",
  Drizzle: "🌦️",
  Thunderstorm: "⛈️",
  Snow: "❄️",
  Mist: "🌫️",
  Fog: "🌫️",
});

export const DEFAULT_WEATHER_ICON = "🌤️";

export const MOCK_WEATHER_PRESETS: readonly WeatherPreset[] = Object.freeze(presets);

export const MOCK_ROTATION_INTERVAL_MS = 2 * 60 * 1000;
