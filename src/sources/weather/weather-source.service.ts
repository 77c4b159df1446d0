import { Injectable } from "@nestjs/common";
import { TimeBoxedCacheService } from "@/cache/time-boxed-cache.service";
import { HttpJsonClient } from "@/common/http/http-json.client";
import { classifySourceError } from "@/common/utils/error-classification.utils";
import {
  expectRecord,
  isRecord,
  readArray,
  readNumber,
  readOptionalNumber,
  readOptionalString,
  readRecord,
  readString,
} from "@/common/utils/payload.utils";
import { ConfigService } from "@/config/config.service";
import { SourceManager } from "../base/source-manager";
import { SyntheticData } from "../base/synthetic-data";
import { refreshIntervalFrom, resolveEndpoints } from "../source-config.utils";
import {
  DEFAULT_WEATHER_ICON,
  MOCK_ROTATION_INTERVAL_MS,
  MOCK_WEATHER_PRESETS,
  WEATHER_ENDPOINTS,
  WEATHER_ICONS,
  WEATHER_SOURCE_KEY,
} from "./weather.constants";
import type { WeatherData } from "./weather.types";

export interface WindInfo {
  speed: number;
  direction: number;
  speedFormatted: string;
}

export function weatherIcon(conditionCode: string): string {
  return WEATHER_ICONS[conditionCode] ?? DEFAULT_WEATHER_ICON;
}

export function formatTemperature(value: number, units: string): string {
  return `${value.toFixed(1)}°${units === "metric" ? "C" : "F"}`;
}

export function toTitleCase(value: string): string {
  return value.toLowerCase().replace(/\b\w/g, letter => letter.toUpperCase());
}

function randomUniform(min: number, max: number): number {
  return min + Math.random() * (max - min);
}

// Inclusive on both ends
function randomInt(min: number, max: number): number {
  return min + Math.floor(Math.random() * (max - min + 1));
}

/**
 * Current conditions from OpenWeatherMap, or rotating synthetic data when no key is
 * configured, mock mode is on, or the API fails with `weather.mock_fallback` set.
 */
@Injectable()
export class WeatherSourceService extends SourceManager<WeatherData> {
  private presetIndex = 0;
  private lastPresetChange = Date.now();

  constructor(
    cache: TimeBoxedCacheService,
    private readonly http: HttpJsonClient,
    private readonly config: ConfigService
  ) {
    super(cache, {
      key: WEATHER_SOURCE_KEY,
      refreshIntervalMs: refreshIntervalFrom(config, "weather"),
      endpoints: resolveEndpoints(config, "weather", WEATHER_ENDPOINTS),
    });
  }

  isMockMode(): boolean {
    return !this.config.hasWeatherApiKey() || this.config.getBoolean("weather.mock_mode");
  }

  protected async fetchData(): Promise<WeatherData | SyntheticData<WeatherData>> {
    if (this.isMockMode()) {
      return new SyntheticData(this.createMockData());
    }

    try {
      return await this.fetchCurrentWeather();
    } catch (error) {
      const reason = classifySourceError(error);
      if (!reason || !this.config.getBoolean("weather.mock_fallback", true)) {
        throw error;
      }
      this.logWarning(`Weather API failed, using mock data: ${reason.describe()}`);
      return new SyntheticData(this.createMockData());
    }
  }

  async isUsingMockData(): Promise<boolean> {
    const result = await this.getData();
    return result.status !== "error" && result.data.dataSource === "mock_data";
  }

  async getDataSourceInfo(): Promise<string> {
    return (await this.isUsingMockData()) ? "🧪 Mock Weather Data" : "🌐 OpenWeatherMap API";
  }

  async getTemperature(): Promise<number> {
    const result = await this.getData();
    return result.status === "error" ? 0 : result.data.temperature;
  }

  async getFormattedTemperature(): Promise<string> {
    const result = await this.getData();
    return result.status === "error" ? "0°C" : result.data.temperatureFormatted;
  }

  async getCondition(): Promise<string> {
    const result = await this.getData();
    return result.status === "error" ? "Unknown" : result.data.condition;
  }

  async getIcon(): Promise<string> {
    const result = await this.getData();
    return result.status === "error" ? DEFAULT_WEATHER_ICON : result.data.icon;
  }

  async getWindInfo(): Promise<WindInfo> {
    const result = await this.getData();
    const data = result.status === "error" ? undefined : result.data;
    const speed = data?.windSpeed ?? 0;
    const speedUnit = (data?.units ?? "metric") === "metric" ? "m/s" : "mph";

    return {
      speed,
      direction: data?.windDirection ?? 0,
      speedFormatted: `${speed.toFixed(1)} ${speedUnit}`,
    };
  }

  async getStatus(): Promise<string> {
    const result = await this.getData();
    return result.status;
  }

  private async fetchCurrentWeather(): Promise<WeatherData> {
    const units = this.config.getString("weather.units", "metric");
    const body = expectRecord(
      await this.http.getJson(this.endpoint("current"), {
        params: {
          q: this.config.getString("weather.city", "London,UK"),
          appid: this.config.getString("weather.api_key"),
          units,
        },
        context: "Failed to fetch weather",
      }),
      "weather"
    );

    const conditions = expectRecord(readArray(body, "weather", "weather")[0], "weather.weather[0]");
    const main = readRecord(body, "main", "weather");
    const wind = isRecord(body.wind) ? body.wind : {};
    const sys = isRecord(body.sys) ? body.sys : {};
    const conditionCode = readString(conditions, "main", "weather.weather[0]");
    const temperature = readNumber(main, "temp", "weather.main");

    return {
      temperature,
      temperatureFormatted: formatTemperature(temperature, units),
      condition: toTitleCase(readOptionalString(conditions, "description", conditionCode)),
      conditionCode,
      humidity: readNumber(main, "humidity", "weather.main"),
      pressure: readOptionalNumber(main, "pressure"),
      windSpeed: readOptionalNumber(wind, "speed"),
      windDirection: readOptionalNumber(wind, "deg"),
      visibility: readOptionalNumber(body, "visibility") / 1000,
      icon: weatherIcon(conditionCode),
      units,
      city: readOptionalString(body, "name"),
      country: readOptionalString(sys, "country"),
      sunrise: readOptionalNumber(sys, "sunrise"),
      sunset: readOptionalNumber(sys, "sunset"),
      dataSource: "openweathermap_api",
    };
  }

  private createMockData(): WeatherData {
    const now = Date.now();
    if (now - this.lastPresetChange > MOCK_ROTATION_INTERVAL_MS) {
      this.presetIndex = (this.presetIndex + 1) % MOCK_WEATHER_PRESETS.length;
      this.lastPresetChange = now;
    }

    const preset = MOCK_WEATHER_PRESETS[this.presetIndex];
    const units = this.config.getString("weather.units", "metric");
    const [city, country] = this.config.getString("weather.city", "Demo City,UK").split(",");

    const condition = this.config.getString("weather.mock_condition", preset.condition);
    const temperature =
      this.config.getNumber("weather.mock_temperature", preset.temperature) + randomUniform(-1.5, 1.5);
    const humidity = this.config.getNumber("weather.mock_humidity", preset.humidity) + randomInt(-5, 5);
    const windSpeed = this.config.getNumber("weather.mock_wind_speed", preset.wind_speed) + randomUniform(-0.5, 0.5);
    const nowSeconds = Math.floor(now / 1000);

    return {
      temperature,
      temperatureFormatted: formatTemperature(temperature, units),
      condition,
      conditionCode: condition,
      humidity: Math.max(0, Math.min(100, Math.round(humidity))),
      pressure: randomInt(1010, 1020),
      windSpeed: Math.max(0, windSpeed),
      windDirection: randomInt(0, 360),
      visibility: randomUniform(8, 15),
      icon: weatherIcon(condition),
      units,
      city: city.trim(),
      country: country?.trim() || "XX",
      sunrise: nowSeconds - 3600,
      sunset: nowSeconds + 7200,
      dataSource: "mock_data",
    };
  }
}
