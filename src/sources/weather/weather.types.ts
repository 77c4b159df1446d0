export type WeatherDataSource = "openweathermap_api" | "mock_data";

export interface WeatherPreset {
  condition: string;
  temperature: number;
  humidity: number;
  wind_speed: number;
}

export interface WeatherData {
  temperature: number;
  /** e.g. `12.3°C` */
  temperatureFormatted: string;
  condition: string;
  /** OpenWeatherMap main group (Clear, Rain, ...) used to pick the icon */
  conditionCode: string;
  humidity: number;
  /** hPa */
  pressure: number;
  windSpeed: number;
  /** Degrees */
  windDirection: number;
  /** km */
  visibility: number;
  icon: string;
  units: string;
  city: string;
  country: string;
  /** Unix seconds */
  sunrise: number;
  sunset: number;
  dataSource: WeatherDataSource;
}
