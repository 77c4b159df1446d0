/**
 * Config Service
 * Dotted-path configuration merged from defaults, an optional JSON file and the environment
 */

import { existsSync, readFileSync } from "fs";
import { resolve } from "path";
import { Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import { EnvironmentUtils } from "@/common/utils/environment.utils";
import { ENV } from "./environment.constants";
import {
  type ConfigTree,
  type ConfigValue,
  createDefaultConfig,
  ENV_CONFIG_MAPPING,
  KNOWN_WEATHER_UNITS,
  PLACEHOLDER_WEATHER_API_KEY,
} from "./config.defaults";

export interface ConfigServiceOptions {
  /** JSON file merged over the defaults. Missing files are ignored. */
  configFile?: string;
  /** Only used to report whether a .env file was present */
  envFile?: string;
  /** Variables to read instead of process.env */
  env?: Record<string, string | undefined>;
}

export interface ConfigStatus {
  sources: string[];
  envFileExists: boolean;
  jsonFileExists: boolean;
  jsonFileValid: boolean;
  weatherApiConfigured: boolean;
  weatherMockMode: boolean;
  googleCalendarConfigured: boolean;
  debugMode: boolean;
}

const SENSITIVE_KEY_FRAGMENTS = ["key", "secret", "token"];
const MASK = "********";
const MIN_RECOMMENDED_INTERVAL_S = 60;

export function isConfigTree(value: unknown): value is ConfigTree {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(isConfigValue);
}

function isConfigValue(value: unknown): value is ConfigValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return true;
    case "object":
      return Array.isArray(value) ? value.every(isConfigValue) : isConfigTree(value);
    default:
      return false;
  }
}

function cloneValue(value: ConfigValue): ConfigValue {
  if (Array.isArray(value)) return value.map(cloneValue);
  if (value !== null && typeof value === "object") return cloneTree(value);
  return value;
}

function cloneTree(tree: ConfigTree): ConfigTree {
  const result: ConfigTree = {};
  for (const [key, value] of Object.entries(tree)) {
    result[key] = cloneValue(value);
  }
  return result;
}

export function deepMerge(base: ConfigTree, update: ConfigTree): ConfigTree {
  const result = cloneTree(base);

  for (const [key, value] of Object.entries(update)) {
    const existing = result[key];
    if (isConfigTree(existing) && isConfigTree(value)) {
      result[key] = deepMerge(existing, value);
    } else {
      result[key] = cloneValue(value);
    }
  }

  return result;
}

function setPath(tree: ConfigTree, path: string, value: ConfigValue): void {
  const keys = path.split(".");
  const last = keys.pop();
  if (!last) return;

  let node = tree;
  for (const key of keys) {
    const next = node[key];
    if (isConfigTree(next)) {
      node = next;
    } else {
      const created: ConfigTree = {};
      node[key] = created;
      node = created;
    }
  }
  node[last] = value;
}

/**
 * Configuration provider for every source and the scheduler.
 * Values merge in order: built-in defaults, JSON file, environment (env wins).
 */
@Injectable()
export class ConfigService extends BaseService {
  private config: ConfigTree;
  private readonly configFile: string;
  private readonly envFile: string;
  private readonly env: Record<string, string | undefined>;
  private jsonFileValid = false;
  private jsonTree: ConfigTree = {};

  constructor(options: ConfigServiceOptions = {}) {
    super();
    this.configFile = resolve(options.configFile ?? ENV.CONFIG_FILE);
    this.envFile = resolve(options.envFile ?? ENV.ENV_FILE);
    this.env = options.env ?? process.env;
    this.config = this.loadConfig();

    this.logger.log(`Configuration loaded from: ${this.getConfigSources().join(" -> ")}`);
  }

  /**
   * Resolve a dotted path such as "weather.city"; undefined when any segment is missing
   */
  get(path: string): ConfigValue | undefined {
    let node: ConfigValue | undefined = this.config;

    for (const key of path.split(".")) {
      if (!isConfigTree(node) || !Object.hasOwn(node, key)) {
        return undefined;
      }
      node = node[key];
    }

    return node;
  }

  getString(path: string, defaultValue = ""): string {
    const value = this.get(path);
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") return String(value);
    return defaultValue;
  }

  getNumber(path: string, defaultValue: number): number {
    const value = this.get(path);
    if (typeof value === "number" && Number.isFinite(value)) return value;
    if (typeof value === "string") {
      return EnvironmentUtils.toNumber(value) ?? defaultValue;
    }
    return defaultValue;
  }

  getBoolean(path: string, defaultValue = false): boolean {
    const value = this.get(path);
    if (typeof value === "boolean") return value;
    if (typeof value === "string") {
      return EnvironmentUtils.toBoolean(value) ?? defaultValue;
    }
    return defaultValue;
  }

  /**
   * Copy of a whole section, empty when absent
   */
  getSection(section: string): ConfigTree {
    const value = this.config[section];
    return isConfigTree(value) ? cloneTree(value) : {};
  }

  /**
   * In-memory override; never written back to disk
   */
  set(path: string, value: ConfigValue): void {
    setPath(this.config, path, value);
    this.logger.debug(`Configuration override applied for ${path}`);
  }

  /**
   * Section copy with credentials replaced by a mask
   */
  getMaskedSection(section: string): ConfigTree {
    return this.mask(this.getSection(section));
  }

  hasWeatherApiKey(): boolean {
    const key = this.getString("weather.api_key").trim();
    return key !== "" && key !== PLACEHOLDER_WEATHER_API_KEY;
  }

  hasCalendarAccessToken(): boolean {
    return this.getString("google_calendar.access_token").trim() !== "";
  }

  getConfigStatus(): ConfigStatus {
    return {
      sources: this.getConfigSources(),
      envFileExists: existsSync(this.envFile),
      jsonFileExists: existsSync(this.configFile),
      jsonFileValid: this.jsonFileValid,
      weatherApiConfigured: this.hasWeatherApiKey(),
      weatherMockMode: this.getBoolean("weather.mock_mode") || !this.hasWeatherApiKey(),
      googleCalendarConfigured: this.hasCalendarAccessToken(),
      debugMode: this.getBoolean("app.debug_mode"),
    };
  }

  /**
   * Human readable warnings about the merged configuration
   */
  validateConfiguration(): string[] {
    const warnings: string[] = [];

    if (!this.hasWeatherApiKey()) {
      warnings.push("Weather API key not configured. Weather screen will show mock data.");
    }

    if (!this.hasCalendarAccessToken()) {
      warnings.push("Google Calendar access token not configured. Calendar events are unavailable.");
    }

    const units = this.getString("weather.units", "metric");
    if (!KNOWN_WEATHER_UNITS.includes(units)) {
      warnings.push(`Unknown weather units "${units}", expected one of ${KNOWN_WEATHER_UNITS.join(", ")}.`);
    }

    const interval = this.getNumber("app.api_update_interval", 0);
    if (interval < MIN_RECOMMENDED_INTERVAL_S) {
      warnings.push(
        `API update interval of ${interval}s is below ${MIN_RECOMMENDED_INTERVAL_S}s and may exceed upstream rate limits.`
      );
    }

    const jsonWeather = this.jsonTree.weather;
    if (isConfigTree(jsonWeather)) {
      const jsonKey = jsonWeather.api_key;
      if (typeof jsonKey === "string" && jsonKey !== "" && jsonKey !== PLACEHOLDER_WEATHER_API_KEY) {
        warnings.push("API key found in the JSON config file. Consider moving it to the environment.");
      }
    }

    return warnings;
  }

  private getConfigSources(): string[] {
    const sources = ["defaults"];
    if (this.jsonFileValid) sources.push("json");
    if (ENV_CONFIG_MAPPING.some(({ env }) => Boolean(this.env[env]))) sources.push("environment");
    return sources;
  }

  private loadConfig(): ConfigTree {
    this.jsonTree = this.loadJsonConfig();
    return deepMerge(deepMerge(createDefaultConfig(), this.jsonTree), this.loadEnvConfig());
  }

  private loadJsonConfig(): ConfigTree {
    if (!existsSync(this.configFile)) {
      return {};
    }

    try {
      const parsed: unknown = JSON.parse(readFileSync(this.configFile, "utf8"));
      if (!isConfigTree(parsed)) {
        this.logWarning(`Ignoring ${this.configFile}: top level must be an object`, "config");
        return {};
      }
      this.jsonFileValid = true;
      return parsed;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logWarning(`Error parsing ${this.configFile}: ${message}`, "config");
      return {};
    }
  }

  private loadEnvConfig(): ConfigTree {
    const tree: ConfigTree = {};

    for (const { env, path, kind } of ENV_CONFIG_MAPPING) {
      const raw = this.env[env];
      if (!raw) continue;

      if (kind === "string") {
        setPath(tree, path, raw);
        continue;
      }

      const parsed = kind === "number" ? EnvironmentUtils.toNumber(raw) : EnvironmentUtils.toBoolean(raw);
      if (parsed === undefined) {
        this.logWarning(`Invalid ${env} value "${raw}", using default`, "config");
        continue;
      }
      setPath(tree, path, parsed);
    }

    return tree;
  }

  private mask(tree: ConfigTree): ConfigTree {
    const result: ConfigTree = {};

    for (const [key, value] of Object.entries(tree)) {
      const sensitive = SENSITIVE_KEY_FRAGMENTS.some(fragment => key.toLowerCase().includes(fragment));
      if (isConfigTree(value)) {
        result[key] = this.mask(value);
      } else if (sensitive && typeof value === "string" && value !== "") {
        result[key] = MASK;
      } else {
        result[key] = value;
      }
    }

    return result;
  }
}
