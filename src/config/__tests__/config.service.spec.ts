import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ConfigService } from "../config.service";

describe("ConfigService", () => {
  let dir: string;
  let configFile: string;
  let envFile: string;

  const createService = (env: Record<string, string | undefined> = {}) =>
    new ConfigService({ configFile, envFile, env });

  const writeJson = (content: unknown) => {
    writeFileSync(configFile, typeof content === "string" ? content : JSON.stringify(content));
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "dashboard-config-"));
    configFile = join(dir, "config.json");
    envFile = join(dir, ".env");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("loading", () => {
    it("should use the built-in defaults when nothing else is present", () => {
      const service = createService();

      expect(service.getString("weather.city")).toBe("London,UK");
      expect(service.getNumber("app.api_update_interval", 0)).toBe(300);
      expect(service.getBoolean("weather.mock_fallback")).toBe(true);
      expect(service.getConfigStatus()).toEqual({
        sources: ["defaults"],
        envFileExists: false,
        jsonFileExists: false,
        jsonFileValid: false,
        weatherApiConfigured: false,
        weatherMockMode: true,
        googleCalendarConfigured: false,
        debugMode: false,
      });
    });

    it("should merge the JSON file over defaults and the environment over both", () => {
      writeJson({ weather: { city: "Paris,FR", units: "imperial" }, app: { debug_mode: true } });
      writeFileSync(envFile, "WEATHER_CITY=Oslo,NO\n");

      const service = createService({ WEATHER_CITY: "Oslo,NO" });

      expect(service.getString("weather.city")).toBe("Oslo,NO");
      expect(service.getString("weather.units")).toBe("imperial");
      expect(service.getNumber("weather.refresh_interval", 0)).toBe(600);
      expect(service.getBoolean("app.debug_mode")).toBe(true);
      expect(service.getConfigStatus()).toMatchObject({
        sources: ["defaults", "json", "environment"],
        envFileExists: true,
        jsonFileExists: true,
        jsonFileValid: true,
        debugMode: true,
      });
    });

    it("should convert typed environment variables and skip invalid ones", () => {
      const service = createService({
        API_UPDATE_INTERVAL: "120",
        WEATHER_MOCK_MODE: "yes",
        BITCOIN_REFRESH_INTERVAL: "soon",
      });

      expect(service.get("app.api_update_interval")).toBe(120);
      expect(service.get("weather.mock_mode")).toBe(true);
      expect(service.get("bitcoin.refresh_interval")).toBe(300);
    });

    it("should ignore a config file that is not valid JSON", () => {
      writeJson("{ weather: ");

      const service = createService();

      expect(service.getString("weather.city")).toBe("London,UK");
      expect(service.getConfigStatus()).toMatchObject({ jsonFileExists: true, jsonFileValid: false });
    });

    it("should ignore a config file whose top level is not an object", () => {
      writeJson(["weather"]);

      const service = createService();

      expect(service.getConfigStatus().jsonFileValid).toBe(false);
      expect(service.getConfigStatus().sources).toEqual(["defaults"]);
    });
  });

  describe("reading values", () => {
    it("should resolve dotted paths and return undefined for missing segments", () => {
      const service = createService();

      expect(service.get("google_calendar.calendar_id")).toBe("primary");
      expect(service.get("google_calendar.missing")).toBeUndefined();
      expect(service.get("weather.city.name")).toBeUndefined();
    });

    it("should not resolve inherited object members", () => {
      const service = createService();

      expect(service.get("app.constructor")).toBeUndefined();
      expect(service.get("weather.toString")).toBeUndefined();
      expect(service.getString("app.hasOwnProperty", "none")).toBe("none");
    });

    it("should coerce values to the requested type", () => {
      writeJson({ extra: { count: "42", flag: "off", label: 7 } });
      const service = createService();

      expect(service.getNumber("extra.count", 0)).toBe(42);
      expect(service.getBoolean("extra.flag", true)).toBe(false);
      expect(service.getString("extra.label")).toBe("7");
      expect(service.getNumber("extra.flag", 5)).toBe(5);
      expect(service.getString("extra.missing", "fallback")).toBe("fallback");
    });

    it("should return a copy of a section", () => {
      const service = createService();

      const section = service.getSection("app");
      section.debug_mode = true;

      expect(service.getBoolean("app.debug_mode")).toBe(false);
      expect(service.getSection("nothing")).toEqual({});
    });

    it("should apply in-memory overrides, creating missing sections", () => {
      const service = createService();

      service.set("weather.city", "Lisbon,PT");
      service.set("display.theme.accent", "amber");

      expect(service.getString("weather.city")).toBe("Lisbon,PT");
      expect(service.getSection("display")).toEqual({ theme: { accent: "amber" } });
    });

    it("should mask credentials in a section", () => {
      const service = createService({ WEATHER_API_KEY: "test-secret" });

      expect(service.getMaskedSection("weather")).toMatchObject({ api_key: "********", city: "London,UK" });
      expect(service.getMaskedSection("google_calendar")).toMatchObject({ access_token: "" });
    });
  });

  describe("credentials", () => {
    it("should treat the placeholder weather key as missing", () => {
      expect(createService({ WEATHER_API_KEY: "YOUR_OPENWEATHERMAP_API_KEY_HERE" }).hasWeatherApiKey()).toBe(false);
      expect(createService({ WEATHER_API_KEY: "test-secret" }).hasWeatherApiKey()).toBe(true);
    });

    it("should detect a calendar access token", () => {
      expect(createService({ GOOGLE_CALENDAR_ACCESS_TOKEN: "  " }).hasCalendarAccessToken()).toBe(false);
      expect(createService({ GOOGLE_CALENDAR_ACCESS_TOKEN: "test-token" }).hasCalendarAccessToken()).toBe(true);
    });
  });

  describe("validateConfiguration", () => {
    it("should warn about missing credentials", () => {
      expect(createService().validateConfiguration()).toEqual([
        "Weather API key not configured. Weather screen will show mock data.",
        "Google Calendar access token not configured. Calendar events are unavailable.",
      ]);
    });

    it("should warn about units, short intervals and keys kept in the JSON file", () => {
      writeJson({ weather: { api_key: "test-secret", units: "kelvin" } });

      const service = createService({ GOOGLE_CALENDAR_ACCESS_TOKEN: "test-token", API_UPDATE_INTERVAL: "30" });

      expect(service.validateConfiguration()).toEqual([
        'Unknown weather units "kelvin", expected one of metric, imperial, standard.',
        "API update interval of 30s is below 60s and may exceed upstream rate limits.",
        "API key found in the JSON config file. Consider moving it to the environment.",
      ]);
    });

    it("should return no warnings for a complete configuration", () => {
      const service = createService({ WEATHER_API_KEY: "test-secret", GOOGLE_CALENDAR_ACCESS_TOKEN: "test-token" });

      expect(service.validateConfiguration()).toEqual([]);
    });
  });
});
