/**
 * Environment for every test file. Runs before any module reads process.env.
 */

process.env.NODE_ENV = "test";
process.env.SCHEDULER_ENABLED = "false";
process.env.DASHBOARD_CONFIG_FILE = "/nonexistent/dashboard-config.json";
process.env.DASHBOARD_ENV_FILE = "/nonexistent/.env";

// Sources read credentials through ConfigService; keep the developer's shell out of tests
for (const key of [
  "WEATHER_API_KEY",
  "WEATHER_MOCK_MODE",
  "GOOGLE_CALENDAR_ACCESS_TOKEN",
  "API_UPDATE_INTERVAL",
  "LOG_LEVEL",
]) {
  delete process.env[key];
}
