/**
 * Environment Constants - Centralized Environment Variable Management
 */

import { EnvironmentUtils } from "@/common/utils/environment.utils";
import { resolveLogLevel } from "@/common/logging/filtered-logger";

// Environment Helpers
export const ENV_HELPERS = {
  isTest: (): boolean => ENV.APPLICATION.NODE_ENV === "test",
  isDevelopment: (): boolean => ENV.APPLICATION.NODE_ENV === "development",
  isProduction: (): boolean => ENV.APPLICATION.NODE_ENV === "production",
};

export const ENV = {
  // Application Settings
  APPLICATION: {
    NODE_ENV: EnvironmentUtils.parseString("NODE_ENV", "production"),
    PORT: EnvironmentUtils.parseInt("APP_PORT", 3101, {
      min: 1,
      max: 65535,
      fieldName: "APP_PORT",
    }),
    BASE_PATH: EnvironmentUtils.parseString("APP_BASE_PATH", ""),
    CORS_MAX_AGE: EnvironmentUtils.parseInt("APP_CORS_MAX_AGE", 3600, { min: 300, max: 86400 }),
  },

  // Logging Configuration
  LOGGING: {
    LOG_LEVEL: resolveLogLevel(process.env.LOG_LEVEL),
  },

  // Timeouts
  TIMEOUTS: {
    // Application lifecycle
    GRACEFUL_SHUTDOWN_MS: EnvironmentUtils.parseInt("GRACEFUL_SHUTDOWN_TIMEOUT_MS", 10000, { min: 1000, max: 300000 }),

    // Every outbound call to a data source
    HTTP_MS: EnvironmentUtils.parseInt("HTTP_TIMEOUT_MS", 10000, { min: 1000, max: 60000 }),
  },

  // Outbound HTTP behaviour
  HTTP: {
    RATE_LIMIT_MAX_RETRIES: EnvironmentUtils.parseInt("HTTP_RATE_LIMIT_MAX_RETRIES", 2, { min: 0, max: 5 }),
    RATE_LIMIT_BASE_DELAY_MS: EnvironmentUtils.parseInt("HTTP_RATE_LIMIT_BASE_DELAY_MS", 2000, {
      min: 100,
      max: 30000,
    }),
  },

  // Background refresh loop
  SCHEDULER: {
    ENABLED: EnvironmentUtils.parseBoolean("SCHEDULER_ENABLED", true),
    CHECK_INTERVAL_MS: EnvironmentUtils.parseInt("SCHEDULER_CHECK_INTERVAL_MS", 30000, { min: 100, max: 600000 }),
    ERROR_BACKOFF_MS: EnvironmentUtils.parseInt("SCHEDULER_ERROR_BACKOFF_MS", 60000, { min: 100, max: 3600000 }),
    SHUTDOWN_TIMEOUT_MS: EnvironmentUtils.parseInt("SCHEDULER_SHUTDOWN_TIMEOUT_MS", 2000, { min: 100, max: 60000 }),
  },

  // Optional JSON configuration file
  CONFIG_FILE: EnvironmentUtils.parseString("DASHBOARD_CONFIG_FILE", "config.json"),
  ENV_FILE: EnvironmentUtils.parseString("DASHBOARD_ENV_FILE", ".env"),
};
