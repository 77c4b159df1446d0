import type { LogLevel as NestLogLevel } from "@nestjs/common";

/**
 * Use NestJS LogLevel type for consistency with framework
 * Valid values: "error" | "warn" | "log" | "debug" | "verbose" | "fatal"
 */
export type LogLevel = NestLogLevel;

/**
 * Log level hierarchy for filtering
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  log: 3,
  debug: 4,
  verbose: 5,
};

export const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "log", "debug", "verbose"];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Check if a message should be logged based on current log level
 */
export function shouldLog(messageLevel: LogLevel, currentLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[messageLevel] <= LOG_LEVEL_PRIORITY[currentLevel];
}

/**
 * Every level up to and including the given one, in the order Nest expects
 */
export function enabledLogLevels(currentLevel: LogLevel): LogLevel[] {
  return LOG_LEVELS.filter(level => shouldLog(level, currentLevel));
}
