/**
 * Jest Test Setup
 *
 * Silences Nest and console output for the whole run.
 */

import { Logger } from "@nestjs/common";
import type { ConsoleOverride } from "./utils/test-logging.types";

const originalConsole: ConsoleOverride = {
  error: console.error,
  warn: console.warn,
  log: console.log,
  debug: console.debug,
};

const silent = (): void => undefined;

console.error = silent;
console.warn = silent;
console.log = silent;
console.debug = silent;

Logger.overrideLogger(false);

afterAll(() => {
  console.error = originalConsole.error;
  console.warn = originalConsole.warn;
  console.log = originalConsole.log;
  console.debug = originalConsole.debug;
});
