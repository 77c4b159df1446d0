/**
 * Unified index for logging-related type definitions.
 */

export * from "./logging.types";
