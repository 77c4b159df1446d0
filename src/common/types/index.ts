/**
 * Unified index for all type definitions.
 */

export * from "./cache";
export * from "./logging";
export * from "./services";
export * from "./sources";
