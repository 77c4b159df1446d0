/**
 * Cache type definitions
 */

export * from "./cache.types";
