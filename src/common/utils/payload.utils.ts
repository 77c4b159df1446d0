import { MalformedResponseError } from "@/common/errors";

/**
 * Narrowing helpers for untyped JSON bodies. Each throws MalformedResponseError when
 * the shape does not match, so callers read fields without casts.
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function expectRecord(value: unknown, context: string): JsonRecord {
  if (!isRecord(value)) {
    throw new MalformedResponseError(`${context}: expected an object`);
  }
  return value;
}

export function readRecord(source: JsonRecord, field: string, context: string): JsonRecord {
  return expectRecord(source[field], `${context}.${field}`);
}

export function readNumber(source: JsonRecord, field: string, context: string): number {
  const value = source[field];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new MalformedResponseError(`${context}: field "${field}" is not a number`);
  }
  return value;
}

export function readOptionalNumber(source: JsonRecord, field: string, fallback = 0): number {
  const value = source[field];
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

export function readString(source: JsonRecord, field: string, context: string): string {
  const value = source[field];
  if (typeof value !== "string") {
    throw new MalformedResponseError(`${context}: field "${field}" is not a string`);
  }
  return value;
}

export function readOptionalString(source: JsonRecord, field: string, fallback = ""): string {
  const value = source[field];
  return typeof value === "string" ? value : fallback;
}

export function readArray(source: JsonRecord, field: string, context: string): unknown[] {
  return expectArray(source[field], `${context}.${field}`);
}

export function expectArray(value: unknown, context: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new MalformedResponseError(`${context}: expected an array`);
  }
  return value;
}
