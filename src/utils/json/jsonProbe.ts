/**
 * Typed probes over untyped provider JSON
 *
 * Readers never throw: a missing key or a value of the wrong type yields null.
 */

import type { JsonObject, JsonValue } from "@/types";

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse JSON text; null for empty or invalid input
 */
export function parseJsonText(text: string | null | undefined): JsonValue | null {
  if (!text || !text.trim()) {
    return null;
  }
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch {
    return null;
  }
}

/**
 * Non-empty trimmed string (numbers are stringified)
 */
export function getString(obj: JsonObject, key: string): string | null {
  const value = obj[key];
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

/**
 * Finite number (numeric strings accepted)
 */
export function getNumber(obj: JsonObject, key: string): number | null {
  const value = obj[key];
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function getInt(obj: JsonObject, key: string): number | null {
  const value = getNumber(obj, key);
  return value === null ? null : Math.trunc(value);
}

export function getBool(obj: JsonObject, key: string): boolean | null {
  const value = obj[key];
  if (typeof value === "boolean") {
    return value;
  }
  if (value === "true") return true;
  if (value === "false") return false;
  return null;
}

export function getArray(obj: JsonObject, key: string): JsonValue[] | null {
  const value = obj[key];
  return Array.isArray(value) ? value : null;
}

export function getObject(obj: JsonObject, key: string): JsonObject | null {
  const value = obj[key];
  return isJsonObject(value) ? value : null;
}

/**
 * Object elements of an array (other elements dropped)
 */
export function objectsOf(values: JsonValue[] | null): JsonObject[] {
  if (!values) {
    return [];
  }
  return values.filter(isJsonObject);
}
