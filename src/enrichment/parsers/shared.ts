/**
 * Helpers shared by the per-kind result parsers
 */

import type { FetchResult, JsonObject, JsonValue, KindSnapshot } from "@/types";
import { getArray, objectsOf } from "@/utils";

const PROVIDER_TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}:\d{2})(\.\d+)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * Normalize a provider timestamp ("2024-03-10 14:30:00 +00:00") to ISO UTC
 * Values without an offset are read as UTC. Unparseable values yield null.
 */
export function parseProviderTimestamp(value: string | null): string | null {
  if (!value) {
    return null;
  }

  const match = PROVIDER_TIMESTAMP_PATTERN.exec(value.trim());
  let date: Date;
  if (match) {
    const [, day, time, fraction = "", rawOffset] = match;
    let offset = "Z";
    if (rawOffset && rawOffset.toUpperCase() !== "Z") {
      offset = rawOffset.includes(":")
        ? rawOffset
        : `${rawOffset.slice(0, 3)}:${rawOffset.slice(3)}`;
    }
    date = new Date(`${day}T${time}${fraction}${offset}`);
  } else {
    date = new Date(value);
  }

  return isNaN(date.getTime()) ? null : date.toISOString();
}

export function truncateText(value: string | null, maxLength: number): string | null {
  if (!value) {
    return null;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  return trimmed.length <= maxLength ? trimmed : trimmed.substring(0, maxLength);
}

export function rawJson(value: JsonValue): string {
  return JSON.stringify(value);
}

/**
 * Object entries of result[]
 */
export function resultObjects(fetched: FetchResult): JsonObject[] {
  return objectsOf(fetched.results);
}

/**
 * Objects of result[].<key>[] across every result entry
 */
export function nestedItems(fetched: FetchResult, key: string): JsonObject[] {
  const items: JsonObject[] = [];
  for (const result of resultObjects(fetched)) {
    items.push(...objectsOf(getArray(result, key)));
  }
  return items;
}

export function toSnapshot<TItem>(fetched: FetchResult, items: TItem[]): KindSnapshot<TItem> {
  return {
    statusCode: fetched.statusCode,
    statusMessage: fetched.statusMessage,
    isCompleted: fetched.isCompleted,
    items,
  };
}

/**
 * Case-insensitive de-duplication keeping first spelling and order
 */
export function distinctIgnoreCase(values: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const key = value.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      result.push(value);
    }
  }
  return result;
}
