/**
 * Business info result parser
 *
 * The snapshot is the first candidate with any value: result[].items (an
 * object or an array of objects), else the result entry itself.
 */

import type {
  BusinessInfoPayload,
  FetchResult,
  JsonObject,
  JsonValue,
  KindSnapshot,
} from "@/types";
import { BUSINESS_DESCRIPTION_MAX_LENGTH } from "@/constants";
import { getInt, getString, isJsonObject, objectsOf } from "@/utils";
import { distinctIgnoreCase, rawJson, resultObjects, toSnapshot, truncateText } from "./shared";

const LABEL_KEYS = ["title", "name", "topic", "keyword", "value"];

function labelOf(obj: JsonObject): string | null {
  for (const key of LABEL_KEYS) {
    const value = getString(obj, key);
    if (value) {
      return value;
    }
  }
  return null;
}

/**
 * Read a string list given as an array (of strings or labelled objects),
 * an object (a topic -> count map for place_topics, else one labelled object)
 * or a single string
 */
export function extractStringList(obj: JsonObject, key: string): string[] {
  const node: JsonValue | undefined = obj[key];
  const values: string[] = [];

  if (Array.isArray(node)) {
    for (const entry of node) {
      const parsed =
        typeof entry === "string" ? entry : isJsonObject(entry) ? labelOf(entry) : null;
      if (parsed && parsed.trim()) {
        values.push(parsed.trim());
      }
    }
  } else if (isJsonObject(node)) {
    if (key === "place_topics") {
      for (const name of Object.keys(node)) {
        if (name.trim()) {
          values.push(name.trim());
        }
      }
    } else {
      const parsed = labelOf(node);
      if (parsed) {
        values.push(parsed);
      }
    }
  } else if (typeof node === "string" && node.trim()) {
    values.push(node.trim());
  }

  return distinctIgnoreCase(values);
}

function businessInfoCandidates(result: JsonObject): JsonObject[] {
  const items = result["items"];
  if (isJsonObject(items)) {
    return [items];
  }
  if (Array.isArray(items)) {
    return objectsOf(items);
  }
  return [result];
}

export function parseBusinessInfoItem(item: JsonObject): BusinessInfoPayload {
  const description = getString(item, "description") ?? getString(item, "about");

  return {
    description: truncateText(description, BUSINESS_DESCRIPTION_MAX_LENGTH),
    photoCount: getInt(item, "total_photos"),
    additionalCategories: extractStringList(item, "additional_categories"),
    placeTopics: extractStringList(item, "place_topics"),
    logoUrl: getString(item, "logo"),
    mainPhotoUrl: getString(item, "main_image"),
    rawJson: rawJson(item),
  };
}

export function hasBusinessInfoValues(payload: BusinessInfoPayload): boolean {
  return (
    payload.description !== null ||
    payload.photoCount !== null ||
    payload.additionalCategories.length > 0 ||
    payload.placeTopics.length > 0 ||
    payload.logoUrl !== null ||
    payload.mainPhotoUrl !== null
  );
}

/**
 * Zero or one snapshot
 */
export function parseBusinessInfo(fetched: FetchResult): KindSnapshot<BusinessInfoPayload> {
  for (const result of resultObjects(fetched)) {
    for (const candidate of businessInfoCandidates(result)) {
      const payload = parseBusinessInfoItem(candidate);
      if (hasBusinessInfoValues(payload)) {
        return toSnapshot(fetched, [payload]);
      }
    }
  }
  return toSnapshot(fetched, []);
}
