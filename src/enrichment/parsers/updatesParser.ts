/**
 * Business updates (posts) result parser
 *
 * Posts come from result[].items[]. Identity is a hash of text, date and url.
 */

import type { FetchResult, JsonObject, KindSnapshot, UpdateLink, UpdatePayload } from "@/types";
import { getArray, getString, isJsonObject, objectsOf } from "@/utils";
import { computeUpdateKey } from "../identity/itemKeys";
import { nestedItems, parseProviderTimestamp, rawJson, toSnapshot } from "./shared";

function extractImageUrls(item: JsonObject): string[] {
  const urls: string[] = [];
  for (const key of ["images_url", "image_url", "images"]) {
    const node = item[key];
    if (typeof node === "string" && node.trim()) {
      urls.push(node.trim());
    } else if (Array.isArray(node)) {
      for (const entry of node) {
        if (typeof entry === "string" && entry.trim()) {
          urls.push(entry.trim());
        } else if (isJsonObject(entry)) {
          const url = getString(entry, "url");
          if (url) {
            urls.push(url);
          }
        }
      }
    }
  }
  return [...new Set(urls)];
}

function extractLinks(item: JsonObject): UpdateLink[] {
  return objectsOf(getArray(item, "links"))
    .map((link) => ({
      type: getString(link, "type"),
      title: getString(link, "title"),
      url: getString(link, "url"),
    }))
    .filter((link) => link.url !== null || link.title !== null);
}

export function parseUpdateItem(item: JsonObject): UpdatePayload | null {
  const postText = getString(item, "post_text") ?? getString(item, "snippet");
  const url = getString(item, "url") ?? getString(item, "post_url");
  const rawDate = getString(item, "post_date") ?? getString(item, "timestamp");
  const postDate = parseProviderTimestamp(rawDate) ?? rawDate;

  if (!postText && !url && !postDate) {
    return null;
  }

  return {
    updateKey: computeUpdateKey({ postText, postDate, url }),
    postText,
    url,
    imageUrls: extractImageUrls(item),
    postDate,
    links: extractLinks(item),
    rawJson: rawJson(item),
  };
}

export function parseUpdates(fetched: FetchResult): KindSnapshot<UpdatePayload> {
  const byKey = new Map<string, UpdatePayload>();
  for (const item of nestedItems(fetched, "items")) {
    const update = parseUpdateItem(item);
    if (update) {
      byKey.set(update.updateKey, update);
    }
  }
  return toSnapshot(fetched, [...byKey.values()]);
}
