/**
 * Place updates (business posts) repository
 *
 * Keyed by UNIQUE(place_id, update_key); update_key is a content hash.
 */

import type { PlaceUpdateRow, UpdatePayload } from "@/types";
import { getDb } from "@/db";
import { nowIso } from "@/utils";

export function upsertPlaceUpdate(
  placeId: string,
  update: UpdatePayload,
  sourceTaskId: string,
): void {
  const db = getDb();
  const now = nowIso();

  db.prepare(
    `
    INSERT INTO place_updates (
      place_id, update_key, post_text, url, image_urls_json, post_date,
      links_json, source_task_id, raw_json, first_seen_at, last_seen_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(place_id, update_key) DO UPDATE SET
      image_urls_json = excluded.image_urls_json,
      links_json = excluded.links_json,
      source_task_id = excluded.source_task_id,
      raw_json = excluded.raw_json,
      last_seen_at = excluded.last_seen_at
  `,
  ).run(
    placeId,
    update.updateKey,
    update.postText,
    update.url,
    JSON.stringify(update.imageUrls),
    update.postDate,
    JSON.stringify(update.links),
    sourceTaskId,
    update.rawJson,
    now,
    now,
  );
}

export function listPlaceUpdates(placeId: string): PlaceUpdateRow[] {
  const db = getDb();
  return db
    .prepare("SELECT * FROM place_updates WHERE place_id = ? ORDER BY id ASC")
    .all(placeId) as PlaceUpdateRow[];
}
