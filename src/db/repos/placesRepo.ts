/**
 * Places repository
 *
 * Data access layer for the places table. The ingestion pipeline owns the
 * row; enrichment only writes the business-info and social slice.
 */

import type {
  PlaceBusinessInfoUpdate,
  PlaceInput,
  PlaceRow,
  SocialProfileSet,
} from "@/types";
import { getDb } from "@/db";
import { nowIso } from "@/utils";

/**
 * Upsert a place by place_id (ingestion side)
 * Provided identity/location fields overwrite; nulls keep existing values.
 */
export function upsertPlace(input: PlaceInput): void {
  const db = getDb();
  const now = nowIso();

  db.prepare(
    `
    INSERT INTO places (
      place_id, display_name, location_name, lat, lng, review_count,
      created_at, last_seen_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(place_id) DO UPDATE SET
      display_name = COALESCE(excluded.display_name, places.display_name),
      location_name = COALESCE(excluded.location_name, places.location_name),
      lat = COALESCE(excluded.lat, places.lat),
      lng = COALESCE(excluded.lng, places.lng),
      review_count = COALESCE(excluded.review_count, places.review_count),
      last_seen_at = excluded.last_seen_at
  `,
  ).run(
    input.place_id,
    input.display_name ?? null,
    input.location_name ?? null,
    input.lat ?? null,
    input.lng ?? null,
    input.review_count ?? null,
    now,
    now,
  );
}

export function getPlaceById(placeId: string): PlaceRow | null {
  const db = getDb();
  const row = db
    .prepare("SELECT * FROM places WHERE place_id = ?")
    .get(placeId) as PlaceRow | undefined;

  return row ?? null;
}

/**
 * Places ordered by place_id (operator scripts)
 */
export function listPlaces(limit?: number): PlaceRow[] {
  const db = getDb();
  if (limit !== undefined) {
    return db
      .prepare("SELECT * FROM places ORDER BY place_id ASC LIMIT ?")
      .all(limit) as PlaceRow[];
  }
  return db.prepare("SELECT * FROM places ORDER BY place_id ASC").all() as PlaceRow[];
}

/**
 * Write the business-info slice (null fields keep the stored value)
 *
 * @returns true when the place exists
 */
export function updatePlaceBusinessInfo(
  placeId: string,
  update: PlaceBusinessInfoUpdate,
): boolean {
  const db = getDb();

  const result = db
    .prepare(
      `
      UPDATE places SET
        description = COALESCE(?, description),
        photo_count = COALESCE(?, photo_count),
        other_categories_json = COALESCE(?, other_categories_json),
        place_topics_json = COALESCE(?, place_topics_json),
        logo_url = COALESCE(?, logo_url),
        logo_local_path = COALESCE(?, logo_local_path),
        main_photo_url = COALESCE(?, main_photo_url),
        main_photo_local_path = COALESCE(?, main_photo_local_path)
      WHERE place_id = ?
    `,
    )
    .run(
      update.description,
      update.photo_count,
      update.other_categories_json,
      update.place_topics_json,
      update.logo_url,
      update.logo_local_path,
      update.main_photo_url,
      update.main_photo_local_path,
      placeId,
    );

  return result.changes > 0;
}

/**
 * Fill social URL columns that are still empty (known URLs are never replaced)
 *
 * @returns Number of platforms newly stored
 */
export function mergePlaceSocialProfiles(
  placeId: string,
  profiles: SocialProfileSet,
): number {
  const db = getDb();
  const before = getPlaceById(placeId);
  if (!before) {
    return 0;
  }

  db.prepare(
    `
    UPDATE places SET
      facebook_url = COALESCE(facebook_url, ?),
      instagram_url = COALESCE(instagram_url, ?),
      linkedin_url = COALESCE(linkedin_url, ?),
      x_url = COALESCE(x_url, ?),
      youtube_url = COALESCE(youtube_url, ?),
      tiktok_url = COALESCE(tiktok_url, ?),
      pinterest_url = COALESCE(pinterest_url, ?),
      bluesky_url = COALESCE(bluesky_url, ?)
    WHERE place_id = ?
  `,
  ).run(
    profiles.facebook ?? null,
    profiles.instagram ?? null,
    profiles.linkedin ?? null,
    profiles.x ?? null,
    profiles.youtube ?? null,
    profiles.tiktok ?? null,
    profiles.pinterest ?? null,
    profiles.bluesky ?? null,
    placeId,
  );

  let added = 0;
  if (profiles.facebook && !before.facebook_url) added++;
  if (profiles.instagram && !before.instagram_url) added++;
  if (profiles.linkedin && !before.linkedin_url) added++;
  if (profiles.x && !before.x_url) added++;
  if (profiles.youtube && !before.youtube_url) added++;
  if (profiles.tiktok && !before.tiktok_url) added++;
  if (profiles.pinterest && !before.pinterest_url) added++;
  if (profiles.bluesky && !before.bluesky_url) added++;
  return added;
}
