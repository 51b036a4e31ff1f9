/**
 * Place reviews repository
 *
 * Data access layer for place_reviews, keyed by UNIQUE(place_id, review_id).
 */

import type { PlaceReviewRow, ReviewPayload } from "@/types";
import { getDb } from "@/db";
import { nowIso } from "@/utils";

/**
 * Upsert one review; a re-seen review refreshes its content and last_seen_at,
 * first_seen_at never changes
 */
export function upsertPlaceReview(
  placeId: string,
  review: ReviewPayload,
  sourceTaskId: string,
): void {
  const db = getDb();
  const now = nowIso();

  db.prepare(
    `
    INSERT INTO place_reviews (
      place_id, review_id, review_url, profile_name, profile_url,
      profile_image_url, review_text, original_review_text, original_language,
      rating, reviews_count, photos_count, local_guide, time_ago,
      review_timestamp, owner_answer, original_owner_answer, owner_time_ago,
      owner_timestamp, source_task_id, raw_json, first_seen_at, last_seen_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(place_id, review_id) DO UPDATE SET
      review_url = COALESCE(excluded.review_url, place_reviews.review_url),
      profile_name = COALESCE(excluded.profile_name, place_reviews.profile_name),
      profile_url = COALESCE(excluded.profile_url, place_reviews.profile_url),
      profile_image_url = COALESCE(excluded.profile_image_url, place_reviews.profile_image_url),
      review_text = COALESCE(excluded.review_text, place_reviews.review_text),
      original_review_text = COALESCE(excluded.original_review_text, place_reviews.original_review_text),
      original_language = COALESCE(excluded.original_language, place_reviews.original_language),
      rating = COALESCE(excluded.rating, place_reviews.rating),
      reviews_count = COALESCE(excluded.reviews_count, place_reviews.reviews_count),
      photos_count = COALESCE(excluded.photos_count, place_reviews.photos_count),
      local_guide = COALESCE(excluded.local_guide, place_reviews.local_guide),
      time_ago = COALESCE(excluded.time_ago, place_reviews.time_ago),
      review_timestamp = COALESCE(excluded.review_timestamp, place_reviews.review_timestamp),
      owner_answer = COALESCE(excluded.owner_answer, place_reviews.owner_answer),
      original_owner_answer = COALESCE(excluded.original_owner_answer, place_reviews.original_owner_answer),
      owner_time_ago = COALESCE(excluded.owner_time_ago, place_reviews.owner_time_ago),
      owner_timestamp = COALESCE(excluded.owner_timestamp, place_reviews.owner_timestamp),
      source_task_id = excluded.source_task_id,
      raw_json = excluded.raw_json,
      last_seen_at = excluded.last_seen_at
  `,
  ).run(
    placeId,
    review.reviewId,
    review.reviewUrl,
    review.profileName,
    review.profileUrl,
    review.profileImageUrl,
    review.reviewText,
    review.originalReviewText,
    review.originalLanguage,
    review.rating,
    review.reviewsCount,
    review.photosCount,
    review.localGuide === null ? null : review.localGuide ? 1 : 0,
    review.timeAgo,
    review.reviewTimestamp,
    review.ownerAnswer,
    review.originalOwnerAnswer,
    review.ownerTimeAgo,
    review.ownerTimestamp,
    sourceTaskId,
    review.rawJson,
    now,
    now,
  );
}

export function listPlaceReviews(placeId: string): PlaceReviewRow[] {
  const db = getDb();
  return db
    .prepare("SELECT * FROM place_reviews WHERE place_id = ? ORDER BY id ASC")
    .all(placeId) as PlaceReviewRow[];
}
