/**
 * Reviews result parser
 *
 * Candidates come from result[].items[] and result[].reviews[]; items
 * without review_id are skipped, duplicates collapse onto the last one seen.
 */

import type { FetchResult, JsonObject, KindSnapshot, ReviewPayload } from "@/types";
import {
  getArray,
  getBool,
  getInt,
  getNumber,
  getObject,
  getString,
  objectsOf,
} from "@/utils";
import { parseProviderTimestamp, rawJson, resultObjects, toSnapshot } from "./shared";

export function parseReviewItem(item: JsonObject): ReviewPayload | null {
  const reviewId = getString(item, "review_id");
  if (!reviewId) {
    return null;
  }

  const rating = getObject(item, "rating");

  return {
    reviewId,
    reviewUrl: getString(item, "review_url"),
    profileName: getString(item, "profile_name"),
    profileUrl: getString(item, "profile_url"),
    profileImageUrl: getString(item, "profile_image_url"),
    reviewText: getString(item, "review_text"),
    originalReviewText: getString(item, "original_review_text"),
    originalLanguage: getString(item, "original_language"),
    rating: rating ? getNumber(rating, "value") : null,
    reviewsCount: getInt(item, "reviews_count"),
    photosCount: getInt(item, "photos_count"),
    localGuide: getBool(item, "local_guide"),
    timeAgo: getString(item, "time_ago"),
    reviewTimestamp: parseProviderTimestamp(getString(item, "timestamp")),
    ownerAnswer: getString(item, "owner_answer"),
    originalOwnerAnswer: getString(item, "original_owner_answer"),
    ownerTimeAgo: getString(item, "owner_time_ago"),
    ownerTimestamp: parseProviderTimestamp(getString(item, "owner_timestamp")),
    rawJson: rawJson(item),
  };
}

export function parseReviews(fetched: FetchResult): KindSnapshot<ReviewPayload> {
  const byId = new Map<string, ReviewPayload>();

  for (const result of resultObjects(fetched)) {
    const candidates = [
      ...objectsOf(getArray(result, "items")),
      ...objectsOf(getArray(result, "reviews")),
    ];
    for (const candidate of candidates) {
      const review = parseReviewItem(candidate);
      if (review) {
        byId.set(review.reviewId, review);
      }
    }
  }

  return toSnapshot(fetched, [...byId.values()]);
}
