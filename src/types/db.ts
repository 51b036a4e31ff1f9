/**
 * Database type definitions
 *
 * Row shapes for places and the per-kind enrichment result tables.
 * Aligned with schema in migrations/0001_init.sql
 */

/**
 * Place entity (owned by the ingestion pipeline)
 *
 * Enrichment only writes the description/photo/category/asset/social slice.
 */
export type PlaceRow = {
  place_id: string;
  display_name: string | null;
  location_name: string | null;
  lat: number | null;
  lng: number | null;
  review_count: number | null;
  description: string | null;
  photo_count: number | null;
  other_categories_json: string | null;
  place_topics_json: string | null;
  logo_url: string | null;
  logo_local_path: string | null;
  main_photo_url: string | null;
  main_photo_local_path: string | null;
  facebook_url: string | null;
  instagram_url: string | null;
  linkedin_url: string | null;
  x_url: string | null;
  youtube_url: string | null;
  tiktok_url: string | null;
  pinterest_url: string | null;
  bluesky_url: string | null;
  created_at: string;
  last_seen_at: string;
};

/**
 * Input for upsertPlace (ingestion pipeline side)
 */
export type PlaceInput = {
  place_id: string;
  display_name?: string | null;
  location_name?: string | null;
  lat?: number | null;
  lng?: number | null;
  review_count?: number | null;
};

/**
 * Business-info slice written by the materializer (null = keep existing)
 */
export type PlaceBusinessInfoUpdate = {
  description: string | null;
  photo_count: number | null;
  other_categories_json: string | null;
  place_topics_json: string | null;
  logo_url: string | null;
  logo_local_path: string | null;
  main_photo_url: string | null;
  main_photo_local_path: string | null;
};

export type PlaceReviewRow = {
  id: number;
  place_id: string;
  review_id: string;
  review_url: string | null;
  profile_name: string | null;
  profile_url: string | null;
  profile_image_url: string | null;
  review_text: string | null;
  original_review_text: string | null;
  original_language: string | null;
  rating: number | null;
  reviews_count: number | null;
  photos_count: number | null;
  /** 0/1 (SQLite has no boolean) */
  local_guide: number | null;
  time_ago: string | null;
  review_timestamp: string | null;
  owner_answer: string | null;
  original_owner_answer: string | null;
  owner_time_ago: string | null;
  owner_timestamp: string | null;
  source_task_id: string | null;
  raw_json: string | null;
  first_seen_at: string;
  last_seen_at: string;
};

export type PlaceUpdateRow = {
  id: number;
  place_id: string;
  update_key: string;
  post_text: string | null;
  url: string | null;
  image_urls_json: string;
  post_date: string | null;
  links_json: string;
  source_task_id: string | null;
  raw_json: string | null;
  first_seen_at: string;
  last_seen_at: string;
};

export type PlaceQuestionAnswerRow = {
  id: number;
  place_id: string;
  qa_key: string;
  question_text: string | null;
  question_timestamp: string | null;
  question_profile_name: string | null;
  answer_text: string | null;
  answer_timestamp: string | null;
  answer_profile_name: string | null;
  source_task_id: string | null;
  raw_json: string | null;
  first_seen_at: string;
  last_seen_at: string;
};
