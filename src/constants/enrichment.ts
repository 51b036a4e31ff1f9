/**
 * Enrichment constants: status code ranges, defaults and limits
 */

import type { PolledTaskKind, SocialPlatform, TaskKind, TaskStatus } from "@/types";

/**
 * All job kinds, in submission order
 */
export const ALL_TASK_KINDS: readonly TaskKind[] = [
  "reviews",
  "my_business_info",
  "my_business_updates",
  "questions_and_answers",
  "social_profiles",
];

/**
 * Kinds tracked through the provider ready-lists
 */
export const POLLED_TASK_KINDS: readonly PolledTaskKind[] = [
  "reviews",
  "my_business_info",
  "my_business_updates",
  "questions_and_answers",
];

export const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = [
  "Populated",
  "CompletedNoData",
  "Error",
];

export const ACTIVE_TASK_STATUSES: readonly TaskStatus[] = [
  "Created",
  "Pending",
  "Ready",
];

/**
 * Provider status code ranges
 * [20000, 30000) = success, >= 40000 = terminal failure, anything else = processing
 */
export const STATUS_CODE_SUCCESS_MIN = 20000;
export const STATUS_CODE_SUCCESS_MAX_EXCLUSIVE = 30000;
export const STATUS_CODE_TERMINAL_FAILURE_MIN = 40000;

/**
 * Default staleness threshold per kind (hours)
 */
export const DEFAULT_REFRESH_HOURS = 24;

/**
 * Upper bound for configured refresh thresholds (one year)
 */
export const MAX_REFRESH_HOURS = 24 * 365;

export const MS_PER_HOUR = 60 * 60 * 1000;

/**
 * Maximum stored business description length
 */
export const BUSINESS_DESCRIPTION_MAX_LENGTH = 750;

/**
 * Maximum length of status/error messages persisted to the ledger
 */
export const LEDGER_MESSAGE_MAX_LENGTH = 500;

/**
 * Default and maximum page size of the latest-tasks listing
 */
export const LATEST_TASKS_DEFAULT_LIMIT = 200;
export const LATEST_TASKS_MAX_LIMIT = 2000;

/**
 * Review location_coordinate radius bounds (meters)
 */
export const REVIEWS_MIN_RADIUS_METERS = 200;
export const REVIEWS_DEFAULT_RADIUS_METERS = 5000;

/**
 * Length of the hex hash prefix used for downloaded asset file names
 */
export const ASSET_HASH_LENGTH = 16;

export const DEFAULT_ASSET_EXTENSION = ".jpg";

export const SOCIAL_PLATFORMS: readonly SocialPlatform[] = [
  "facebook",
  "instagram",
  "linkedin",
  "x",
  "youtube",
  "tiktok",
  "pinterest",
  "bluesky",
];

/**
 * Hostnames per social platform (a hostname matches itself and its subdomains)
 */
export const SOCIAL_PLATFORM_HOSTS: Record<SocialPlatform, readonly string[]> = {
  facebook: ["facebook.com", "fb.com", "fb.me"],
  instagram: ["instagram.com", "instagr.am"],
  linkedin: ["linkedin.com", "lnkd.in"],
  x: ["x.com", "twitter.com"],
  youtube: ["youtube.com", "youtu.be"],
  tiktok: ["tiktok.com"],
  pinterest: ["pinterest.com", "pinterest.co.uk", "pin.it"],
  bluesky: ["bsky.app"],
};
