/**
 * Submission payload builders
 *
 * One task_post / live item per kind for a place. BusinessInfo submissions
 * retry with the keyword and keyword+location_name shapes when the provider
 * rejects the place_id shape with an Invalid Field error.
 */

import type {
  DataForSeoSettings,
  PlaceEnrichmentTarget,
  SubmitResult,
  TaskPostItem,
} from "@/types";
import type { EnrichmentGateway } from "@/interfaces";
import {
  DATAFORSEO_BUSINESS_INFO_PRIORITY,
  DATAFORSEO_STATUS_INVALID_FIELD,
  REVIEWS_DEFAULT_RADIUS_METERS,
  REVIEWS_MIN_RADIUS_METERS,
} from "@/constants";
import { throwIfAborted } from "@/utils";
import * as logger from "@/logger";

export type SubmissionSettings = Pick<
  DataForSeoSettings,
  "postbackUrl" | "languageCode" | "reviewsDepth" | "updatesDepth" | "questionsDepth"
>;

function placeKeyword(placeId: string): string {
  return `place_id:${placeId}`;
}

function trimmedLocation(target: PlaceEnrichmentTarget): string | null {
  const value = target.locationName?.trim();
  return value ? value : null;
}

/**
 * Fields shared by every item: language, postback and the place tag
 */
function withCommonFields(
  item: TaskPostItem,
  target: PlaceEnrichmentTarget,
  settings: SubmissionSettings,
): TaskPostItem {
  const result: TaskPostItem = { ...item };
  if (settings.languageCode.trim()) {
    result.language_code = settings.languageCode.trim();
  }
  if (settings.postbackUrl.trim()) {
    result.postback_url = settings.postbackUrl.trim();
  }
  result.tag = target.placeId;
  return result;
}

/**
 * location_name when known, else "lat,lng,radius" when coordinates are known
 */
function locationFields(target: PlaceEnrichmentTarget): TaskPostItem {
  const locationName = trimmedLocation(target);
  if (locationName) {
    return { location_name: locationName };
  }

  if (typeof target.lat === "number" && typeof target.lng === "number") {
    const radius = Math.max(
      REVIEWS_MIN_RADIUS_METERS,
      target.radiusMeters ?? REVIEWS_DEFAULT_RADIUS_METERS,
    );
    return {
      location_coordinate: `${target.lat.toFixed(6)},${target.lng.toFixed(6)},${radius}`,
    };
  }

  return {};
}

/**
 * Reviews item; depth is the known review count when present
 *
 * @example
 * buildReviewsItem({ placeId: "P1", lat: 51.5, lng: -0.12 }, settings)
 * // => { keyword: "place_id:P1", depth: 100, location_coordinate: "51.500000,-0.120000,5000", ... }
 */
export function buildReviewsItem(
  target: PlaceEnrichmentTarget,
  settings: SubmissionSettings,
): TaskPostItem {
  const depth = Math.max(1, target.reviewCount ?? settings.reviewsDepth);
  return withCommonFields(
    {
      keyword: placeKeyword(target.placeId),
      depth,
      ...locationFields(target),
    },
    target,
    settings,
  );
}

export function buildUpdatesItem(
  target: PlaceEnrichmentTarget,
  settings: SubmissionSettings,
): TaskPostItem {
  return withCommonFields(
    {
      keyword: placeKeyword(target.placeId),
      depth: settings.updatesDepth,
      ...locationFields(target),
    },
    target,
    settings,
  );
}

export function buildQuestionsAndAnswersItem(
  target: PlaceEnrichmentTarget,
  settings: SubmissionSettings,
): TaskPostItem {
  return withCommonFields(
    {
      keyword: placeKeyword(target.placeId),
      depth: settings.questionsDepth,
      ...locationFields(target),
    },
    target,
    settings,
  );
}

/**
 * Live business profile lookup used for social profile links
 */
export function buildSocialProfilesItem(
  target: PlaceEnrichmentTarget,
  settings: SubmissionSettings,
): TaskPostItem {
  const locationName = trimmedLocation(target);
  return withCommonFields(
    {
      keyword: placeKeyword(target.placeId),
      ...(locationName ? { location_name: locationName } : {}),
    },
    target,
    settings,
  );
}

export type BusinessInfoPayloadMode = "place_id" | "keyword" | "keyword+location_name";

export function buildBusinessInfoItem(
  target: PlaceEnrichmentTarget,
  settings: SubmissionSettings,
  mode: BusinessInfoPayloadMode,
): TaskPostItem {
  const item: TaskPostItem =
    mode === "place_id"
      ? { place_id: target.placeId }
      : { keyword: placeKeyword(target.placeId) };

  const locationName = trimmedLocation(target);
  if (mode === "keyword+location_name" && locationName) {
    item.location_name = locationName;
  }
  item.priority = DATAFORSEO_BUSINESS_INFO_PRIORITY;

  return withCommonFields(item, target, settings);
}

function isInvalidFieldMentioning(result: SubmitResult, field: string): boolean {
  return (
    result.statusCode === DATAFORSEO_STATUS_INVALID_FIELD &&
    (result.statusMessage ?? "").toLowerCase().includes(field)
  );
}

/**
 * Submit a BusinessInfo job, falling back through the alternative payload shapes
 *
 * @returns The last provider response
 */
export async function submitBusinessInfo(
  gateway: EnrichmentGateway,
  target: PlaceEnrichmentTarget,
  settings: SubmissionSettings,
  signal?: AbortSignal,
): Promise<SubmitResult> {
  let result = await gateway.submit(
    "my_business_info",
    buildBusinessInfoItem(target, settings, "place_id"),
    signal,
  );
  throwIfAborted(signal);

  if (isInvalidFieldMentioning(result, "keyword")) {
    logger.warn("Business info place_id payload rejected; retrying with keyword payload", {
      placeId: target.placeId,
      statusMessage: result.statusMessage,
    });
    result = await gateway.submit(
      "my_business_info",
      buildBusinessInfoItem(target, settings, "keyword"),
      signal,
    );
    throwIfAborted(signal);
  }

  if (isInvalidFieldMentioning(result, "location_name") && trimmedLocation(target)) {
    logger.warn("Business info keyword payload rejected; retrying with keyword+location_name", {
      placeId: target.placeId,
      statusMessage: result.statusMessage,
    });
    result = await gateway.submit(
      "my_business_info",
      buildBusinessInfoItem(target, settings, "keyword+location_name"),
      signal,
    );
    throwIfAborted(signal);
  }

  return result;
}
