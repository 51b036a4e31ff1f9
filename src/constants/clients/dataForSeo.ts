/**
 * DataForSEO client constants: base URL, endpoint paths, HTTP tunables
 *
 * Business data API documentation: https://docs.dataforseo.com/v3/business_data/
 */

import type { DataForSeoKindPaths, LiveTaskKind, PolledTaskKind } from "@/types";

/**
 * Default DataForSEO API base URL
 */
export const DATAFORSEO_DEFAULT_BASE_URL = "https://api.dataforseo.com";

/**
 * Queue endpoint paths per polled job kind
 */
export const DATAFORSEO_KIND_PATHS: Record<PolledTaskKind, DataForSeoKindPaths> = {
  reviews: {
    taskPost: "/v3/business_data/google/reviews/task_post",
    tasksReady: "/v3/business_data/google/reviews/tasks_ready",
    taskGet: "/v3/business_data/google/reviews/task_get/{id}",
  },
  my_business_info: {
    taskPost: "/v3/business_data/google/my_business_info/task_post",
    tasksReady: "/v3/business_data/google/my_business_info/tasks_ready",
    taskGet: "/v3/business_data/google/my_business_info/task_get/{id}",
  },
  my_business_updates: {
    taskPost: "/v3/business_data/google/my_business_updates/task_post",
    tasksReady: "/v3/business_data/google/my_business_updates/tasks_ready",
    taskGet: "/v3/business_data/google/my_business_updates/task_get/{id}",
  },
  questions_and_answers: {
    taskPost: "/v3/business_data/google/questions_and_answers/task_post",
    tasksReady: "/v3/business_data/google/questions_and_answers/tasks_ready",
    taskGet: "/v3/business_data/google/questions_and_answers/task_get/{id}",
  },
};

/**
 * Live (synchronous) endpoint paths; these kinds have no queue
 */
export const DATAFORSEO_LIVE_PATHS: Record<LiveTaskKind, string> = {
  social_profiles: "/v3/business_data/google/my_business_info/live",
};

/**
 * HTTP timeout for DataForSEO requests (milliseconds)
 * Live endpoints can take a while to answer
 */
export const DATAFORSEO_HTTP_TIMEOUT_MS = 60_000;

/**
 * Maximum attempts for idempotent DataForSEO calls (tasks_ready, task_get)
 * task_post is never retried by the HTTP layer (POST is not idempotent)
 */
export const DATAFORSEO_HTTP_MAX_ATTEMPTS = 3;

/**
 * Task priority sent with business info submissions (1 = normal, 2 = high)
 */
export const DATAFORSEO_BUSINESS_INFO_PRIORITY = 2;

/**
 * Top-level status code of a successful API call
 */
export const DATAFORSEO_STATUS_OK = 20000;

/**
 * Validation failure ("Invalid Field") returned by task_post
 */
export const DATAFORSEO_STATUS_INVALID_FIELD = 40501;

/**
 * Basic-auth header lifetime in the credential cache
 */
export const DATAFORSEO_CREDENTIAL_TTL_MS = 60 * 60 * 1000;
