/**
 * Job kind and task status normalization
 *
 * The only place where free-form kind/status strings (query params, legacy
 * ledger values, glossary names) become the closed TaskKind/TaskStatus unions.
 */

import type { LiveTaskKind, PolledTaskKind, TaskKind, TaskStatus } from "@/types";
import {
  STATUS_CODE_SUCCESS_MAX_EXCLUSIVE,
  STATUS_CODE_SUCCESS_MIN,
  STATUS_CODE_TERMINAL_FAILURE_MIN,
  TERMINAL_TASK_STATUSES,
} from "@/constants";

export type StatusCodeClass = "success" | "failure" | "processing";

const KIND_ALIASES = new Map<string, TaskKind>([
  ["reviews", "reviews"],
  ["review", "reviews"],
  ["mybusinessinfo", "my_business_info"],
  ["businessinfo", "my_business_info"],
  ["info", "my_business_info"],
  ["mybusinessupdates", "my_business_updates"],
  ["businessupdates", "my_business_updates"],
  ["updates", "my_business_updates"],
  ["posts", "my_business_updates"],
  ["questionsandanswers", "questions_and_answers"],
  ["questionanswers", "questions_and_answers"],
  ["qanda", "questions_and_answers"],
  ["qa", "questions_and_answers"],
  ["socialprofiles", "social_profiles"],
  ["social", "social_profiles"],
]);

const STATUS_ALIASES = new Map<string, TaskStatus>([
  ["created", "Created"],
  ["pending", "Pending"],
  ["ready", "Ready"],
  ["populated", "Populated"],
  ["completednodata", "CompletedNoData"],
  ["terminalnodata", "CompletedNoData"],
  // Legacy value written before non-review kinds existed
  ["completednoreviews", "CompletedNoData"],
  ["error", "Error"],
]);

function aliasKey(raw: string): string {
  return raw.toLowerCase().replace(/[^a-z0-9]/g, "");
}

/**
 * True for an absent filter or the explicit "all" filter
 */
export function isAllKindsFilter(raw: string | null | undefined): boolean {
  if (raw === null || raw === undefined) {
    return true;
  }
  const key = aliasKey(raw);
  return key === "" || key === "all";
}

/**
 * Map a wire name, glossary name or alias to a TaskKind (null when unknown)
 *
 * @example
 * normalizeTaskKind("BusinessInfo") // => "my_business_info"
 * normalizeTaskKind("Q&A")          // => "questions_and_answers"
 */
export function normalizeTaskKind(raw: string | null | undefined): TaskKind | null {
  if (raw === null || raw === undefined || isAllKindsFilter(raw)) {
    return null;
  }
  return KIND_ALIASES.get(aliasKey(raw)) ?? null;
}

export function normalizeTaskStatus(raw: string | null | undefined): TaskStatus | null {
  if (!raw) {
    return null;
  }
  return STATUS_ALIASES.get(aliasKey(raw)) ?? null;
}

export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_TASK_STATUSES.includes(status);
}

export function isLiveKind(kind: TaskKind): kind is LiveTaskKind {
  return kind === "social_profiles";
}

export function isPolledKind(kind: TaskKind): kind is PolledTaskKind {
  return !isLiveKind(kind);
}

/**
 * Classify a provider status code
 * [20000, 30000) success, >= 40000 terminal failure, anything else (or none) processing
 */
export function classifyStatusCode(code: number | null | undefined): StatusCodeClass {
  if (code === null || code === undefined) {
    return "processing";
  }
  if (code >= STATUS_CODE_SUCCESS_MIN && code < STATUS_CODE_SUCCESS_MAX_EXCLUSIVE) {
    return "success";
  }
  if (code >= STATUS_CODE_TERMINAL_FAILURE_MIN) {
    return "failure";
  }
  return "processing";
}
