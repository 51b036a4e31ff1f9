/**
 * DataForSEO response mappers
 *
 * Reduce the provider's { status_code, tasks: [{ id, status_code, result }] }
 * envelope to the gateway's typed shapes.
 */

import type {
  FetchResult,
  JsonObject,
  JsonValue,
  ReadyTaskEntry,
  SubmitResult,
} from "@/types";
import { DATAFORSEO_STATUS_OK } from "@/constants";
import {
  getArray,
  getInt,
  getObject,
  getString,
  isJsonObject,
  objectsOf,
} from "@/utils";

const NO_TASKS_MESSAGE = "No tasks in response.";

function firstTask(body: JsonObject): JsonObject | null {
  return objectsOf(getArray(body, "tasks"))[0] ?? null;
}

/**
 * task_post response: first task's id and status
 */
export function parseSubmitResponse(body: JsonObject): SubmitResult {
  const task = firstTask(body);
  if (!task) {
    return { remoteId: null, statusCode: 0, statusMessage: NO_TASKS_MESSAGE };
  }

  return {
    remoteId: getString(task, "id"),
    statusCode: getInt(task, "status_code") ?? 0,
    statusMessage: getString(task, "status_message"),
  };
}

/**
 * tasks_ready response: every tasks[].result[] entry with an id
 * An unsuccessful top-level status yields an empty list.
 */
export function parseReadyResponse(body: JsonObject): ReadyTaskEntry[] {
  if (getInt(body, "status_code") !== DATAFORSEO_STATUS_OK) {
    return [];
  }

  const entries: ReadyTaskEntry[] = [];
  for (const task of objectsOf(getArray(body, "tasks"))) {
    const statusCode = getInt(task, "status_code");
    const statusMessage = getString(task, "status_message");

    for (const ready of objectsOf(getArray(task, "result"))) {
      const remoteId = getString(ready, "id");
      if (!remoteId) {
        continue;
      }
      entries.push({
        remoteId,
        endpoint: getString(ready, "endpoint"),
        statusCode,
        statusMessage,
        tag: getString(ready, "tag"),
      });
    }
  }

  return entries;
}

/**
 * task_get / live / callback body reduced to its first task
 *
 * Completed means status 20000 with an explicit result array; a missing or
 * null result means the job is still running.
 */
export function parseTaskResponse(body: JsonValue): FetchResult {
  const root = isJsonObject(body) ? body : null;
  const task = root ? firstTask(root) : null;

  if (!task) {
    return {
      remoteId: null,
      statusCode: 0,
      statusMessage: NO_TASKS_MESSAGE,
      resultCount: 0,
      isCompleted: false,
      results: null,
      endpoint: null,
      tag: null,
      rawBody: body,
    };
  }

  const statusCode = getInt(task, "status_code") ?? 0;
  const results = getArray(task, "result");
  const firstResult = objectsOf(results)[0] ?? null;
  const data = getObject(task, "data");

  return {
    remoteId: getString(task, "id") ?? (firstResult ? getString(firstResult, "id") : null),
    statusCode,
    statusMessage: getString(task, "status_message"),
    resultCount: getInt(task, "result_count") ?? results?.length ?? 0,
    isCompleted: statusCode === DATAFORSEO_STATUS_OK && results !== null,
    results,
    endpoint: firstResult ? getString(firstResult, "endpoint") : null,
    tag: (data ? getString(data, "tag") : null) ?? (firstResult ? getString(firstResult, "tag") : null),
    rawBody: body,
  };
}
