/**
 * Callback handler
 *
 * Applies a provider push notification to the ledger and, when the job
 * reports success, materializes the payload it carries without a refetch.
 */

import type { CallbackInput, CallbackResult, EnrichmentTaskRow, TaskStatus } from "@/types";
import { LEDGER_MESSAGE_MAX_LENGTH } from "@/constants";
import { parseTaskResponse } from "@/clients/dataForSeo";
import { findLatestActiveTaskForPlace, getTaskByRemoteId, recordCallback } from "@/db";
import { parseJsonText, truncateMessage } from "@/utils";
import type { MaterializerDeps } from "./materializer";
import { materializeTask } from "./materializer";
import { classifyStatusCode } from "./taskKinds";
import * as logger from "@/logger";

function trimmedOrNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function statusFromCode(statusCode: number): TaskStatus {
  switch (classifyStatusCode(statusCode)) {
    case "success":
      return "Ready";
    case "failure":
      return "Error";
    case "processing":
      return "Pending";
  }
}

type ResolvedTask = {
  task: EnrichmentTaskRow;
  /** Matched through the place tag; the payload may belong to another job */
  byTag: boolean;
};

/**
 * Locate the ledger row: payload task id, then query id
 * The tag's latest active task is used only when the callback carries no id.
 */
function resolveTask(
  payloadId: string | null,
  queryId: string | null,
  tag: string | null,
): ResolvedTask | null {
  for (const remoteId of [payloadId, queryId]) {
    if (!remoteId) {
      continue;
    }
    const task = getTaskByRemoteId(remoteId);
    if (task) {
      return { task, byTag: false };
    }
  }

  if (payloadId || queryId || !tag) {
    return null;
  }
  const task = findLatestActiveTaskForPlace(tag);
  return task ? { task, byTag: true } : null;
}

export async function handleCallback(
  input: CallbackInput,
  deps: MaterializerDeps,
  signal?: AbortSignal,
): Promise<CallbackResult> {
  if (!input.payload.trim()) {
    return { accepted: false, message: "Empty payload." };
  }

  const body = parseJsonText(input.payload);
  if (body === null) {
    return { accepted: false, message: "Invalid JSON payload." };
  }

  const fetched = parseTaskResponse(body);
  const queryId = trimmedOrNull(input.remoteIdHint);
  const tag = trimmedOrNull(input.tagHint) ?? fetched.tag;

  const resolved = resolveTask(fetched.remoteId, queryId, tag);
  if (!resolved) {
    const unresolvedId = fetched.remoteId ?? queryId;
    logger.warn("Callback could not be resolved to a task", {
      remoteTaskId: unresolvedId,
      tag,
    });
    return {
      accepted: false,
      message: unresolvedId ? `Task ${unresolvedId} not found.` : "Task id missing in callback.",
    };
  }

  const { task, byTag } = resolved;
  const status = statusFromCode(fetched.statusCode);
  const updated = recordCallback(task.id, {
    status,
    statusCode: fetched.statusCode,
    statusMessage: truncateMessage(fetched.statusMessage, LEDGER_MESSAGE_MAX_LENGTH),
    endpoint: byTag ? null : fetched.endpoint,
    callbackTaskId: fetched.remoteId ?? queryId ?? task.remote_task_id,
  });
  if (!updated) {
    return { accepted: false, message: `Task ${task.remote_task_id} not found.` };
  }

  const log = logger.withContext({
    taskId: updated.id,
    remoteTaskId: updated.remote_task_id,
    kind: updated.kind,
    placeId: updated.place_id,
  });
  log.info("Callback recorded", {
    statusCode: fetched.statusCode,
    statusMessage: fetched.statusMessage,
    status: updated.status,
    resolvedByTag: byTag,
  });

  if (status === "Ready" && updated.status === "Ready") {
    // A tag match is fetched from its own endpoint
    const populated = await materializeTask(updated, deps, {
      fetched: byTag ? undefined : fetched,
      signal,
    });
    return {
      accepted: populated.success,
      message: `Task ${updated.remote_task_id} callback received. ${populated.message}`,
    };
  }

  return {
    accepted: true,
    message: `Task ${updated.remote_task_id} updated to ${updated.status}.`,
  };
}
