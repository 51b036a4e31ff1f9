/**
 * Reconciliation loop
 *
 * Cross-references the provider ready-lists against the ledger: outstanding
 * rows advance to Ready or Pending, and ready jobs the ledger has never seen
 * are adopted as new Ready rows.
 */

import type { EnrichmentTaskRow, PolledTaskKind, ReadyTaskEntry } from "@/types";
import type { EnrichmentGateway } from "@/interfaces";
import { LEDGER_MESSAGE_MAX_LENGTH, POLLED_TASK_KINDS } from "@/constants";
import {
  getPlaceById,
  insertTaskIfAbsent,
  listActiveTasks,
  markTaskError,
  markTaskPending,
  markTaskReady,
  taskExistsByRemoteId,
} from "@/db";
import { errorMessage, nowIso, throwIfAborted, truncateMessage } from "@/utils";
import { classifyStatusCode, isPolledKind } from "./taskKinds";
import * as logger from "@/logger";

export interface ReconcileDeps {
  gateway: EnrichmentGateway;
}

type ReadyIndex = Map<PolledTaskKind, Map<string, ReadyTaskEntry>>;

/**
 * Ready-lists per kind; a failing kind is logged and treated as empty
 */
async function loadReadyIndex(
  gateway: EnrichmentGateway,
  signal?: AbortSignal,
): Promise<ReadyIndex> {
  const index: ReadyIndex = new Map();

  for (const kind of POLLED_TASK_KINDS) {
    const byId = new Map<string, ReadyTaskEntry>();
    try {
      for (const entry of await gateway.listReady(kind, signal)) {
        byId.set(entry.remoteId, entry);
      }
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      logger.warn("Ready-list fetch failed; treating as empty", {
        kind,
        error: errorMessage(error),
      });
    }
    index.set(kind, byId);
    throwIfAborted(signal);
  }

  return index;
}

/**
 * Advance one active row against its kind's ready-list
 *
 * @returns true when the row was touched
 */
function advanceTask(
  task: EnrichmentTaskRow,
  index: ReadyIndex,
  gateway: EnrichmentGateway,
): boolean {
  if (!isPolledKind(task.kind)) {
    return false;
  }

  const entry = index.get(task.kind)?.get(task.remote_task_id);
  const log = logger.withContext({
    taskId: task.id,
    remoteTaskId: task.remote_task_id,
    kind: task.kind,
    placeId: task.place_id,
  });

  if (entry) {
    if (classifyStatusCode(entry.statusCode) === "failure") {
      log.warn("Ready-list reports failure", { statusCode: entry.statusCode });
      return markTaskError(
        task.id,
        entry.statusCode,
        truncateMessage(entry.statusMessage, LEDGER_MESSAGE_MAX_LENGTH),
      );
    }

    const changed = markTaskReady(task.id, {
      endpoint: entry.endpoint ?? gateway.resolveTaskGetPath(task.kind, task.remote_task_id),
      statusCode: entry.statusCode,
      statusMessage: truncateMessage(entry.statusMessage, LEDGER_MESSAGE_MAX_LENGTH),
    });
    if (changed && task.status !== "Ready") {
      log.info("Task ready");
    }
    return changed;
  }

  if (task.status === "Created" || task.status === "Pending") {
    return markTaskPending(task.id);
  }

  // Ready rows stay Ready until populated (collected jobs drop off the ready-list)
  return false;
}

/**
 * Adopt ready jobs with no ledger row whose tag names a known place
 *
 * @returns Number of rows inserted
 */
function adoptUnknownReadyTasks(index: ReadyIndex, gateway: EnrichmentGateway): number {
  let adopted = 0;

  for (const [kind, entries] of index) {
    for (const entry of entries.values()) {
      if (taskExistsByRemoteId(entry.remoteId)) {
        continue;
      }
      if (!entry.tag) {
        logger.debug("Skipping untagged ready task", { kind, remoteTaskId: entry.remoteId });
        continue;
      }

      const place = getPlaceById(entry.tag);
      if (!place) {
        logger.debug("Skipping ready task for unknown place", {
          kind,
          remoteTaskId: entry.remoteId,
          placeId: entry.tag,
        });
        continue;
      }

      const inserted = insertTaskIfAbsent({
        remote_task_id: entry.remoteId,
        kind,
        place_id: place.place_id,
        location_name: place.location_name,
        status: "Ready",
        status_code: entry.statusCode,
        status_message: truncateMessage(entry.statusMessage, LEDGER_MESSAGE_MAX_LENGTH),
        endpoint: entry.endpoint ?? gateway.resolveTaskGetPath(kind, entry.remoteId),
        ready_at: nowIso(),
      });

      if (inserted) {
        adopted++;
        logger.info("Adopted ready task missing from ledger", {
          kind,
          remoteTaskId: entry.remoteId,
          placeId: place.place_id,
        });
      }
    }
  }

  return adopted;
}

/**
 * One reconciliation pass over every polled kind
 *
 * @returns Number of ledger rows touched (advanced, re-stamped or adopted)
 */
export async function reconcileTasks(deps: ReconcileDeps, signal?: AbortSignal): Promise<number> {
  const index = await loadReadyIndex(deps.gateway, signal);

  let touched = 0;
  for (const task of listActiveTasks(POLLED_TASK_KINDS)) {
    throwIfAborted(signal);
    if (advanceTask(task, index, deps.gateway)) {
      touched++;
    }
  }

  throwIfAborted(signal);
  touched += adoptUnknownReadyTasks(index, deps.gateway);

  logger.info("Reconciliation pass complete", { touched });
  return touched;
}
