/**
 * Result materializer
 *
 * Fetches a task's result (unless the caller already holds it), parses it
 * with the kind's parser and merges the items into the result tables. Items
 * and the task's final status are written in one transaction, status last.
 */

import type {
  BusinessInfoPayload,
  EnrichmentTaskRow,
  FetchResult,
  KindSnapshot,
  PopulateResult,
  QuestionAnswerPayload,
  ReviewPayload,
  SocialProfileSet,
  TaskKind,
  UpdatePayload,
} from "@/types";
import type { EnrichmentGateway } from "@/interfaces";
import { LEDGER_MESSAGE_MAX_LENGTH } from "@/constants";
import {
  getDb,
  getPlaceById,
  markPopulateAttempt,
  markTaskCompletedNoData,
  markTaskError,
  markTaskPending,
  markTaskPopulated,
  mergePlaceSocialProfiles,
  recordPopulateFailure,
  updatePlaceBusinessInfo,
  upsertPlaceQuestionAnswer,
  upsertPlaceReview,
  upsertPlaceUpdate,
} from "@/db";
import { errorMessage, throwIfAborted, truncateMessage } from "@/utils";
import type { AssetResolver } from "./assets/assetResolver";
import {
  parseBusinessInfo,
  parseQuestionsAndAnswers,
  parseReviews,
  parseSocialProfiles,
  parseUpdates,
} from "./parsers";
import { classifyStatusCode, isLiveKind } from "./taskKinds";
import * as logger from "@/logger";

export interface MaterializerDeps {
  gateway: EnrichmentGateway;
  assets: AssetResolver;
}

export interface MaterializeOptions {
  /** Result already in hand (callback or live submission); skips the fetch */
  fetched?: FetchResult;
  signal?: AbortSignal;
}

const ITEM_NOUNS: Record<TaskKind, string> = {
  reviews: "reviews",
  my_business_info: "business info",
  my_business_updates: "updates",
  questions_and_answers: "questions and answers",
  social_profiles: "social profiles",
};

type TaskLogger = ReturnType<typeof logger.withContext>;

function ledgerMessage(message: string | null): string | null {
  return truncateMessage(message, LEDGER_MESSAGE_MAX_LENGTH);
}

function failure(message: string): PopulateResult {
  return { success: false, message, itemCount: 0 };
}

/**
 * Run a synchronous write block atomically
 */
function inTransaction(fn: () => void): void {
  getDb().transaction(fn)();
}

/**
 * Fetch the task result at its cached (or resolved) endpoint
 * Transport failures are recorded on the row and returned as a message.
 */
async function fetchTaskResult(
  task: EnrichmentTaskRow,
  deps: MaterializerDeps,
  log: TaskLogger,
  signal?: AbortSignal,
): Promise<FetchResult | string> {
  if (isLiveKind(task.kind)) {
    return "Live task results are only available at submission time.";
  }

  const endpoint = task.endpoint ?? deps.gateway.resolveTaskGetPath(task.kind, task.remote_task_id);
  try {
    return await deps.gateway.fetch(endpoint, signal);
  } catch (error) {
    if (signal?.aborted) {
      throw error;
    }
    const message = `Fetch failed: ${errorMessage(error)}`;
    log.warn("Task result fetch failed; status unchanged", { endpoint, error: errorMessage(error) });
    recordPopulateFailure(task.id, ledgerMessage(message) ?? message);
    return message;
  }
}

/**
 * Apply the zero-item outcome: completed => CompletedNoData, else back to Pending
 */
function settleWithoutItems(
  task: EnrichmentTaskRow,
  snapshot: KindSnapshot<unknown>,
  log: TaskLogger,
): PopulateResult {
  const statusMessage = ledgerMessage(snapshot.statusMessage);

  if (snapshot.isCompleted) {
    markTaskCompletedNoData(task.id, snapshot.statusCode, statusMessage);
    log.info("Task completed with no data", { statusCode: snapshot.statusCode });
    return {
      success: true,
      message: `Task completed but had no ${ITEM_NOUNS[task.kind]} to import.`,
      itemCount: 0,
    };
  }

  markTaskPending(task.id, snapshot.statusCode, statusMessage);
  log.info("Task not ready yet", { statusCode: snapshot.statusCode });
  return failure("Task is not ready yet.");
}

function persistReviews(
  task: EnrichmentTaskRow,
  snapshot: KindSnapshot<ReviewPayload>,
): number {
  inTransaction(() => {
    for (const review of snapshot.items) {
      upsertPlaceReview(task.place_id, review, task.remote_task_id);
    }
    markTaskPopulated(
      task.id,
      snapshot.statusCode,
      ledgerMessage(snapshot.statusMessage),
      snapshot.items.length,
    );
  });
  return snapshot.items.length;
}

function persistUpdates(
  task: EnrichmentTaskRow,
  snapshot: KindSnapshot<UpdatePayload>,
): number {
  inTransaction(() => {
    for (const update of snapshot.items) {
      upsertPlaceUpdate(task.place_id, update, task.remote_task_id);
    }
    markTaskPopulated(
      task.id,
      snapshot.statusCode,
      ledgerMessage(snapshot.statusMessage),
      snapshot.items.length,
    );
  });
  return snapshot.items.length;
}

function persistQuestionAnswers(
  task: EnrichmentTaskRow,
  snapshot: KindSnapshot<QuestionAnswerPayload>,
): number {
  inTransaction(() => {
    for (const qa of snapshot.items) {
      upsertPlaceQuestionAnswer(task.place_id, qa, task.remote_task_id);
    }
    markTaskPopulated(
      task.id,
      snapshot.statusCode,
      ledgerMessage(snapshot.statusMessage),
      snapshot.items.length,
    );
  });
  return snapshot.items.length;
}

async function persistBusinessInfo(
  task: EnrichmentTaskRow,
  snapshot: KindSnapshot<BusinessInfoPayload>,
  deps: MaterializerDeps,
  signal?: AbortSignal,
): Promise<number | string> {
  const place = getPlaceById(task.place_id);
  if (!place) {
    return `Place ${task.place_id} not found.`;
  }

  const info = snapshot.items[0];
  const logoLocalPath = await deps.assets.resolve(info.logoUrl, place.logo_local_path, signal);
  const mainPhotoLocalPath = await deps.assets.resolve(
    info.mainPhotoUrl,
    place.main_photo_local_path,
    signal,
  );
  throwIfAborted(signal);

  inTransaction(() => {
    updatePlaceBusinessInfo(task.place_id, {
      description: info.description,
      photo_count: info.photoCount,
      other_categories_json:
        info.additionalCategories.length > 0 ? JSON.stringify(info.additionalCategories) : null,
      place_topics_json: info.placeTopics.length > 0 ? JSON.stringify(info.placeTopics) : null,
      logo_url: info.logoUrl,
      logo_local_path: logoLocalPath,
      main_photo_url: info.mainPhotoUrl,
      main_photo_local_path: mainPhotoLocalPath,
    });
    markTaskPopulated(task.id, snapshot.statusCode, ledgerMessage(snapshot.statusMessage), 1);
  });
  return 1;
}

function persistSocialProfiles(
  task: EnrichmentTaskRow,
  snapshot: KindSnapshot<SocialProfileSet>,
  log: TaskLogger,
): number | string {
  if (!getPlaceById(task.place_id)) {
    return `Place ${task.place_id} not found.`;
  }

  const profiles = snapshot.items[0];
  const found = Object.keys(profiles).length;
  inTransaction(() => {
    const added = mergePlaceSocialProfiles(task.place_id, profiles);
    log.debug("Social profiles merged", { found, added });
    markTaskPopulated(task.id, snapshot.statusCode, ledgerMessage(snapshot.statusMessage), found);
  });
  return found;
}

/**
 * Parse and persist for the task's kind
 *
 * @returns Item count, or a failure message (nothing written)
 */
async function persistForKind(
  task: EnrichmentTaskRow,
  fetched: FetchResult,
  deps: MaterializerDeps,
  log: TaskLogger,
  signal?: AbortSignal,
): Promise<number | string | KindSnapshot<unknown>> {
  switch (task.kind) {
    case "reviews": {
      const snapshot = parseReviews(fetched);
      return snapshot.items.length === 0 ? snapshot : persistReviews(task, snapshot);
    }
    case "my_business_info": {
      const snapshot = parseBusinessInfo(fetched);
      return snapshot.items.length === 0
        ? snapshot
        : persistBusinessInfo(task, snapshot, deps, signal);
    }
    case "my_business_updates": {
      const snapshot = parseUpdates(fetched);
      return snapshot.items.length === 0 ? snapshot : persistUpdates(task, snapshot);
    }
    case "questions_and_answers": {
      const snapshot = parseQuestionsAndAnswers(fetched);
      return snapshot.items.length === 0 ? snapshot : persistQuestionAnswers(task, snapshot);
    }
    case "social_profiles": {
      const snapshot = parseSocialProfiles(fetched);
      return snapshot.items.length === 0 ? snapshot : persistSocialProfiles(task, snapshot, log);
    }
  }
}

/**
 * Populate one task
 *
 * Error tasks are refused. A terminal-success task may be re-populated; if
 * that fails the row only records last_error.
 */
export async function materializeTask(
  task: EnrichmentTaskRow,
  deps: MaterializerDeps,
  options: MaterializeOptions = {},
): Promise<PopulateResult> {
  const { signal } = options;
  const log = logger.withContext({
    taskId: task.id,
    remoteTaskId: task.remote_task_id,
    kind: task.kind,
    placeId: task.place_id,
  });

  if (task.status === "Error") {
    return failure("Task is in Error status; purge it or submit a new job.");
  }

  markPopulateAttempt(task.id);

  const fetched = options.fetched ?? (await fetchTaskResult(task, deps, log, signal));
  if (typeof fetched === "string") {
    return failure(fetched);
  }
  throwIfAborted(signal);

  if (classifyStatusCode(fetched.statusCode) === "failure") {
    const message = ledgerMessage(fetched.statusMessage) ?? "Task failed.";
    const moved = markTaskError(task.id, fetched.statusCode, message);
    if (!moved) {
      recordPopulateFailure(task.id, message);
    }
    log.warn("Task failed at provider", { statusCode: fetched.statusCode, message });
    return failure(message);
  }

  const outcome = await persistForKind(task, fetched, deps, log, signal);

  if (typeof outcome === "string") {
    recordPopulateFailure(task.id, ledgerMessage(outcome) ?? outcome);
    log.warn("Task population failed", { error: outcome });
    return failure(outcome);
  }

  if (typeof outcome !== "number") {
    return settleWithoutItems(task, outcome, log);
  }

  log.info("Task populated", { itemCount: outcome });
  return {
    success: true,
    message: `Upserted ${outcome} ${ITEM_NOUNS[task.kind]}.`,
    itemCount: outcome,
  };
}
