/**
 * Enrichment orchestrator
 *
 * Entry point used by the ingestion pipeline, the runner and the HTTP
 * surface. Submits due jobs per place, then reconciles; exposes population,
 * listing and maintenance operations over the ledger.
 */

import { randomUUID } from "node:crypto";
import type {
  BulkPopulateResult,
  CallbackInput,
  CallbackResult,
  EnrichmentConfig,
  EnrichmentTaskRow,
  EnrichPlacesResult,
  FetchResult,
  LiveTaskKind,
  PlaceEnrichmentTarget,
  PlaceRow,
  PolledTaskKind,
  PopulateResult,
  SubmitResult,
  TaskKind,
  TaskPostItem,
  TaskStatus,
} from "@/types";
import type { EnrichmentGateway } from "@/interfaces";
import {
  ALL_TASK_KINDS,
  LATEST_TASKS_DEFAULT_LIMIT,
  LATEST_TASKS_MAX_LIMIT,
  LEDGER_MESSAGE_MAX_LENGTH,
} from "@/constants";
import { DataForSeoClient } from "@/clients/dataForSeo";
import {
  deleteErrorTasks,
  getTaskById,
  insertOrMergeTask,
  listLatestByKind,
  listLatestTasks,
  listTasksByStatus,
  markTaskError,
} from "@/db";
import { errorMessage, nowIso, throwIfAborted, truncateMessage } from "@/utils";
import { AssetResolver } from "./assets/assetResolver";
import { handleCallback } from "./callbackHandler";
import type { MaterializerDeps } from "./materializer";
import { materializeTask } from "./materializer";
import { reconcileTasks } from "./reconcile";
import { formatCooldown, selectDueKinds } from "./schedulingPolicy";
import {
  buildQuestionsAndAnswersItem,
  buildReviewsItem,
  buildSocialProfilesItem,
  buildUpdatesItem,
  submitBusinessInfo,
} from "./submission";
import { classifyStatusCode, isLiveKind, isPolledKind } from "./taskKinds";
import * as logger from "@/logger";

export interface EnrichmentOrchestratorDeps {
  gateway: EnrichmentGateway;
  assets: AssetResolver;
  config: EnrichmentConfig;
  /**
   * Clock for scheduling decisions (for testing)
   */
  now?: () => Date;
}

type SubmissionOutcome = "submitted" | "failed";

function ledgerMessage(message: string | null): string | null {
  return truncateMessage(message, LEDGER_MESSAGE_MAX_LENGTH);
}

function uniqueKinds(kinds: readonly TaskKind[]): TaskKind[] {
  return [...new Set(kinds)];
}

/**
 * Enrichment target for a stored place
 */
export function enrichmentTargetFromPlace(place: PlaceRow): PlaceEnrichmentTarget {
  return {
    placeId: place.place_id,
    locationName: place.location_name,
    lat: place.lat,
    lng: place.lng,
    reviewCount: place.review_count,
  };
}

/**
 * Clamp a listing limit to [1, 2000]; missing or invalid => default
 */
export function clampLatestLimit(limit: number | null | undefined): number {
  if (limit === null || limit === undefined || !Number.isFinite(limit)) {
    return LATEST_TASKS_DEFAULT_LIMIT;
  }
  return Math.min(LATEST_TASKS_MAX_LIMIT, Math.max(1, Math.trunc(limit)));
}

export class EnrichmentOrchestrator {
  private readonly gateway: EnrichmentGateway;
  private readonly assets: AssetResolver;
  private readonly config: EnrichmentConfig;
  private readonly now: () => Date;

  constructor(deps: EnrichmentOrchestratorDeps) {
    this.gateway = deps.gateway;
    this.assets = deps.assets;
    this.config = deps.config;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Submit every requested-and-due kind for each place, then reconcile once
   *
   * Places are processed sequentially; kinds within a place in request order.
   * Failures are logged and counted, never thrown (cancellation excepted).
   */
  async enrichPlaces(
    places: readonly PlaceEnrichmentTarget[],
    kinds: readonly TaskKind[] = ALL_TASK_KINDS,
    signal?: AbortSignal,
  ): Promise<EnrichPlacesResult> {
    const requested = uniqueKinds(kinds);
    const result: EnrichPlacesResult = { submitted: 0, skipped: 0, failed: 0, touched: 0 };

    logger.info("Enriching places", { places: places.length, kinds: requested });

    for (const place of places) {
      throwIfAborted(signal);
      try {
        await this.enrichPlace(place, requested, result, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        result.failed++;
        logger.error("Place enrichment failed", {
          placeId: place.placeId,
          error: errorMessage(error),
        });
      }
    }

    try {
      result.touched = await this.reconcile(signal);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      logger.error("Reconciliation after submission failed", { error: errorMessage(error) });
    }

    logger.info("Enrichment batch complete", { ...result });
    return result;
  }

  async populateTask(taskId: number, signal?: AbortSignal): Promise<PopulateResult> {
    const task = getTaskById(taskId);
    if (!task) {
      return { success: false, message: `Task ${taskId} not found.`, itemCount: 0 };
    }
    return materializeTask(task, this.materializerDeps(), { signal });
  }

  /**
   * Populate every Ready task (optionally one kind), isolating per-task failures
   */
  async populateReadyTasks(
    kind?: TaskKind | null,
    signal?: AbortSignal,
  ): Promise<BulkPopulateResult> {
    const summary: BulkPopulateResult = { attempted: 0, succeeded: 0, failed: 0, itemCount: 0 };
    const tasks = listTasksByStatus("Ready", kind).filter((task) => isPolledKind(task.kind));

    for (const task of tasks) {
      throwIfAborted(signal);
      summary.attempted++;
      try {
        const populated = await materializeTask(task, this.materializerDeps(), { signal });
        if (populated.success) {
          summary.succeeded++;
          summary.itemCount += populated.itemCount;
        } else {
          summary.failed++;
        }
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        summary.failed++;
        logger.error("Task population failed", {
          taskId: task.id,
          remoteTaskId: task.remote_task_id,
          kind: task.kind,
          placeId: task.place_id,
          error: errorMessage(error),
        });
      }
    }

    if (summary.attempted > 0) {
      logger.info("Bulk population complete", { kind: kind ?? "all", ...summary });
    }
    return summary;
  }

  getLatestTasks(
    limit?: number | null,
    kind?: TaskKind | null,
    status?: TaskStatus | null,
  ): EnrichmentTaskRow[] {
    return listLatestTasks(clampLatestLimit(limit), kind, status);
  }

  deleteErrorTasks(kind?: TaskKind | null): number {
    const deleted = deleteErrorTasks(kind);
    logger.info("Error tasks purged", { kind: kind ?? "all", deleted });
    return deleted;
  }

  reconcile(signal?: AbortSignal): Promise<number> {
    return reconcileTasks({ gateway: this.gateway }, signal);
  }

  handleCallback(input: CallbackInput, signal?: AbortSignal): Promise<CallbackResult> {
    return handleCallback(input, this.materializerDeps(), signal);
  }

  private materializerDeps(): MaterializerDeps {
    return { gateway: this.gateway, assets: this.assets };
  }

  private async enrichPlace(
    place: PlaceEnrichmentTarget,
    kinds: readonly TaskKind[],
    result: EnrichPlacesResult,
    signal?: AbortSignal,
  ): Promise<void> {
    const decisions = selectDueKinds(
      listLatestByKind(place.placeId),
      kinds,
      this.config.refreshHours,
      this.now(),
    );

    for (const decision of decisions) {
      throwIfAborted(signal);

      if (!decision.due) {
        result.skipped++;
        logger.info("Skipping kind; refreshed recently", {
          placeId: place.placeId,
          kind: decision.kind,
          lastCreatedAt: decision.lastCreatedAt,
          remaining: formatCooldown(decision.remainingMs),
        });
        continue;
      }

      const kind = decision.kind;
      const outcome = isLiveKind(kind)
        ? await this.runLiveKind(place, kind, signal)
        : await this.submitPolledKind(place, kind, signal);

      if (outcome === "submitted") {
        result.submitted++;
      } else {
        result.failed++;
      }
    }
  }

  private buildPolledItem(
    place: PlaceEnrichmentTarget,
    kind: Exclude<PolledTaskKind, "my_business_info">,
  ): TaskPostItem {
    const settings = this.config.dataForSeo;
    switch (kind) {
      case "reviews":
        return buildReviewsItem(place, settings);
      case "my_business_updates":
        return buildUpdatesItem(place, settings);
      case "questions_and_answers":
        return buildQuestionsAndAnswersItem(place, settings);
    }
  }

  private async submitPolledKind(
    place: PlaceEnrichmentTarget,
    kind: PolledTaskKind,
    signal?: AbortSignal,
  ): Promise<SubmissionOutcome> {
    let submitted: SubmitResult;
    try {
      submitted =
        kind === "my_business_info"
          ? await submitBusinessInfo(this.gateway, place, this.config.dataForSeo, signal)
          : await this.gateway.submit(kind, this.buildPolledItem(place, kind), signal);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      this.recordSubmissionFailure(place, kind, `Submission failed: ${errorMessage(error)}`);
      return "failed";
    }
    throwIfAborted(signal);

    if (!submitted.remoteId) {
      this.recordSubmissionFailure(
        place,
        kind,
        submitted.statusMessage ?? "No task id returned.",
        submitted.statusCode,
      );
      return "failed";
    }

    const status: TaskStatus =
      classifyStatusCode(submitted.statusCode) === "success" ? "Created" : "Error";
    const statusMessage = ledgerMessage(submitted.statusMessage);

    const taskId = insertOrMergeTask({
      remote_task_id: submitted.remoteId,
      kind,
      place_id: place.placeId,
      location_name: place.locationName ?? null,
      status,
      status_code: submitted.statusCode,
      status_message: statusMessage,
      last_error: status === "Error" ? statusMessage : null,
    });

    logger.info("Task submitted", {
      taskId,
      remoteTaskId: submitted.remoteId,
      kind,
      placeId: place.placeId,
      status,
      statusCode: submitted.statusCode,
    });
    return status === "Created" ? "submitted" : "failed";
  }

  /**
   * Live kinds are fetched in the submission call and materialized immediately
   */
  private async runLiveKind(
    place: PlaceEnrichmentTarget,
    kind: LiveTaskKind,
    signal?: AbortSignal,
  ): Promise<SubmissionOutcome> {
    let fetched: FetchResult;
    try {
      fetched = await this.gateway.runLive(
        kind,
        buildSocialProfilesItem(place, this.config.dataForSeo),
        signal,
      );
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      this.recordSubmissionFailure(place, kind, `Live request failed: ${errorMessage(error)}`);
      return "failed";
    }
    throwIfAborted(signal);

    // Live rows are never revisited: anything short of success settles as Error
    if (!fetched.remoteId || classifyStatusCode(fetched.statusCode) !== "success") {
      this.recordSubmissionFailure(
        place,
        kind,
        fetched.statusMessage ?? "No task id returned.",
        fetched.statusCode,
        fetched.remoteId,
      );
      return "failed";
    }

    const taskId = insertOrMergeTask({
      remote_task_id: fetched.remoteId,
      kind,
      place_id: place.placeId,
      location_name: place.locationName ?? null,
      status: "Ready",
      status_code: fetched.statusCode,
      status_message: ledgerMessage(fetched.statusMessage),
      ready_at: nowIso(),
    });
    const task = getTaskById(taskId);
    if (!task) {
      return "failed";
    }

    // A live call has finished when it answers; a missing result means no data
    const populated = await materializeTask(task, this.materializerDeps(), {
      fetched: { ...fetched, isCompleted: true },
      signal,
    });
    if (!populated.success) {
      markTaskError(task.id, fetched.statusCode, ledgerMessage(populated.message));
      return "failed";
    }
    return "submitted";
  }

  /**
   * Record a submission that produced no usable task as an Error row
   */
  private recordSubmissionFailure(
    place: PlaceEnrichmentTarget,
    kind: TaskKind,
    message: string,
    statusCode: number | null = null,
    remoteId: string | null = null,
  ): void {
    const statusMessage = ledgerMessage(message);
    const remoteTaskId = remoteId ?? `${kind}-err-${randomUUID()}`;

    insertOrMergeTask({
      remote_task_id: remoteTaskId,
      kind,
      place_id: place.placeId,
      location_name: place.locationName ?? null,
      status: "Error",
      status_code: statusCode,
      status_message: statusMessage,
      last_error: statusMessage,
    });

    logger.warn("Task submission failed", {
      remoteTaskId,
      kind,
      placeId: place.placeId,
      error: message,
    });
  }
}

/**
 * Wire the orchestrator to the DataForSEO gateway and the local asset store
 */
export function createEnrichmentOrchestrator(config: EnrichmentConfig): EnrichmentOrchestrator {
  const gateway = new DataForSeoClient({
    baseUrl: config.dataForSeo.baseUrl,
    credentials: { login: config.dataForSeo.login, password: config.dataForSeo.password },
  });
  const assets = new AssetResolver({ assetsDir: config.assetsDir });
  return new EnrichmentOrchestrator({ gateway, assets, config });
}
