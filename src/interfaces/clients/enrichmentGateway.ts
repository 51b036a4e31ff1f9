/**
 * EnrichmentGateway interface: provider-agnostic contract of the remote
 * enrichment API (submit job, list ready jobs, fetch job result)
 *
 * Implementations throw on transport failures (HttpError, network, timeout);
 * provider-level outcomes are reported through status codes.
 */

import type {
  FetchResult,
  LiveTaskKind,
  PolledTaskKind,
  ReadyTaskEntry,
  SubmitResult,
  TaskPostItem,
} from "@/types";

export interface EnrichmentGateway {
  /**
   * Submit one asynchronous job
   */
  submit(kind: PolledTaskKind, item: TaskPostItem, signal?: AbortSignal): Promise<SubmitResult>;

  /**
   * Jobs of one kind whose processing has finished
   */
  listReady(kind: PolledTaskKind, signal?: AbortSignal): Promise<ReadyTaskEntry[]>;

  /**
   * Fetch a job result at its task_get endpoint (path or absolute URL)
   */
  fetch(endpoint: string, signal?: AbortSignal): Promise<FetchResult>;

  /**
   * Submit and fetch a synchronous job in one call
   */
  runLive(kind: LiveTaskKind, item: TaskPostItem, signal?: AbortSignal): Promise<FetchResult>;

  /**
   * task_get path for a job whose endpoint was never reported
   */
  resolveTaskGetPath(kind: PolledTaskKind, remoteId: string): string;
}
