/**
 * DataForSEO client type definitions
 *
 * Typed request/response contract of the remote enrichment gateway. Raw wire
 * JSON stays inside src/clients/dataForSeo; everything else sees these shapes.
 */

import type { JsonValue } from "../json";

/**
 * One task_post / live request item
 */
export type TaskPostItem = Record<string, string | number>;

/**
 * Endpoint paths for one job kind
 * taskGet contains a "{id}" placeholder
 */
export type DataForSeoKindPaths = {
  taskPost: string;
  tasksReady: string;
  taskGet: string;
};

export type SubmitResult = {
  /** Provider task id (null when the provider returned none) */
  remoteId: string | null;
  statusCode: number;
  statusMessage: string | null;
};

export type ReadyTaskEntry = {
  remoteId: string;
  endpoint: string | null;
  statusCode: number | null;
  statusMessage: string | null;
  /** Submitter-supplied tag (the place id) */
  tag: string | null;
};

/**
 * task_get / live / callback payload reduced to its first task
 */
export type FetchResult = {
  remoteId: string | null;
  statusCode: number;
  statusMessage: string | null;
  resultCount: number;
  /** Task finished: success code and an explicit result array */
  isCompleted: boolean;
  /** The task's result array (null while the provider is still working) */
  results: JsonValue[] | null;
  endpoint: string | null;
  tag: string | null;
  rawBody: JsonValue;
};

export type DataForSeoCredentials = {
  login: string;
  password: string;
};
