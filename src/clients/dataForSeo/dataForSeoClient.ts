/**
 * DataForSeoClient: EnrichmentGateway over the DataForSEO business data API
 *
 * task_post / live are POSTs (never retried by the HTTP layer);
 * tasks_ready / task_get are GETs with retries.
 */

import type { EnrichmentGateway } from "@/interfaces";
import type {
  DataForSeoCredentials,
  FetchResult,
  HttpMethod,
  HttpRequestFn,
  JsonObject,
  JsonValue,
  LiveTaskKind,
  PolledTaskKind,
  ReadyTaskEntry,
  SubmitResult,
  TaskPostItem,
} from "@/types";
import { httpRequest as defaultHttpRequest, HttpError } from "@/clients/http";
import {
  DATAFORSEO_DEFAULT_BASE_URL,
  DATAFORSEO_HTTP_MAX_ATTEMPTS,
  DATAFORSEO_HTTP_TIMEOUT_MS,
  DATAFORSEO_KIND_PATHS,
  DATAFORSEO_LIVE_PATHS,
} from "@/constants";
import { ConfigError } from "@/config";
import { isJsonObject } from "@/utils";
import { CredentialCache } from "./credentialCache";
import { DataForSeoError } from "./dataForSeoError";
import { parseReadyResponse, parseSubmitResponse, parseTaskResponse } from "./mappers";
import * as logger from "@/logger";

export interface DataForSeoClientConfig {
  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;

  /**
   * Optional credentials (for testing)
   * Defaults to process.env.DATAFORSEO_LOGIN / DATAFORSEO_PASSWORD
   */
  credentials?: DataForSeoCredentials;

  /**
   * Defaults to process.env.DATAFORSEO_BASE_URL, then the public API host
   */
  baseUrl?: string;

  /**
   * Optional pre-built credential cache (expiry tests)
   */
  credentialCache?: CredentialCache;
}

function readEnvCredentials(): DataForSeoCredentials {
  return {
    login: process.env.DATAFORSEO_LOGIN?.trim() || "",
    password: process.env.DATAFORSEO_PASSWORD?.trim() || "",
  };
}

export class DataForSeoClient implements EnrichmentGateway {
  private readonly baseUrl: string;
  private readonly httpRequest: HttpRequestFn;
  private readonly credentials: CredentialCache;

  constructor(config?: DataForSeoClientConfig) {
    const loadCredentials = (): DataForSeoCredentials =>
      config?.credentials ?? readEnvCredentials();

    // Validate credentials are present
    const initial = loadCredentials();
    if (!initial.login || !initial.password) {
      const missing: string[] = [];
      if (!initial.login) missing.push("DATAFORSEO_LOGIN");
      if (!initial.password) missing.push("DATAFORSEO_PASSWORD");
      throw new ConfigError(
        missing[0],
        `DataForSEO authentication configuration missing: ${missing.join(", ")}. ` +
          `Please set these environment variables.`,
      );
    }

    const baseUrl =
      config?.baseUrl ?? process.env.DATAFORSEO_BASE_URL?.trim() ?? DATAFORSEO_DEFAULT_BASE_URL;
    this.baseUrl = (baseUrl || DATAFORSEO_DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.httpRequest = config?.httpRequest ?? defaultHttpRequest;
    this.credentials = config?.credentialCache ?? new CredentialCache(loadCredentials);

    logger.debug("DataForSeoClient initialized", { baseUrl: this.baseUrl });
  }

  async submit(
    kind: PolledTaskKind,
    item: TaskPostItem,
    signal?: AbortSignal,
  ): Promise<SubmitResult> {
    const url = this.buildUrl(DATAFORSEO_KIND_PATHS[kind].taskPost);
    const body = await this.requestObject("POST", url, [item], signal);
    const result = parseSubmitResponse(body);

    logger.debug("DataForSEO task_post response", {
      kind,
      remoteTaskId: result.remoteId,
      statusCode: result.statusCode,
      statusMessage: result.statusMessage,
    });
    return result;
  }

  async listReady(kind: PolledTaskKind, signal?: AbortSignal): Promise<ReadyTaskEntry[]> {
    const url = this.buildUrl(DATAFORSEO_KIND_PATHS[kind].tasksReady);
    const body = await this.requestObject("GET", url, undefined, signal);
    const entries = parseReadyResponse(body);

    logger.debug("DataForSEO tasks_ready fetched", { kind, ready: entries.length });
    return entries;
  }

  async fetch(endpoint: string, signal?: AbortSignal): Promise<FetchResult> {
    const url = this.buildUrl(endpoint);
    const body = await this.requestObject("GET", url, undefined, signal);
    return parseTaskResponse(body);
  }

  async runLive(
    kind: LiveTaskKind,
    item: TaskPostItem,
    signal?: AbortSignal,
  ): Promise<FetchResult> {
    const url = this.buildUrl(DATAFORSEO_LIVE_PATHS[kind]);
    const body = await this.requestObject("POST", url, [item], signal);
    return parseTaskResponse(body);
  }

  resolveTaskGetPath(kind: PolledTaskKind, remoteId: string): string {
    return DATAFORSEO_KIND_PATHS[kind].taskGet.replace("{id}", encodeURIComponent(remoteId));
  }

  /**
   * Absolute URL for a path (absolute URLs pass through)
   */
  private buildUrl(pathOrUrl: string): string {
    if (/^https?:\/\//i.test(pathOrUrl)) {
      return pathOrUrl;
    }
    const path = pathOrUrl.startsWith("/") ? pathOrUrl : `/${pathOrUrl}`;
    return `${this.baseUrl}${path}`;
  }

  /**
   * Perform a request and require a JSON object body
   */
  private async requestObject(
    method: HttpMethod,
    url: string,
    json: JsonValue | undefined,
    signal?: AbortSignal,
  ): Promise<JsonObject> {
    let body: JsonValue | undefined;
    try {
      body = await this.httpRequest<JsonValue | undefined>({
        method,
        url,
        headers: { Authorization: this.credentials.getOrRefresh() },
        json,
        timeoutMs: DATAFORSEO_HTTP_TIMEOUT_MS,
        retry: { maxAttempts: DATAFORSEO_HTTP_MAX_ATTEMPTS },
        signal,
      });
    } catch (error) {
      if (error instanceof HttpError && error.status === 401) {
        this.credentials.invalidate();
      }
      throw error;
    }

    if (body === undefined || !isJsonObject(body)) {
      throw new DataForSeoError("Unexpected non-object response body", url);
    }
    return body;
  }
}
