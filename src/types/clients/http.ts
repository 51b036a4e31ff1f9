/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

/**
 * How the response body is decoded
 * - json: parsed JSON (text fallback for non-JSON content types)
 * - buffer: raw bytes (asset downloads)
 */
export type HttpResponseType = "json" | "buffer";

/**
 * Retry configuration for HTTP requests
 */
export interface HttpRetryConfig {
  /** Maximum number of attempts (including initial request). Default from constants. */
  maxAttempts?: number;
  /** Base delay in ms for exponential backoff. Default from constants. */
  baseDelayMs?: number;
  /** Maximum delay in ms between retries. Default from constants. */
  maxDelayMs?: number;
  /** Maximum time in ms to wait for Retry-After header. Default from constants. */
  maxRetryAfterMs?: number;
}

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean | Array<string | number | boolean>>;
  json?: unknown;
  timeoutMs?: number;
  retry?: HttpRetryConfig;
  responseType?: HttpResponseType;
  /** Caller cancellation; aborts the in-flight attempt and stops retries */
  signal?: AbortSignal;
}

/**
 * HTTP request function type for dependency injection
 */
export type HttpRequestFn = <T>(req: HttpRequest) => Promise<T>;

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}
