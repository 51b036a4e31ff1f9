/**
 * HTTP client public API
 */

export { httpRequest } from "./httpClient";
export { HttpError } from "./httpError";
export type {
  HttpRequest,
  HttpRequestFn,
  HttpMethod,
  HttpErrorDetails,
  HttpRetryConfig,
  HttpResponseType,
} from "@/types";
