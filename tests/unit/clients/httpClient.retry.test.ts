/**
 * Unit tests for httpRequest retry decisions (fetch stubbed)
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { httpRequest, HttpError } from "@/clients/http";

function abortError(): Error {
  const error = new Error("This operation was aborted");
  error.name = "AbortError";
  return error;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

describe("httpRequest retries", () => {
  const mockFetch = vi.fn();

  beforeEach(() => {
    vi.stubGlobal("fetch", mockFetch);
    mockFetch.mockReset();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should retry a GET whose attempt was aborted by the timeout", async () => {
    mockFetch.mockRejectedValueOnce(abortError()).mockResolvedValueOnce(jsonResponse({ ok: true }));

    const body = await httpRequest<{ ok: boolean }>({
      method: "GET",
      url: "https://provider.test/v3/ready",
      retry: { maxAttempts: 2, baseDelayMs: 0 },
    });

    expect(body).toEqual({ ok: true });
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("should not retry once the caller has cancelled", async () => {
    const controller = new AbortController();
    mockFetch.mockImplementationOnce(async () => {
      controller.abort();
      throw abortError();
    });

    await expect(
      httpRequest({
        method: "GET",
        url: "https://provider.test/v3/ready",
        retry: { maxAttempts: 3, baseDelayMs: 0 },
        signal: controller.signal,
      }),
    ).rejects.toThrow("This operation was aborted");
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it("should not retry a POST", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: "busy" }, 503));

    await expect(
      httpRequest({
        method: "POST",
        url: "https://provider.test/v3/task_post",
        json: [{ keyword: "x" }],
        retry: { maxAttempts: 3, baseDelayMs: 0 },
      }),
    ).rejects.toBeInstanceOf(HttpError);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });
});
