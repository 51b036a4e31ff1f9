import { describe, it, expect } from "vitest";
import { errorMessage, isAbortError, throwIfAborted } from "@/utils";

describe("isAbortError", () => {
  it("should recognise errors named AbortError", () => {
    const error = new Error("aborted");
    error.name = "AbortError";

    expect(isAbortError(error)).toBe(true);
    expect(isAbortError({ name: "AbortError" })).toBe(true);
  });

  it("should reject other errors and non-objects", () => {
    expect(isAbortError(new TypeError("fetch failed"))).toBe(false);
    expect(isAbortError("AbortError")).toBe(false);
    expect(isAbortError(null)).toBe(false);
  });

  it("should match what throwIfAborted raises", () => {
    const controller = new AbortController();
    controller.abort();

    let caught: unknown = null;
    try {
      throwIfAborted(controller.signal);
    } catch (error) {
      caught = error;
    }

    expect(isAbortError(caught)).toBe(true);
    expect(errorMessage(caught)).toBe("The operation was aborted");
  });
});
