/**
 * Error utilities
 */

/**
 * Check if an error is a cancellation (AbortController / AbortSignal)
 */
export function isAbortError(err: unknown): boolean {
  if (err instanceof Error) {
    return err.name === "AbortError";
  }
  // DOMException is an Error subclass on Node 20, but be lenient with plain objects
  return (
    typeof err === "object" &&
    err !== null &&
    "name" in err &&
    err.name === "AbortError"
  );
}

/**
 * Throw the signal's abort reason if it has been cancelled
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    const abortError = new Error("The operation was aborted");
    abortError.name = "AbortError";
    throw abortError;
  }
}

/**
 * Extract a human-readable message from an unknown error
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/**
 * Truncate a message to at most maxLength characters (null passes through)
 */
export function truncateMessage(
  message: string | null | undefined,
  maxLength: number,
): string | null {
  if (message === null || message === undefined) {
    return null;
  }
  return message.length > maxLength ? message.substring(0, maxLength) : message;
}
