/**
 * Runner/orchestration constants
 */

/**
 * Default sleep between reconciliation cycles (milliseconds)
 */
export const DEFAULT_RUNNER_INTERVAL_MS = 300_000; // 5 minutes

/**
 * Sleep after a cycle fails unexpectedly before trying again
 */
export const RUNNER_ERROR_BACKOFF_MS = 120_000; // 2 minutes

export const DEFAULT_SERVER_PORT = 3000;
export const DEFAULT_SERVER_HOST = "0.0.0.0";
