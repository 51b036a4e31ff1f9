/**
 * Runner core: periodic reconciliation and bulk population
 *
 * Each cycle polls the ready-lists (reconcile) and then populates every
 * Ready task. runForever repeats cycles until SIGINT/SIGTERM.
 */

import type { RunCycleResult } from "@/types";
import type { EnrichmentOrchestrator } from "@/enrichment";
import { RUNNER_ERROR_BACKOFF_MS } from "@/constants";
import { errorMessage } from "@/utils";
import * as logger from "@/logger";

export type CycleOrchestrator = Pick<EnrichmentOrchestrator, "reconcile" | "populateReadyTasks">;

export interface RunForeverOptions {
  intervalMs: number;
  /**
   * Sleep after a failed cycle (defaults to RUNNER_ERROR_BACKOFF_MS)
   */
  errorBackoffMs?: number;
  /**
   * Stops the loop after the current cycle (process signals do the same)
   */
  stopSignal?: AbortSignal;
}

/**
 * Sleep that ends early when the stop signal fires
 */
function sleep(ms: number, stopSignal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (stopSignal.aborted) {
      resolve();
      return;
    }
    const onStop = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      stopSignal.removeEventListener("abort", onStop);
      resolve();
    }, ms);
    stopSignal.addEventListener("abort", onStop, { once: true });
  });
}

/**
 * One cycle: reconcile, then populate all Ready tasks
 */
export async function runOnce(
  orchestrator: CycleOrchestrator,
  signal?: AbortSignal,
): Promise<RunCycleResult> {
  const touched = await orchestrator.reconcile(signal);
  const populated = await orchestrator.populateReadyTasks(null, signal);

  return {
    touched,
    attempted: populated.attempted,
    succeeded: populated.succeeded,
    failed: populated.failed,
    itemCount: populated.itemCount,
  };
}

export async function runForever(
  orchestrator: CycleOrchestrator,
  options: RunForeverOptions,
): Promise<void> {
  logger.info("Starting continuous runner (forever mode)", { intervalMs: options.intervalMs });

  const stop = new AbortController();
  const forwardStop = () => stop.abort();
  options.stopSignal?.addEventListener("abort", forwardStop, { once: true });
  if (options.stopSignal?.aborted) {
    stop.abort();
  }

  const handleShutdown = (signal: NodeJS.Signals) => {
    if (stop.signal.aborted) {
      logger.warn("Forced shutdown - exiting immediately");
      process.exit(1);
    }
    logger.info("Shutdown signal received, will stop after current cycle", { signal });
    stop.abort();
  };

  process.on("SIGINT", handleShutdown);
  process.on("SIGTERM", handleShutdown);

  let cycleCount = 0;

  try {
    while (!stop.signal.aborted) {
      cycleCount++;

      try {
        logger.info("Starting runner cycle", { cycleCount });
        const result = await runOnce(orchestrator);
        logger.info("Runner cycle completed", { cycleCount, ...result });
      } catch (error) {
        const backoffMs = options.errorBackoffMs ?? RUNNER_ERROR_BACKOFF_MS;
        logger.error("Runner cycle failed with error", {
          cycleCount,
          error: errorMessage(error),
          stack: error instanceof Error ? error.stack : undefined,
        });
        logger.info("Sleeping before retry after error", { sleepMs: backoffMs });
        await sleep(backoffMs, stop.signal);
        continue;
      }

      if (stop.signal.aborted) {
        break;
      }

      logger.info("Cycle complete, sleeping before next iteration", {
        cycleCount,
        sleepMs: options.intervalMs,
      });
      await sleep(options.intervalMs, stop.signal);
    }
  } finally {
    process.off("SIGINT", handleShutdown);
    process.off("SIGTERM", handleShutdown);
    options.stopSignal?.removeEventListener("abort", forwardStop);
  }

  logger.info("Continuous runner stopped", { totalCycles: cycleCount });
}
