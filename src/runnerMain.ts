/**
 * Runner entrypoint: reconciles the ledger and populates Ready tasks
 *
 * Supports two modes:
 * - once: One reconcile + populate cycle, then exits
 * - forever: Repeats cycles every RUNNER_INTERVAL_MS until SIGINT/SIGTERM
 *
 * Usage:
 *   RUN_MODE=once npm run runner
 *   RUN_MODE=forever npm run runner
 *
 * Environment variables:
 *   - DATAFORSEO_LOGIN / DATAFORSEO_PASSWORD: API credentials (required)
 *   - RUN_MODE: Execution mode (once|forever, defaults to once)
 *   - RUNNER_INTERVAL_MS: Sleep between cycles in forever mode
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 *   - DB_PATH: Path to SQLite database file (optional, defaults to data/app.db)
 */

import "dotenv/config";
import type { RunMode } from "@/types";
import { loadEnrichmentConfig } from "@/config";
import { applyPendingMigrations, closeDb, openDb } from "@/db";
import { createEnrichmentOrchestrator } from "@/enrichment";
import { runForever, runOnce } from "@/orchestration/runner";
import { errorMessage } from "@/utils";
import * as logger from "@/logger";

function parseRunMode(raw: string | undefined): RunMode | null {
  const mode = (raw || "once").trim().toLowerCase();
  return mode === "once" || mode === "forever" ? mode : null;
}

async function main(): Promise<number> {
  const runMode = parseRunMode(process.env.RUN_MODE);
  if (!runMode) {
    logger.error("Invalid RUN_MODE", {
      runMode: process.env.RUN_MODE,
      validModes: ["once", "forever"],
    });
    return 1;
  }

  const config = loadEnrichmentConfig();
  applyPendingMigrations(openDb());
  const orchestrator = createEnrichmentOrchestrator(config);

  try {
    if (runMode === "forever") {
      await runForever(orchestrator, { intervalMs: config.runner.intervalMs });
      return 0;
    }

    logger.info("Starting runner (single pass mode)");
    const result = await runOnce(orchestrator);
    logger.info("Runner finished", { ...result });
    return result.failed > 0 ? 1 : 0;
  } finally {
    closeDb();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    logger.error("Runner failed with fatal error", {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  });
