/**
 * Callback server entrypoint
 *
 * Serves the provider postback endpoint and the operator endpoints.
 *
 * Usage:
 *   npm run server
 *
 * Environment variables:
 *   - DATAFORSEO_LOGIN / DATAFORSEO_PASSWORD: API credentials (required)
 *   - PORT / HOST: Bind address (defaults 3000 / 0.0.0.0)
 *   - DB_PATH, LOG_LEVEL
 */

import "dotenv/config";
import { loadEnrichmentConfig } from "@/config";
import { applyPendingMigrations, closeDb, openDb } from "@/db";
import { createEnrichmentOrchestrator } from "@/enrichment";
import { buildServer } from "@/server/app";
import { errorMessage } from "@/utils";
import * as logger from "@/logger";

async function start(): Promise<void> {
  const config = loadEnrichmentConfig();
  applyPendingMigrations(openDb());

  const server = await buildServer({ orchestrator: createEnrichmentOrchestrator(config) });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info("Shutting down server", { signal });
    server
      .close()
      .then(() => {
        closeDb();
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error("Server shutdown failed", { error: errorMessage(error) });
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await server.listen({ port: config.server.port, host: config.server.host });
  logger.info("Server listening", { port: config.server.port, host: config.server.host });
}

start().catch((error: unknown) => {
  logger.error("Failed to start server", {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
