/**
 * Migration CLI entrypoint
 *
 * Usage:
 *   npm run migrate
 */

import "dotenv/config";
import { runMigrations } from "./migrate";
import * as logger from "@/logger";

try {
  runMigrations();
} catch (error) {
  logger.error("Migration failed", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
}
