/**
 * Database migration runner
 *
 * Applies SQL migrations from migrations/ directory in order.
 */

import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import { openDb, closeDb } from "./connection";
import * as logger from "@/logger";

function getMigrationsDir(): string {
  return join(process.cwd(), "migrations");
}

/**
 * Ensure schema_migrations table exists
 */
function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

/**
 * Get list of applied migrations
 */
function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db.prepare("SELECT version FROM schema_migrations").all() as {
    version: string;
  }[];
  return new Set(rows.map((r) => r.version));
}

/**
 * Get pending migrations from migrations/ directory
 */
function getPendingMigrations(appliedMigrations: Set<string>): string[] {
  let files: string[];
  try {
    files = readdirSync(getMigrationsDir());
  } catch {
    // No migrations directory yet
    return [];
  }

  const sqlFiles = files.filter((f) => f.endsWith(".sql")).sort();

  return sqlFiles.filter((f) => !appliedMigrations.has(f));
}

/**
 * Apply a single migration file atomically
 */
function applyMigration(db: Database.Database, filename: string): void {
  const sql = readFileSync(join(getMigrationsDir(), filename), "utf-8");

  // Wrap migration + recording in a transaction
  const transaction = db.transaction(() => {
    db.exec(sql);
    db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(
      filename,
    );
  });

  transaction();
}

/**
 * Apply every pending migration to the given connection
 *
 * @returns Filenames applied, in order
 */
export function applyPendingMigrations(db: Database.Database): string[] {
  ensureMigrationsTable(db);

  const pendingMigrations = getPendingMigrations(getAppliedMigrations(db));
  for (const migration of pendingMigrations) {
    logger.debug("Applying migration", { migration });
    applyMigration(db, migration);
  }

  return pendingMigrations;
}

/**
 * Run all pending migrations against the configured database, then close it
 */
export function runMigrations(): void {
  const db = openDb();

  try {
    const applied = applyPendingMigrations(db);

    if (applied.length === 0) {
      logger.info("No pending migrations");
      return;
    }

    logger.info("Migrations complete", { applied });
  } finally {
    closeDb();
  }
}
