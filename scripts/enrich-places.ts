#!/usr/bin/env tsx
/**
 * Submit enrichment jobs for stored places
 *
 * Usage:
 *   npm run enrich                                  # every place, every kind
 *   npm run enrich -- P1 P2 --kinds=reviews,info    # selected places and kinds
 */

import "dotenv/config";
import type { TaskKind } from "@/types";
import { ALL_TASK_KINDS } from "@/constants";
import { loadEnrichmentConfig } from "@/config";
import { applyPendingMigrations, closeDb, getPlaceById, listPlaces, openDb } from "@/db";
import {
  createEnrichmentOrchestrator,
  enrichmentTargetFromPlace,
  normalizeTaskKind,
} from "@/enrichment";

function parseKinds(arg: string | undefined): TaskKind[] {
  if (!arg) {
    return [...ALL_TASK_KINDS];
  }

  const kinds: TaskKind[] = [];
  for (const raw of arg.split(",")) {
    const kind = normalizeTaskKind(raw);
    if (!kind) {
      throw new Error(`Unknown kind: ${raw}`);
    }
    kinds.push(kind);
  }
  return kinds;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const kindsArg = args.find((arg) => arg.startsWith("--kinds="))?.slice("--kinds=".length);
  const placeIds = args.filter((arg) => !arg.startsWith("--"));

  const config = loadEnrichmentConfig();
  applyPendingMigrations(openDb());

  const places =
    placeIds.length > 0
      ? placeIds.flatMap((id) => {
          const place = getPlaceById(id);
          if (!place) {
            console.log(`Place ${id} not found, skipping`);
            return [];
          }
          return [place];
        })
      : listPlaces();

  console.log(`Enriching ${places.length} place(s)...`);
  const orchestrator = createEnrichmentOrchestrator(config);
  const result = await orchestrator.enrichPlaces(
    places.map(enrichmentTargetFromPlace),
    parseKinds(kindsArg),
  );

  console.log(
    `Submitted: ${result.submitted}, skipped: ${result.skipped}, failed: ${result.failed}, touched: ${result.touched}`,
  );
}

main()
  .catch((error: unknown) => {
    console.error("Enrichment failed:", error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  })
  .finally(() => closeDb());
