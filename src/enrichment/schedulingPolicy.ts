/**
 * Scheduling policy
 *
 * Decides per (place, kind) whether a fresh submission is due, comparing the
 * age of the latest non-Error ledger row against the kind's refresh threshold.
 */

import type { EnrichmentTaskRow, ScheduleDecision, TaskKind } from "@/types";
import { MS_PER_HOUR } from "@/constants";
import { parseTimestamp } from "@/utils";

export type LatestTasksByKind = Partial<Record<TaskKind, EnrichmentTaskRow>>;

/**
 * Evaluate one kind for a place
 *
 * A threshold of 0 hours, a missing row or an unparseable created_at is due.
 *
 * @param latestByKind - Output of listLatestByKind(placeId)
 * @param thresholds - Refresh threshold per kind, in hours
 */
export function evaluateSchedule(
  latestByKind: LatestTasksByKind,
  kind: TaskKind,
  thresholds: Record<TaskKind, number>,
  now: Date = new Date(),
): ScheduleDecision {
  const latest = latestByKind[kind];
  const lastCreatedAt = latest?.created_at ?? null;
  const thresholdHours = thresholds[kind];

  if (thresholdHours <= 0 || !lastCreatedAt) {
    return { kind, due: true, remainingMs: 0, lastCreatedAt };
  }

  const created = parseTimestamp(lastCreatedAt);
  if (!created) {
    return { kind, due: true, remainingMs: 0, lastCreatedAt };
  }

  const remainingMs = created.getTime() + thresholdHours * MS_PER_HOUR - now.getTime();
  if (remainingMs <= 0) {
    return { kind, due: true, remainingMs: 0, lastCreatedAt };
  }

  return { kind, due: false, remainingMs, lastCreatedAt };
}

/**
 * Evaluate every requested kind, preserving request order
 */
export function selectDueKinds(
  latestByKind: LatestTasksByKind,
  kinds: readonly TaskKind[],
  thresholds: Record<TaskKind, number>,
  now: Date = new Date(),
): ScheduleDecision[] {
  return kinds.map((kind) => evaluateSchedule(latestByKind, kind, thresholds, now));
}

/**
 * Remaining cooldown as "Xh Ym" for logs
 */
export function formatCooldown(remainingMs: number): string {
  const totalMinutes = Math.ceil(remainingMs / 60_000);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${hours}h ${minutes}m`;
}
