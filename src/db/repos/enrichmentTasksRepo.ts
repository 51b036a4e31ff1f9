/**
 * Enrichment tasks repository
 *
 * Data access layer for the enrichment_tasks table (the task ledger).
 * Every mutation stamps last_checked_at. Status transitions that must never
 * leave a terminal state carry the guard in their WHERE clause.
 */

import type {
  EnrichmentTaskDbRow,
  EnrichmentTaskInput,
  EnrichmentTaskRow,
  TaskKind,
  TaskStatus,
} from "@/types";
import { TERMINAL_TASK_STATUSES } from "@/constants";
import { getDb } from "@/db";
import { normalizeTaskKind, normalizeTaskStatus } from "@/enrichment/taskKinds";
import { nowIso } from "@/utils";
import * as logger from "@/logger";

const TERMINAL_SQL = TERMINAL_TASK_STATUSES.map((s) => `'${s}'`).join(", ");
const TERMINAL_SUCCESS_SQL = "'Populated', 'CompletedNoData'";

/**
 * Convert a stored row to the typed ledger row
 * Unknown kinds are dropped; unknown statuses read as Error (terminal)
 */
function toTaskRow(row: EnrichmentTaskDbRow): EnrichmentTaskRow | null {
  const kind = normalizeTaskKind(row.kind);
  if (!kind) {
    logger.warn("Skipping ledger row with unknown kind", {
      taskId: row.id,
      kind: row.kind,
    });
    return null;
  }

  return {
    ...row,
    kind,
    status: normalizeTaskStatus(row.status) ?? "Error",
  };
}

function toTaskRows(rows: EnrichmentTaskDbRow[]): EnrichmentTaskRow[] {
  const result: EnrichmentTaskRow[] = [];
  for (const row of rows) {
    const task = toTaskRow(row);
    if (task) {
      result.push(task);
    }
  }
  return result;
}

function placeholders(values: readonly unknown[]): string {
  return values.map(() => "?").join(", ");
}

/**
 * Insert a task, or merge mutable fields onto the row with the same remote id
 *
 * A terminal row keeps its status on merge. created_at is only set on insert.
 *
 * @returns Local row id
 */
export function insertOrMergeTask(input: EnrichmentTaskInput): number {
  const db = getDb();
  const now = nowIso();

  db.prepare(
    `
    INSERT INTO enrichment_tasks (
      remote_task_id, kind, place_id, location_name, status,
      status_code, status_message, endpoint, last_error,
      ready_at, created_at, last_checked_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(remote_task_id) DO UPDATE SET
      kind = excluded.kind,
      place_id = excluded.place_id,
      location_name = COALESCE(excluded.location_name, enrichment_tasks.location_name),
      status = CASE
        WHEN enrichment_tasks.status IN (${TERMINAL_SQL}) THEN enrichment_tasks.status
        ELSE excluded.status
      END,
      status_code = COALESCE(excluded.status_code, enrichment_tasks.status_code),
      status_message = COALESCE(excluded.status_message, enrichment_tasks.status_message),
      endpoint = COALESCE(excluded.endpoint, enrichment_tasks.endpoint),
      last_error = COALESCE(excluded.last_error, enrichment_tasks.last_error),
      ready_at = COALESCE(enrichment_tasks.ready_at, excluded.ready_at),
      last_checked_at = excluded.last_checked_at
  `,
  ).run(
    input.remote_task_id,
    input.kind,
    input.place_id,
    input.location_name ?? null,
    input.status,
    input.status_code ?? null,
    input.status_message ?? null,
    input.endpoint ?? null,
    input.last_error ?? null,
    input.ready_at ?? null,
    input.created_at ?? now,
    now,
  );

  const row = db
    .prepare("SELECT id FROM enrichment_tasks WHERE remote_task_id = ?")
    .get(input.remote_task_id) as { id: number };
  return row.id;
}

/**
 * Insert a task only if its remote id is unknown (ready-list adoption)
 *
 * @returns true when a row was inserted
 */
export function insertTaskIfAbsent(input: EnrichmentTaskInput): boolean {
  const db = getDb();
  const now = nowIso();

  const result = db
    .prepare(
      `
    INSERT INTO enrichment_tasks (
      remote_task_id, kind, place_id, location_name, status,
      status_code, status_message, endpoint, last_error,
      ready_at, created_at, last_checked_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(remote_task_id) DO NOTHING
  `,
    )
    .run(
      input.remote_task_id,
      input.kind,
      input.place_id,
      input.location_name ?? null,
      input.status,
      input.status_code ?? null,
      input.status_message ?? null,
      input.endpoint ?? null,
      input.last_error ?? null,
      input.ready_at ?? null,
      input.created_at ?? now,
      now,
    );

  return result.changes > 0;
}

export function getTaskById(id: number): EnrichmentTaskRow | null {
  const db = getDb();
  const row = db
    .prepare("SELECT * FROM enrichment_tasks WHERE id = ?")
    .get(id) as EnrichmentTaskDbRow | undefined;

  return row ? toTaskRow(row) : null;
}

export function getTaskByRemoteId(remoteTaskId: string): EnrichmentTaskRow | null {
  const db = getDb();
  const row = db
    .prepare("SELECT * FROM enrichment_tasks WHERE remote_task_id = ?")
    .get(remoteTaskId) as EnrichmentTaskDbRow | undefined;

  return row ? toTaskRow(row) : null;
}

export function taskExistsByRemoteId(remoteTaskId: string): boolean {
  const db = getDb();
  const row = db
    .prepare("SELECT 1 AS found FROM enrichment_tasks WHERE remote_task_id = ?")
    .get(remoteTaskId);
  return row !== undefined;
}

/**
 * List tasks not in a terminal status, optionally restricted to kinds
 */
export function listActiveTasks(kinds?: readonly TaskKind[]): EnrichmentTaskRow[] {
  const db = getDb();

  if (kinds && kinds.length === 0) {
    return [];
  }

  const kindClause = kinds ? `AND kind IN (${placeholders(kinds)})` : "";
  const rows = db
    .prepare(
      `
      SELECT * FROM enrichment_tasks
      WHERE status NOT IN (${TERMINAL_SQL}) ${kindClause}
      ORDER BY id ASC
    `,
    )
    .all(...(kinds ?? [])) as EnrichmentTaskDbRow[];

  return toTaskRows(rows);
}

export function listTasksByStatus(
  status: TaskStatus,
  kind?: TaskKind | null,
): EnrichmentTaskRow[] {
  const db = getDb();

  const rows = kind
    ? (db
        .prepare(
          "SELECT * FROM enrichment_tasks WHERE status = ? AND kind = ? ORDER BY id ASC",
        )
        .all(status, kind) as EnrichmentTaskDbRow[])
    : (db
        .prepare("SELECT * FROM enrichment_tasks WHERE status = ? ORDER BY id ASC")
        .all(status) as EnrichmentTaskDbRow[]);

  return toTaskRows(rows);
}

/**
 * Most recent non-Error task per kind for a place (by created_at, then id)
 *
 * Error rows are excluded so a failed submission never blocks resubmission.
 */
export function listLatestByKind(
  placeId: string,
): Partial<Record<TaskKind, EnrichmentTaskRow>> {
  const db = getDb();
  const rows = db
    .prepare(
      `
      SELECT * FROM enrichment_tasks
      WHERE place_id = ? AND status != 'Error'
      ORDER BY created_at DESC, id DESC
    `,
    )
    .all(placeId) as EnrichmentTaskDbRow[];

  const latest: Partial<Record<TaskKind, EnrichmentTaskRow>> = {};
  for (const task of toTaskRows(rows)) {
    if (!latest[task.kind]) {
      latest[task.kind] = task;
    }
  }
  return latest;
}

/**
 * Most recent non-terminal task for a place (callback tag resolution)
 */
export function findLatestActiveTaskForPlace(placeId: string): EnrichmentTaskRow | null {
  const db = getDb();
  const row = db
    .prepare(
      `
      SELECT * FROM enrichment_tasks
      WHERE place_id = ? AND status NOT IN (${TERMINAL_SQL})
      ORDER BY created_at DESC, id DESC
      LIMIT 1
    `,
    )
    .get(placeId) as EnrichmentTaskDbRow | undefined;

  return row ? toTaskRow(row) : null;
}

/**
 * Latest tasks for the operator listing, newest first
 */
export function listLatestTasks(
  limit: number,
  kind?: TaskKind | null,
  status?: TaskStatus | null,
): EnrichmentTaskRow[] {
  const db = getDb();
  const conditions: string[] = [];
  const values: Array<string | number> = [];

  if (kind) {
    conditions.push("kind = ?");
    values.push(kind);
  }
  if (status) {
    conditions.push("status = ?");
    values.push(status);
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
  values.push(limit);

  const rows = db
    .prepare(
      `SELECT * FROM enrichment_tasks ${where} ORDER BY created_at DESC, id DESC LIMIT ?`,
    )
    .all(...values) as EnrichmentTaskDbRow[];

  return toTaskRows(rows);
}

export type MarkReadyFields = {
  endpoint?: string | null;
  statusCode?: number | null;
  statusMessage?: string | null;
};

/**
 * Transition a non-terminal task to Ready
 * ready_at is only set on the first transition.
 *
 * @returns true when the row changed
 */
export function markTaskReady(id: number, fields: MarkReadyFields = {}): boolean {
  const db = getDb();
  const now = nowIso();

  const result = db
    .prepare(
      `
      UPDATE enrichment_tasks SET
        status = 'Ready',
        endpoint = COALESCE(?, endpoint),
        status_code = COALESCE(?, status_code),
        status_message = COALESCE(?, status_message),
        ready_at = COALESCE(ready_at, ?),
        last_checked_at = ?
      WHERE id = ? AND status NOT IN (${TERMINAL_SQL})
    `,
    )
    .run(
      fields.endpoint ?? null,
      fields.statusCode ?? null,
      fields.statusMessage ?? null,
      now,
      now,
      id,
    );

  return result.changes > 0;
}

/**
 * Transition (or re-stamp) a non-terminal task as Pending
 */
export function markTaskPending(
  id: number,
  statusCode?: number | null,
  statusMessage?: string | null,
): boolean {
  const db = getDb();

  const result = db
    .prepare(
      `
      UPDATE enrichment_tasks SET
        status = 'Pending',
        status_code = COALESCE(?, status_code),
        status_message = COALESCE(?, status_message),
        last_checked_at = ?
      WHERE id = ? AND status NOT IN (${TERMINAL_SQL})
    `,
    )
    .run(statusCode ?? null, statusMessage ?? null, nowIso(), id);

  return result.changes > 0;
}

/**
 * Record a successful population (terminal success)
 */
export function markTaskPopulated(
  id: number,
  statusCode: number | null,
  statusMessage: string | null,
  itemCount: number,
): void {
  const db = getDb();
  const now = nowIso();

  db.prepare(
    `
    UPDATE enrichment_tasks SET
      status = 'Populated',
      status_code = ?,
      status_message = ?,
      ready_at = COALESCE(ready_at, ?),
      populated_at = ?,
      last_attempted_populate_at = ?,
      last_populate_count = ?,
      last_error = NULL,
      last_checked_at = ?
    WHERE id = ?
  `,
  ).run(statusCode, statusMessage, now, now, now, itemCount, now, id);
}

/**
 * Record a completed job with zero result items (terminal success)
 */
export function markTaskCompletedNoData(
  id: number,
  statusCode: number | null,
  statusMessage: string | null,
): void {
  const db = getDb();
  const now = nowIso();

  db.prepare(
    `
    UPDATE enrichment_tasks SET
      status = 'CompletedNoData',
      status_code = ?,
      status_message = ?,
      ready_at = COALESCE(ready_at, ?),
      populated_at = ?,
      last_attempted_populate_at = ?,
      last_populate_count = 0,
      last_error = NULL,
      last_checked_at = ?
    WHERE id = ?
  `,
  ).run(statusCode, statusMessage, now, now, now, now, id);
}

/**
 * Transition to Error (terminal failure); terminal-success rows are left alone
 *
 * @returns true when the row changed
 */
export function markTaskError(
  id: number,
  statusCode: number | null,
  statusMessage: string | null,
): boolean {
  const db = getDb();

  const result = db
    .prepare(
      `
      UPDATE enrichment_tasks SET
        status = 'Error',
        status_code = COALESCE(?, status_code),
        status_message = ?,
        last_error = ?,
        last_checked_at = ?
      WHERE id = ? AND status NOT IN (${TERMINAL_SUCCESS_SQL})
    `,
    )
    .run(statusCode, statusMessage, statusMessage, nowIso(), id);

  return result.changes > 0;
}

/**
 * Stamp the start of a population attempt
 */
export function markPopulateAttempt(id: number): void {
  const db = getDb();
  const now = nowIso();
  db.prepare(
    "UPDATE enrichment_tasks SET last_attempted_populate_at = ?, last_checked_at = ? WHERE id = ?",
  ).run(now, now, id);
}

/**
 * Record a population failure without changing status
 */
export function recordPopulateFailure(id: number, message: string): void {
  const db = getDb();
  const now = nowIso();
  db.prepare(
    `
    UPDATE enrichment_tasks SET
      last_error = ?,
      last_attempted_populate_at = ?,
      last_checked_at = ?
    WHERE id = ?
  `,
  ).run(message, now, now, id);
}

export type CallbackUpdate = {
  status: TaskStatus;
  statusCode: number | null;
  statusMessage: string | null;
  endpoint: string | null;
  callbackTaskId: string | null;
};

/**
 * Apply a callback notification
 *
 * callback_received_at / callback_task_id are always stamped; status fields
 * only change on non-terminal rows.
 *
 * @returns The row after the update
 */
export function recordCallback(id: number, update: CallbackUpdate): EnrichmentTaskRow | null {
  const db = getDb();
  const now = nowIso();

  db.prepare(
    `
    UPDATE enrichment_tasks SET
      callback_received_at = @now,
      callback_task_id = COALESCE(@callbackTaskId, callback_task_id),
      last_checked_at = @now,
      status = CASE WHEN status IN (${TERMINAL_SQL}) THEN status ELSE @status END,
      status_code = CASE
        WHEN status IN (${TERMINAL_SQL}) THEN status_code
        ELSE COALESCE(@statusCode, status_code)
      END,
      status_message = CASE
        WHEN status IN (${TERMINAL_SQL}) THEN status_message
        ELSE COALESCE(@statusMessage, status_message)
      END,
      endpoint = CASE
        WHEN status IN (${TERMINAL_SQL}) THEN endpoint
        ELSE COALESCE(@endpoint, endpoint)
      END,
      ready_at = CASE
        WHEN status NOT IN (${TERMINAL_SQL}) AND @status = 'Ready' THEN COALESCE(ready_at, @now)
        ELSE ready_at
      END,
      last_error = CASE
        WHEN status NOT IN (${TERMINAL_SQL}) AND @status = 'Error' THEN @statusMessage
        ELSE last_error
      END
    WHERE id = @id
  `,
  ).run({
    id,
    now,
    status: update.status,
    statusCode: update.statusCode,
    statusMessage: update.statusMessage,
    endpoint: update.endpoint,
    callbackTaskId: update.callbackTaskId,
  });

  return getTaskById(id);
}

/**
 * Purge Error rows (maintenance), optionally for one kind
 *
 * @returns Number of deleted rows
 */
export function deleteErrorTasks(kind?: TaskKind | null): number {
  const db = getDb();

  const result = kind
    ? db.prepare("DELETE FROM enrichment_tasks WHERE status = 'Error' AND kind = ?").run(kind)
    : db.prepare("DELETE FROM enrichment_tasks WHERE status = 'Error'").run();

  return result.changes;
}
