/**
 * Timestamp helpers
 *
 * Every persisted timestamp is an ISO-8601 UTC string so that lexical order
 * matches chronological order in SQL.
 */

export function nowIso(now: Date = new Date()): string {
  return now.toISOString();
}

/**
 * Parse a stored timestamp, null when missing or unparseable
 */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) {
    return null;
  }
  const date = new Date(value);
  return isNaN(date.getTime()) ? null : date;
}
