/**
 * Unit tests for the staleness policy
 */

import { describe, it, expect } from "vitest";
import type { EnrichmentTaskRow, TaskKind } from "@/types";
import { evaluateSchedule, formatCooldown, selectDueKinds } from "@/enrichment/schedulingPolicy";

const THRESHOLDS: Record<TaskKind, number> = {
  reviews: 24,
  my_business_info: 168,
  my_business_updates: 24,
  questions_and_answers: 0,
  social_profiles: 24,
};

function taskRow(kind: TaskKind, createdAt: string): EnrichmentTaskRow {
  return {
    id: 1,
    remote_task_id: `${kind}-1`,
    kind,
    place_id: "P1",
    location_name: null,
    status: "Pending",
    status_code: 20100,
    status_message: "Task Created.",
    endpoint: null,
    created_at: createdAt,
    last_checked_at: null,
    ready_at: null,
    populated_at: null,
    last_attempted_populate_at: null,
    last_populate_count: null,
    callback_received_at: null,
    callback_task_id: null,
    last_error: null,
  };
}

const NOW = new Date("2024-05-10T12:00:00.000Z");

describe("evaluateSchedule", () => {
  it("should be due when no task exists for the kind", () => {
    expect(evaluateSchedule({}, "reviews", THRESHOLDS, NOW)).toEqual({
      kind: "reviews",
      due: true,
      remainingMs: 0,
      lastCreatedAt: null,
    });
  });

  it("should not be due inside the threshold and report the remaining cooldown", () => {
    const latest = { reviews: taskRow("reviews", "2024-05-10T02:00:00.000Z") };

    const decision = evaluateSchedule(latest, "reviews", THRESHOLDS, NOW);

    expect(decision.due).toBe(false);
    // created 10h ago, threshold 24h
    expect(decision.remainingMs).toBe(14 * 60 * 60 * 1000);
    expect(decision.lastCreatedAt).toBe("2024-05-10T02:00:00.000Z");
  });

  it("should be due once the threshold has elapsed", () => {
    const latest = { reviews: taskRow("reviews", "2024-05-09T12:00:00.000Z") };
    expect(evaluateSchedule(latest, "reviews", THRESHOLDS, NOW).due).toBe(true);
  });

  it("should always be due with a zero threshold", () => {
    const latest = {
      questions_and_answers: taskRow("questions_and_answers", "2024-05-10T11:59:00.000Z"),
    };
    expect(evaluateSchedule(latest, "questions_and_answers", THRESHOLDS, NOW).due).toBe(true);
  });

  it("should be due when created_at cannot be parsed", () => {
    const latest = { reviews: taskRow("reviews", "not-a-date") };
    expect(evaluateSchedule(latest, "reviews", THRESHOLDS, NOW).due).toBe(true);
  });
});

describe("selectDueKinds", () => {
  it("should keep request order and evaluate kinds independently", () => {
    const latest = {
      my_business_info: taskRow("my_business_info", "2024-05-08T12:00:00.000Z"),
    };

    const decisions = selectDueKinds(
      latest,
      ["my_business_info", "reviews"],
      THRESHOLDS,
      NOW,
    );

    expect(decisions.map((d) => [d.kind, d.due])).toEqual([
      ["my_business_info", false],
      ["reviews", true],
    ]);
  });
});

describe("formatCooldown", () => {
  it("should render hours and minutes, rounding minutes up", () => {
    expect(formatCooldown(14 * 60 * 60 * 1000)).toBe("14h 0m");
    expect(formatCooldown(90 * 60 * 1000 + 1)).toBe("1h 31m");
  });
});
