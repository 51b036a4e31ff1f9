/**
 * Integration tests for the reconciliation loop
 *
 * FakeEnrichmentGateway stands in for the provider; the ledger is a real
 * migrated SQLite database.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { ReadyTaskEntry } from "@/types";
import { createTestDbSync, type TestDbHarness } from "../../helpers/testDb";
import { FakeEnrichmentGateway } from "../../helpers/fakeGateway";
import { reconcileTasks } from "@/enrichment/reconcile";
import {
  getTaskById,
  getTaskByRemoteId,
  insertOrMergeTask,
  listLatestTasks,
  markTaskPopulated,
  upsertPlace,
} from "@/db";

function readyEntry(remoteId: string, overrides: Partial<ReadyTaskEntry> = {}): ReadyTaskEntry {
  return {
    remoteId,
    endpoint: `/v3/business_data/google/reviews/task_get/${remoteId}`,
    statusCode: 20000,
    statusMessage: "Ok.",
    tag: "P1",
    ...overrides,
  };
}

describe("reconcileTasks", () => {
  let harness: TestDbHarness;
  let gateway: FakeEnrichmentGateway;

  beforeEach(() => {
    harness = createTestDbSync();
    gateway = new FakeEnrichmentGateway();
    upsertPlace({ place_id: "P1", display_name: "Corner Bakery", location_name: "London" });
  });

  afterEach(() => {
    harness.cleanup();
  });

  it("should query every polled kind's ready-list", async () => {
    await reconcileTasks({ gateway });

    expect(gateway.listReadyCalls).toEqual([
      "reviews",
      "my_business_info",
      "my_business_updates",
      "questions_and_answers",
    ]);
  });

  it("should move a listed task to Ready with its endpoint", async () => {
    const id = insertOrMergeTask({ remote_task_id: "r-1", kind: "reviews", place_id: "P1", status: "Created" });
    gateway.setReady("reviews", [readyEntry("r-1")]);

    const touched = await reconcileTasks({ gateway });

    const row = getTaskById(id);
    expect(touched).toBe(1);
    expect(row?.status).toBe("Ready");
    expect(row?.endpoint).toBe("/v3/business_data/google/reviews/task_get/r-1");
    expect(row?.ready_at).not.toBe(null);
  });

  it("should resolve the endpoint when the ready entry has none", async () => {
    const id = insertOrMergeTask({ remote_task_id: "r-1", kind: "reviews", place_id: "P1", status: "Pending" });
    gateway.setReady("reviews", [readyEntry("r-1", { endpoint: null })]);

    await reconcileTasks({ gateway });

    expect(getTaskById(id)?.endpoint).toBe("/v3/business_data/google/reviews/task_get/r-1");
  });

  it("should move unlisted Created tasks to Pending and leave Ready tasks alone", async () => {
    const created = insertOrMergeTask({ remote_task_id: "r-1", kind: "reviews", place_id: "P1", status: "Created" });
    const ready = insertOrMergeTask({
      remote_task_id: "r-2",
      kind: "reviews",
      place_id: "P1",
      status: "Ready",
      endpoint: "/cached",
    });

    const touched = await reconcileTasks({ gateway });

    expect(touched).toBe(1);
    expect(getTaskById(created)?.status).toBe("Pending");
    expect(getTaskById(ready)?.status).toBe("Ready");
    expect(getTaskById(ready)?.endpoint).toBe("/cached");
  });

  it("should move a task to Error when its ready entry reports failure", async () => {
    const id = insertOrMergeTask({ remote_task_id: "r-1", kind: "reviews", place_id: "P1", status: "Pending" });
    gateway.setReady("reviews", [readyEntry("r-1", { statusCode: 40400, statusMessage: "Not found." })]);

    await reconcileTasks({ gateway });

    const row = getTaskById(id);
    expect(row?.status).toBe("Error");
    expect(row?.last_error).toBe("Not found.");
  });

  it("should adopt an unknown ready task for a known place exactly once", async () => {
    gateway.setReady("reviews", [readyEntry("r-new")]);

    const first = await reconcileTasks({ gateway });
    const second = await reconcileTasks({ gateway });

    const adopted = getTaskByRemoteId("r-new");
    expect(first).toBe(1);
    expect(adopted?.status).toBe("Ready");
    expect(adopted?.kind).toBe("reviews");
    expect(adopted?.location_name).toBe("London");
    expect(adopted?.endpoint).toBe("/v3/business_data/google/reviews/task_get/r-new");
    // second pass re-marks the adopted Ready row from its listed entry
    expect(second).toBe(1);
    expect(listLatestTasks(10)).toHaveLength(1);
  });

  it("should not adopt entries without a tag or for unknown places", async () => {
    gateway.setReady("reviews", [
      readyEntry("r-untagged", { tag: null }),
      readyEntry("r-stranger", { tag: "P404" }),
    ]);

    const touched = await reconcileTasks({ gateway });

    expect(touched).toBe(0);
    expect(listLatestTasks(10)).toEqual([]);
  });

  it("should keep reconciling other kinds when one ready-list fails", async () => {
    const reviews = insertOrMergeTask({ remote_task_id: "r-1", kind: "reviews", place_id: "P1", status: "Pending" });
    const info = insertOrMergeTask({
      remote_task_id: "bi-1",
      kind: "my_business_info",
      place_id: "P1",
      status: "Pending",
    });
    gateway.setReady("reviews", new Error("HTTP 500 Internal Server Error"));
    gateway.setReady("my_business_info", [
      readyEntry("bi-1", { endpoint: "/v3/business_data/google/my_business_info/task_get/bi-1" }),
    ]);

    await reconcileTasks({ gateway });

    expect(getTaskById(reviews)?.status).toBe("Pending");
    expect(getTaskById(info)?.status).toBe("Ready");
  });

  it("should never regress terminal tasks", async () => {
    const id = insertOrMergeTask({ remote_task_id: "r-1", kind: "reviews", place_id: "P1", status: "Created" });
    markTaskPopulated(id, 20000, "Ok.", 3);
    gateway.setReady("reviews", [readyEntry("r-1")]);

    const touched = await reconcileTasks({ gateway });

    expect(touched).toBe(0);
    expect(getTaskById(id)?.status).toBe("Populated");
  });

  it("should stop when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(reconcileTasks({ gateway }, controller.signal)).rejects.toThrow();
  });
});
