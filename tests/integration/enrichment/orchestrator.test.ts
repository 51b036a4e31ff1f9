/**
 * Integration tests for the enrichment orchestrator
 *
 * Submission, scheduling, live kinds, bulk population and maintenance over a
 * real ledger with the provider faked in process.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { PlaceEnrichmentTarget } from "@/types";
import {
  createOrchestratorHarness,
  type OrchestratorHarness,
} from "../../helpers/orchestratorHarness";
import { fetchResultFixture } from "../../helpers/fakeGateway";
import { clampLatestLimit, enrichmentTargetFromPlace } from "@/enrichment/orchestrator";
import { parseTaskResponse } from "@/clients/dataForSeo";
import {
  findLatestActiveTaskForPlace,
  getPlaceById,
  getTaskByRemoteId,
  insertOrMergeTask,
  listLatestTasks,
  listPlaceReviews,
  markTaskReady,
  upsertPlace,
} from "@/db";

const P1: PlaceEnrichmentTarget = { placeId: "P1", locationName: "London,England,United Kingdom" };

function created(remoteId: string) {
  return { remoteId, statusCode: 20100, statusMessage: "Task Created." };
}

describe("EnrichmentOrchestrator", () => {
  let h: OrchestratorHarness;

  beforeEach(() => {
    h = createOrchestratorHarness();
    upsertPlace({ place_id: "P1", display_name: "Corner Bakery", location_name: P1.locationName });
  });

  afterEach(() => {
    h.cleanup();
  });

  describe("enrichPlaces", () => {
    beforeEach(() => {
      h.gateway.queueSubmit("reviews", created("r-1"));
      h.gateway.queueSubmit("my_business_info", created("bi-1"));
      h.gateway.queueSubmit("my_business_updates", created("up-1"));
      h.gateway.queueSubmit("questions_and_answers", created("qa-1"));
      h.gateway.setLiveResult("social_profiles", fetchResultFixture("dataforseo/social_profiles_live.json"));
    });

    it("should submit every kind, populate the live kind and reconcile once", async () => {
      const result = await h.orchestrator.enrichPlaces([P1]);

      expect(result).toEqual({ submitted: 5, skipped: 0, failed: 0, touched: 4 });
      expect(h.gateway.submitCalls.map((c) => c.kind)).toEqual([
        "reviews",
        "my_business_info",
        "my_business_updates",
        "questions_and_answers",
      ]);
      expect(getTaskByRemoteId("r-1")?.status).toBe("Pending");
      expect(getTaskByRemoteId("07281209-0001-0270-0000-soc000000001")?.status).toBe("Populated");
      expect(getPlaceById("P1")?.instagram_url).toBe("https://instagram.com/corner.bakery");
    });

    it("should tag every submission with the place id", async () => {
      await h.orchestrator.enrichPlaces([P1], ["reviews", "social_profiles"]);

      expect(h.gateway.submitCalls[0]?.item.tag).toBe("P1");
      expect(h.gateway.liveCalls[0]?.item.tag).toBe("P1");
    });

    it("should skip kinds refreshed within their threshold", async () => {
      await h.orchestrator.enrichPlaces([P1]);

      const second = await h.orchestrator.enrichPlaces([P1]);

      expect(second.submitted).toBe(0);
      expect(second.skipped).toBe(5);
      expect(h.gateway.submitCalls).toHaveLength(4);
    });

    it("should de-duplicate requested kinds", async () => {
      const result = await h.orchestrator.enrichPlaces([P1], ["reviews", "reviews"]);

      expect(result.submitted).toBe(1);
      expect(h.gateway.submitCalls).toHaveLength(1);
    });
  });

  it("should record a thrown submission as an Error row and continue with other kinds", async () => {
    h.gateway.queueSubmit("reviews", new Error("HTTP 500 Internal Server Error"));
    h.gateway.queueSubmit("my_business_updates", created("up-1"));

    const result = await h.orchestrator.enrichPlaces([P1], ["reviews", "my_business_updates"]);

    expect(result.submitted).toBe(1);
    expect(result.failed).toBe(1);
    const errors = listLatestTasks(10, "reviews", "Error");
    expect(errors).toHaveLength(1);
    expect(errors[0]?.remote_task_id).toMatch(/^reviews-err-/);
    expect(errors[0]?.last_error).toBe("Submission failed: HTTP 500 Internal Server Error");
  });

  it("should record a submission without a task id as an Error row", async () => {
    h.gateway.queueSubmit("reviews", { remoteId: null, statusCode: 40200, statusMessage: "Payment Required." });

    const result = await h.orchestrator.enrichPlaces([P1], ["reviews"]);

    expect(result.failed).toBe(1);
    const [row] = listLatestTasks(10, "reviews");
    expect(row?.status).toBe("Error");
    expect(row?.status_code).toBe(40200);
    expect(row?.last_error).toBe("Payment Required.");
  });

  it("should not let an Error row block resubmission", async () => {
    h.gateway.queueSubmit(
      "reviews",
      { remoteId: "r-bad", statusCode: 40000, statusMessage: "Bad request." },
      created("r-good"),
    );

    const first = await h.orchestrator.enrichPlaces([P1], ["reviews"]);
    const second = await h.orchestrator.enrichPlaces([P1], ["reviews"]);

    expect(first.failed).toBe(1);
    expect(second.submitted).toBe(1);
    expect(getTaskByRemoteId("r-bad")?.status).toBe("Error");
    expect(getTaskByRemoteId("r-good")?.status).toBe("Pending");
  });

  it("should always resubmit kinds with a zero threshold", async () => {
    const zero = createOrchestratorHarness({ env: { ENRICH_REFRESH_HOURS_REVIEWS: "0" } });
    try {
      zero.gateway.queueSubmit("reviews", created("r-1"), created("r-2"));

      await zero.orchestrator.enrichPlaces([P1], ["reviews"]);
      const second = await zero.orchestrator.enrichPlaces([P1], ["reviews"]);

      expect(second.submitted).toBe(1);
      expect(zero.gateway.submitCalls).toHaveLength(2);
    } finally {
      zero.cleanup();
    }
  });

  it("should record a failed live request as an Error row", async () => {
    h.gateway.setLiveResult("social_profiles", new Error("socket hang up"));

    const result = await h.orchestrator.enrichPlaces([P1], ["social_profiles"]);

    expect(result.failed).toBe(1);
    const [row] = listLatestTasks(10, "social_profiles");
    expect(row?.status).toBe("Error");
    expect(row?.last_error).toBe("Live request failed: socket hang up");
  });

  it("should settle a live response that is still processing as Error", async () => {
    h.gateway.setLiveResult(
      "social_profiles",
      parseTaskResponse({
        tasks: [{ id: "soc-queued", status_code: 30000, status_message: "Task queued.", result: null }],
      }),
    );

    const result = await h.orchestrator.enrichPlaces([P1], ["social_profiles"]);

    expect(result.failed).toBe(1);
    const row = getTaskByRemoteId("soc-queued");
    expect(row?.status).toBe("Error");
    expect(row?.status_code).toBe(30000);
    expect(row?.last_error).toBe("Task queued.");
    expect(findLatestActiveTaskForPlace("P1")).toBe(null);
  });

  it("should settle a live result for an unknown place as Error", async () => {
    h.gateway.setLiveResult("social_profiles", fetchResultFixture("dataforseo/social_profiles_live.json"));

    const result = await h.orchestrator.enrichPlaces([{ placeId: "P404" }], ["social_profiles"]);

    expect(result).toEqual({ submitted: 0, skipped: 0, failed: 1, touched: 0 });
    const row = getTaskByRemoteId("07281209-0001-0270-0000-soc000000001");
    expect(row?.status).toBe("Error");
    expect(row?.last_error).toBe("Place P404 not found.");
    expect(findLatestActiveTaskForPlace("P404")).toBe(null);
  });

  describe("population", () => {
    const endpoint = "/v3/business_data/google/reviews/task_get/r-1";

    it("should report unknown task ids", async () => {
      expect(await h.orchestrator.populateTask(999)).toEqual({
        success: false,
        message: "Task 999 not found.",
        itemCount: 0,
      });
    });

    it("should populate Ready tasks and isolate per-task failures", async () => {
      const good = insertOrMergeTask({ remote_task_id: "r-1", kind: "reviews", place_id: "P1", status: "Pending" });
      const bad = insertOrMergeTask({ remote_task_id: "r-2", kind: "reviews", place_id: "P1", status: "Pending" });
      markTaskReady(good, { endpoint });
      markTaskReady(bad, { endpoint: "/broken" });
      h.gateway.setResult(endpoint, fetchResultFixture("dataforseo/reviews_task_get.json"));
      h.gateway.setResult("/broken", new Error("HTTP 404 Not Found"));

      const summary = await h.orchestrator.populateReadyTasks();

      expect(summary).toEqual({ attempted: 2, succeeded: 1, failed: 1, itemCount: 3 });
      expect(listPlaceReviews("P1")).toHaveLength(3);
      expect(getTaskByRemoteId("r-2")?.status).toBe("Ready");
    });

    it("should restrict bulk population to one kind", async () => {
      const id = insertOrMergeTask({ remote_task_id: "r-1", kind: "reviews", place_id: "P1", status: "Ready", endpoint });
      h.gateway.setResult(endpoint, fetchResultFixture("dataforseo/reviews_task_get.json"));

      const summary = await h.orchestrator.populateReadyTasks("my_business_info");

      expect(summary.attempted).toBe(0);
      expect((await h.orchestrator.populateTask(id)).itemCount).toBe(3);
    });
  });

  it("should purge Error rows", async () => {
    insertOrMergeTask({ remote_task_id: "e-1", kind: "reviews", place_id: "P1", status: "Error" });
    insertOrMergeTask({ remote_task_id: "ok-1", kind: "reviews", place_id: "P1", status: "Created" });

    expect(h.orchestrator.deleteErrorTasks()).toBe(1);
    expect(h.orchestrator.getLatestTasks().map((t) => t.remote_task_id)).toEqual(["ok-1"]);
  });
});

describe("clampLatestLimit", () => {
  it("should default and clamp to [1, 2000]", () => {
    expect(clampLatestLimit(undefined)).toBe(200);
    expect(clampLatestLimit(Number.NaN)).toBe(200);
    expect(clampLatestLimit(0)).toBe(1);
    expect(clampLatestLimit(5000)).toBe(2000);
    expect(clampLatestLimit(12.7)).toBe(12);
  });
});

describe("enrichmentTargetFromPlace", () => {
  it("should carry identity, location and review count", () => {
    expect(
      enrichmentTargetFromPlace({
        place_id: "P1",
        display_name: "Corner Bakery",
        location_name: "London",
        lat: 51.5,
        lng: -0.12,
        review_count: 40,
        description: null,
        photo_count: null,
        other_categories_json: null,
        place_topics_json: null,
        logo_url: null,
        logo_local_path: null,
        main_photo_url: null,
        main_photo_local_path: null,
        facebook_url: null,
        instagram_url: null,
        linkedin_url: null,
        x_url: null,
        youtube_url: null,
        tiktok_url: null,
        pinterest_url: null,
        bluesky_url: null,
        created_at: "2024-01-01T00:00:00.000Z",
        last_seen_at: "2024-01-01T00:00:00.000Z",
      }),
    ).toEqual({ placeId: "P1", locationName: "London", lat: 51.5, lng: -0.12, reviewCount: 40 });
  });
});
