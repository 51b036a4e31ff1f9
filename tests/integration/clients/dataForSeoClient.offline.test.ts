/**
 * DataForSeoClient offline tests
 *
 * The client runs against the mock HTTP harness; no request leaves the process.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { CredentialCache, DataForSeoClient, DataForSeoError } from "@/clients/dataForSeo";
import { HttpError } from "@/clients/http";
import { ConfigError } from "@/config";
import { submitBusinessInfo } from "@/enrichment/submission";
import { createMockHttp, loadFixtureJson, type MockHttp } from "../../helpers/mockHttp";

const BASE = "https://api.example.test";
const CREDENTIALS = { login: "test-login", password: "test-password" };
const AUTH_HEADER = `Basic ${Buffer.from("test-login:test-password").toString("base64")}`;

const REVIEWS_POST = `${BASE}/v3/business_data/google/reviews/task_post`;
const REVIEWS_READY = `${BASE}/v3/business_data/google/reviews/tasks_ready`;
const INFO_POST = `${BASE}/v3/business_data/google/my_business_info/task_post`;

describe("DataForSeoClient", () => {
  let mock: MockHttp;
  let client: DataForSeoClient;

  beforeEach(() => {
    mock = createMockHttp();
    client = new DataForSeoClient({ httpRequest: mock.request, credentials: CREDENTIALS, baseUrl: `${BASE}/` });
  });

  it("should refuse to start without credentials", () => {
    expect(
      () => new DataForSeoClient({ httpRequest: mock.request, credentials: { login: "", password: "" } }),
    ).toThrow(ConfigError);
  });

  it("should POST one item array with the Basic auth header", async () => {
    mock.on("POST", REVIEWS_POST, loadFixtureJson("dataforseo/reviews_task_post.json"));

    const result = await client.submit("reviews", { keyword: "place_id:P1", depth: 10, tag: "P1" });

    expect(result).toEqual({
      remoteId: "07281205-0001-0217-0000-rev000000001",
      statusCode: 20100,
      statusMessage: "Task Created.",
    });
    const [request] = mock.getRecordedRequests();
    expect(request?.method).toBe("POST");
    expect(request?.json).toEqual([{ keyword: "place_id:P1", depth: 10, tag: "P1" }]);
    expect(request?.headers?.Authorization).toBe(AUTH_HEADER);
  });

  it("should list ready tasks", async () => {
    mock.on("GET", REVIEWS_READY, loadFixtureJson("dataforseo/reviews_tasks_ready.json"));

    const entries = await client.listReady("reviews");

    expect(entries.map((e) => e.remoteId)).toEqual(["07281205-0001-0217-0000-rev000000001"]);
  });

  it("should fetch relative endpoints against the base URL", async () => {
    const path = "/v3/business_data/google/reviews/task_get/07281205-0001-0217-0000-rev000000001";
    mock.on("GET", `${BASE}${path}`, loadFixtureJson("dataforseo/reviews_task_get.json"));

    const fetched = await client.fetch(path);

    expect(fetched.isCompleted).toBe(true);
    expect(fetched.remoteId).toBe("07281205-0001-0217-0000-rev000000001");
  });

  it("should resolve the task_get path with an encoded id", () => {
    expect(client.resolveTaskGetPath("questions_and_answers", "a/b")).toBe(
      "/v3/business_data/google/questions_and_answers/task_get/a%2Fb",
    );
  });

  it("should call the live endpoint for social profiles", async () => {
    mock.on(
      "POST",
      `${BASE}/v3/business_data/google/my_business_info/live`,
      loadFixtureJson("dataforseo/social_profiles_live.json"),
    );

    const fetched = await client.runLive("social_profiles", { keyword: "place_id:P1" });

    expect(fetched.remoteId).toBe("07281209-0001-0270-0000-soc000000001");
  });

  it("should rebuild the auth header after a 401", async () => {
    let loads = 0;
    const credentialCache = new CredentialCache(() => {
      loads++;
      return CREDENTIALS;
    });
    const cached = new DataForSeoClient({
      httpRequest: mock.request,
      baseUrl: BASE,
      credentials: CREDENTIALS,
      credentialCache,
    });
    mock.onResponse("GET", REVIEWS_READY, { status: 401, body: { status_code: 40100 } });

    await expect(cached.listReady("reviews")).rejects.toBeInstanceOf(HttpError);
    expect(loads).toBe(1);

    mock.on("GET", REVIEWS_READY, loadFixtureJson("dataforseo/reviews_tasks_ready.json"));
    await cached.listReady("reviews");
    await cached.listReady("reviews");

    expect(loads).toBe(2);
    expect(mock.getRecordedRequests().map((r) => r.headers?.Authorization)).toEqual([
      AUTH_HEADER,
      AUTH_HEADER,
      AUTH_HEADER,
    ]);
  });

  it("should reject non-object bodies", async () => {
    mock.on("GET", REVIEWS_READY, "maintenance");

    await expect(client.listReady("reviews")).rejects.toBeInstanceOf(DataForSeoError);
  });

  it("should walk the business info fallbacks through the real client", async () => {
    const bodies = [
      { tasks: [{ id: "bi-1", status_code: 40501, status_message: "Invalid Field: 'keyword'." }] },
      { tasks: [{ id: "bi-2", status_code: 40501, status_message: "Invalid Field: 'location_name'." }] },
      { tasks: [{ id: "bi-3", status_code: 40501, status_message: "Invalid Field: 'location_name'." }] },
    ];
    let call = 0;
    mock.onCustom("POST", INFO_POST, async () => bodies[call++]);

    const result = await submitBusinessInfo(
      client,
      { placeId: "P1", locationName: "London,England,United Kingdom" },
      { postbackUrl: "", languageCode: "en", reviewsDepth: 100, updatesDepth: 100, questionsDepth: 20 },
    );

    expect(call).toBe(3);
    expect(result).toEqual({
      remoteId: "bi-3",
      statusCode: 40501,
      statusMessage: "Invalid Field: 'location_name'.",
    });
    const sent = mock.getRecordedRequests().map((r) => r.json);
    expect(sent).toEqual([
      [{ place_id: "P1", priority: 2, language_code: "en", tag: "P1" }],
      [{ keyword: "place_id:P1", priority: 2, language_code: "en", tag: "P1" }],
      [
        {
          keyword: "place_id:P1",
          location_name: "London,England,United Kingdom",
          priority: 2,
          language_code: "en",
          tag: "P1",
        },
      ],
    ]);
  });
});
