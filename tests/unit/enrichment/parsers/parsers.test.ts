/**
 * Unit tests for the per-kind result parsers
 *
 * Fixtures under tests/fixtures/dataforseo mirror real task_get / live bodies.
 */

import { describe, it, expect } from "vitest";
import {
  classifySocialUrl,
  extractStringList,
  parseBusinessInfo,
  parseProviderTimestamp,
  parseQuestionsAndAnswers,
  parseReviews,
  parseSocialProfiles,
  parseUpdates,
} from "@/enrichment/parsers";
import { computeUpdateKey } from "@/enrichment/identity/itemKeys";
import { parseTaskResponse } from "@/clients/dataForSeo/mappers";
import { fetchResultFixture } from "../../../helpers/fakeGateway";

describe("parseProviderTimestamp", () => {
  it("should normalize provider timestamps with offsets to ISO UTC", () => {
    expect(parseProviderTimestamp("2024-03-10 14:30:00 +00:00")).toBe("2024-03-10T14:30:00.000Z");
    expect(parseProviderTimestamp("2024-02-01 09:00:00 +01:00")).toBe("2024-02-01T08:00:00.000Z");
    expect(parseProviderTimestamp("2024-02-01 09:00:00 +0100")).toBe("2024-02-01T08:00:00.000Z");
  });

  it("should read values without an offset as UTC", () => {
    expect(parseProviderTimestamp("2024-04-05 08:00:00")).toBe("2024-04-05T08:00:00.000Z");
  });

  it("should return null for empty or unparseable values", () => {
    expect(parseProviderTimestamp(null)).toBe(null);
    expect(parseProviderTimestamp("")).toBe(null);
    expect(parseProviderTimestamp("yesterday")).toBe(null);
  });
});

describe("parseReviews", () => {
  it("should parse items with a review id and skip the rest", () => {
    const snapshot = parseReviews(fetchResultFixture("dataforseo/reviews_task_get.json"));

    expect(snapshot.isCompleted).toBe(true);
    expect(snapshot.statusCode).toBe(20000);
    expect(snapshot.items.map((r) => r.reviewId)).toEqual(["rv-1", "rv-2", "rv-3"]);
  });

  it("should map review fields", () => {
    const [first, second, third] = parseReviews(
      fetchResultFixture("dataforseo/reviews_task_get.json"),
    ).items;

    expect(first?.profileName).toBe("Ana");
    expect(first?.rating).toBe(5);
    expect(first?.localGuide).toBe(true);
    expect(first?.reviewsCount).toBe(12);
    expect(first?.photosCount).toBe(3);
    expect(first?.reviewTimestamp).toBe("2024-03-10T14:30:00.000Z");
    expect(first?.ownerAnswer).toBe(null);

    expect(second?.ownerAnswer).toBe("Thanks, Ben!");
    expect(second?.ownerTimestamp).toBe("2024-02-21T09:00:00.000Z");
    expect(second?.localGuide).toBe(false);

    expect(third?.reviewText).toBe(null);
    expect(third?.reviewTimestamp).toBe("2024-02-01T08:00:00.000Z");
  });

  it("should report an unfinished task as not completed with no items", () => {
    const snapshot = parseReviews(fetchResultFixture("dataforseo/reviews_task_in_progress.json"));

    expect(snapshot.isCompleted).toBe(false);
    expect(snapshot.items).toEqual([]);
  });

  it("should collapse duplicate review ids onto the last one seen", () => {
    const fetched = parseTaskResponse({
      tasks: [
        {
          id: "t-1",
          status_code: 20000,
          result: [
            {
              items: [{ review_id: "dup", review_text: "first" }],
              reviews: [{ review_id: "dup", review_text: "second" }],
            },
          ],
        },
      ],
    });

    const snapshot = parseReviews(fetched);

    expect(snapshot.items).toHaveLength(1);
    expect(snapshot.items[0]?.reviewText).toBe("second");
  });
});

describe("parseBusinessInfo", () => {
  it("should produce one normalized snapshot", () => {
    const snapshot = parseBusinessInfo(fetchResultFixture("dataforseo/business_info_task_get.json"));

    expect(snapshot.items).toHaveLength(1);
    const info = snapshot.items[0];
    expect(info?.description).toBe("Family-run bakery with sourdough and pastries.");
    expect(info?.photoCount).toBe(42);
    expect(info?.additionalCategories).toEqual(["Cafe", "Bakery"]);
    expect(info?.placeTopics).toEqual(["sourdough", "croissant"]);
    expect(info?.logoUrl).toBe("https://cdn.example.test/assets/logo.png");
    expect(info?.mainPhotoUrl).toBe("https://cdn.example.test/assets/main.jpg");
  });

  it("should truncate long descriptions to 750 characters", () => {
    const fetched = parseTaskResponse({
      tasks: [{ status_code: 20000, result: [{ items: [{ description: "x".repeat(800) }] }] }],
    });

    expect(parseBusinessInfo(fetched).items[0]?.description).toHaveLength(750);
  });

  it("should yield no snapshot when no candidate has values", () => {
    const fetched = parseTaskResponse({
      tasks: [{ status_code: 20000, result: [{ items: [{ type: "google_business_info" }] }] }],
    });

    expect(parseBusinessInfo(fetched).items).toEqual([]);
  });
});

describe("extractStringList", () => {
  it("should read labelled objects and single strings", () => {
    expect(extractStringList({ cats: [{ title: "Cafe" }, { name: " Deli " }, 3] }, "cats")).toEqual([
      "Cafe",
      "Deli",
    ]);
    expect(extractStringList({ cats: " Bakery " }, "cats")).toEqual(["Bakery"]);
    expect(extractStringList({}, "cats")).toEqual([]);
  });
});

describe("parseUpdates", () => {
  it("should parse posts with text, date, url, images and links", () => {
    const snapshot = parseUpdates(fetchResultFixture("dataforseo/updates_task_get.json"));

    expect(snapshot.items).toHaveLength(2);
    const [spring, closed] = snapshot.items;

    expect(spring?.postText).toBe("Spring menu is here");
    expect(spring?.postDate).toBe("2024-04-01T10:00:00.000Z");
    expect(spring?.url).toBe("https://example.test/posts/1");
    expect(spring?.imageUrls).toEqual(["https://cdn.example.test/p1.jpg"]);
    expect(spring?.links).toEqual([
      { type: "button", title: "Order", url: "https://example.test/order" },
    ]);
    expect(spring?.updateKey).toBe(
      computeUpdateKey({
        postText: "Spring menu is here",
        postDate: "2024-04-01T10:00:00.000Z",
        url: "https://example.test/posts/1",
      }),
    );

    expect(closed?.postText).toBe("Closed on Monday");
    expect(closed?.postDate).toBe("2024-04-05T08:00:00.000Z");
    expect(closed?.url).toBe(null);
  });
});

describe("parseQuestionsAndAnswers", () => {
  it("should emit one row per answer plus unanswered questions", () => {
    const snapshot = parseQuestionsAndAnswers(
      fetchResultFixture("dataforseo/questions_and_answers_task_get.json"),
    );

    expect(
      snapshot.items.map((qa) => [qa.questionText, qa.answerText, qa.answerProfileName]),
    ).toEqual([
      ["Do you have gluten-free bread?", "Yes, on weekends.", "Owner"],
      ["Do you have gluten-free bread?", "Saturdays mostly.", "Lee"],
      ["Is there parking?", null, null],
    ]);
    expect(snapshot.items[0]?.questionTimestamp).toBe("2024-01-10T12:00:00.000Z");
    expect(snapshot.items[0]?.answerTimestamp).toBe("2024-01-11T09:00:00.000Z");
    expect(snapshot.items[1]?.answerTimestamp).toBe(null);
    expect(snapshot.items[2]?.questionProfileName).toBe("Kim");
  });

  it("should give distinct keys to distinct answers of the same question", () => {
    const snapshot = parseQuestionsAndAnswers(
      fetchResultFixture("dataforseo/questions_and_answers_task_get.json"),
    );

    const keys = new Set(snapshot.items.map((qa) => qa.qaKey));
    expect(keys.size).toBe(3);
  });
});

describe("parseSocialProfiles", () => {
  it("should keep the first profile URL per platform", () => {
    const snapshot = parseSocialProfiles(fetchResultFixture("dataforseo/social_profiles_live.json"));

    expect(snapshot.items).toEqual([
      {
        facebook: "https://www.facebook.com/cornerbakery",
        instagram: "https://instagram.com/corner.bakery",
        x: "https://twitter.com/corner_bakery",
      },
    ]);
  });

  it("should yield no items when nothing matches a platform", () => {
    const fetched = parseTaskResponse({
      tasks: [{ status_code: 20000, result: [{ url: "https://bakery.example.test/menu" }] }],
    });

    expect(parseSocialProfiles(fetched).items).toEqual([]);
  });
});

describe("classifySocialUrl", () => {
  it("should classify by hostname including subdomains and bare www links", () => {
    expect(classifySocialUrl("https://m.facebook.com/page")).toBe("facebook");
    expect(classifySocialUrl("www.linkedin.com/company/bakery")).toBe("linkedin");
    expect(classifySocialUrl("https://uk.pinterest.com/bakery")).toBe("pinterest");
    expect(classifySocialUrl("https://bsky.app/profile/bakery")).toBe("bluesky");
  });

  it("should reject home pages and lookalike hosts", () => {
    expect(classifySocialUrl("https://www.tiktok.com/")).toBe(null);
    expect(classifySocialUrl("https://notfacebook.com/page")).toBe(null);
  });
});
