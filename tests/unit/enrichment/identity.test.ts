/**
 * Unit tests for natural identity keys and asset file names
 */

import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import { computeQuestionAnswerKey, computeUpdateKey } from "@/enrichment/identity/itemKeys";
import { assetFileName } from "@/enrichment/assets/assetResolver";

function sha256(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

describe("computeUpdateKey", () => {
  it("should hash text, date and url joined by newlines", () => {
    expect(
      computeUpdateKey({ postText: "Hello", postDate: "2024-04-01T10:00:00.000Z", url: null }),
    ).toBe(sha256("Hello\n2024-04-01T10:00:00.000Z\n"));
  });

  it("should differ when any field differs", () => {
    const base = { postText: "Hello", postDate: null, url: null };
    expect(computeUpdateKey(base)).not.toBe(computeUpdateKey({ ...base, url: "https://x.test/1" }));
  });
});

describe("computeQuestionAnswerKey", () => {
  it("should hash question and answer fields in order", () => {
    expect(
      computeQuestionAnswerKey({
        questionText: "Parking?",
        questionTimestamp: null,
        questionProfileName: "Kim",
        answerText: "Yes",
        answerTimestamp: null,
        answerProfileName: "Owner",
      }),
    ).toBe(sha256("Parking?\n\nKim\nYes\n\nOwner"));
  });
});

describe("assetFileName", () => {
  it("should use the first 16 hex chars of the url hash and the known extension", () => {
    const url = "https://cdn.example.test/logo.PNG?size=2";
    expect(assetFileName(url)).toBe(`${sha256(url).substring(0, 16)}.png`);
  });

  it("should default to .jpg for unknown or missing extensions", () => {
    const url = "https://cdn.example.test/photo";
    expect(assetFileName(url)).toBe(`${sha256(url).substring(0, 16)}.jpg`);
    expect(assetFileName("https://cdn.example.test/file.exe")).toMatch(/^[0-9a-f]{16}\.jpg$/);
  });
});
