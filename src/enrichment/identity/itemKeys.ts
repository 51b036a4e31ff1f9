/**
 * Natural identity keys for result items without a stable provider id
 *
 * SHA-256 hex over the stable textual and temporal fields joined with "\n"
 * (missing fields hash as empty strings). Provider metadata never enters the
 * key, so the same logical item always maps to the same row.
 */

import { createHash } from "node:crypto";

function hashFields(fields: Array<string | null>): string {
  return createHash("sha256")
    .update(fields.map((f) => f ?? "").join("\n"), "utf8")
    .digest("hex");
}

export type UpdateKeyInput = {
  postText: string | null;
  postDate: string | null;
  url: string | null;
};

export type QuestionAnswerKeyInput = {
  questionText: string | null;
  questionTimestamp: string | null;
  questionProfileName: string | null;
  answerText: string | null;
  answerTimestamp: string | null;
  answerProfileName: string | null;
};

export function computeUpdateKey(input: UpdateKeyInput): string {
  return hashFields([input.postText, input.postDate, input.url]);
}

export function computeQuestionAnswerKey(input: QuestionAnswerKeyInput): string {
  return hashFields([
    input.questionText,
    input.questionTimestamp,
    input.questionProfileName,
    input.answerText,
    input.answerTimestamp,
    input.answerProfileName,
  ]);
}
