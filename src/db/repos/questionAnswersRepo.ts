/**
 * Place Q&A repository
 *
 * One row per answered question/answer pair (or per unanswered question),
 * keyed by UNIQUE(place_id, qa_key).
 */

import type { PlaceQuestionAnswerRow, QuestionAnswerPayload } from "@/types";
import { getDb } from "@/db";
import { nowIso } from "@/utils";

export function upsertPlaceQuestionAnswer(
  placeId: string,
  qa: QuestionAnswerPayload,
  sourceTaskId: string,
): void {
  const db = getDb();
  const now = nowIso();

  db.prepare(
    `
    INSERT INTO place_question_answers (
      place_id, qa_key, question_text, question_timestamp, question_profile_name,
      answer_text, answer_timestamp, answer_profile_name,
      source_task_id, raw_json, first_seen_at, last_seen_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(place_id, qa_key) DO UPDATE SET
      source_task_id = excluded.source_task_id,
      raw_json = excluded.raw_json,
      last_seen_at = excluded.last_seen_at
  `,
  ).run(
    placeId,
    qa.qaKey,
    qa.questionText,
    qa.questionTimestamp,
    qa.questionProfileName,
    qa.answerText,
    qa.answerTimestamp,
    qa.answerProfileName,
    sourceTaskId,
    qa.rawJson,
    now,
    now,
  );
}

export function listPlaceQuestionAnswers(placeId: string): PlaceQuestionAnswerRow[] {
  const db = getDb();
  return db
    .prepare("SELECT * FROM place_question_answers WHERE place_id = ? ORDER BY id ASC")
    .all(placeId) as PlaceQuestionAnswerRow[];
}
