/**
 * Questions & answers result parser
 *
 * Questions come from result[].items[] (answers nested in their items[])
 * and result[].items_without_answers[]. One payload per answer, or one
 * unanswered payload per question.
 */

import type { FetchResult, JsonObject, KindSnapshot, QuestionAnswerPayload } from "@/types";
import { getArray, getString, objectsOf } from "@/utils";
import { computeQuestionAnswerKey } from "../identity/itemKeys";
import { nestedItems, parseProviderTimestamp, rawJson, toSnapshot } from "./shared";

type QuestionFields = Pick<
  QuestionAnswerPayload,
  "questionText" | "questionTimestamp" | "questionProfileName"
>;

type AnswerFields = Pick<QuestionAnswerPayload, "answerText" | "answerTimestamp" | "answerProfileName">;

const NO_ANSWER: AnswerFields = {
  answerText: null,
  answerTimestamp: null,
  answerProfileName: null,
};

function buildPayload(
  question: QuestionFields,
  answer: AnswerFields,
  source: JsonObject,
): QuestionAnswerPayload {
  const fields = { ...question, ...answer };
  return {
    qaKey: computeQuestionAnswerKey(fields),
    ...fields,
    rawJson: rawJson(source),
  };
}

export function parseQuestionItem(item: JsonObject): QuestionAnswerPayload[] {
  const questionText =
    getString(item, "question_text") ?? getString(item, "original_question_text");
  if (!questionText) {
    return [];
  }

  const question: QuestionFields = {
    questionText,
    questionTimestamp: parseProviderTimestamp(getString(item, "timestamp")),
    questionProfileName: getString(item, "profile_name"),
  };

  const answers = objectsOf(getArray(item, "items"));
  if (answers.length === 0) {
    return [buildPayload(question, NO_ANSWER, item)];
  }

  const payloads: QuestionAnswerPayload[] = [];
  for (const answer of answers) {
    const answerText = getString(answer, "answer_text") ?? getString(answer, "original_answer_text");
    if (!answerText) {
      continue;
    }
    payloads.push(
      buildPayload(
        question,
        {
          answerText,
          answerTimestamp: parseProviderTimestamp(getString(answer, "timestamp")),
          answerProfileName: getString(answer, "profile_name"),
        },
        item,
      ),
    );
  }

  return payloads.length > 0 ? payloads : [buildPayload(question, NO_ANSWER, item)];
}

export function parseQuestionsAndAnswers(
  fetched: FetchResult,
): KindSnapshot<QuestionAnswerPayload> {
  const byKey = new Map<string, QuestionAnswerPayload>();
  const questions = [
    ...nestedItems(fetched, "items"),
    ...nestedItems(fetched, "items_without_answers"),
  ];

  for (const question of questions) {
    for (const payload of parseQuestionItem(question)) {
      byKey.set(payload.qaKey, payload);
    }
  }

  return toSnapshot(fetched, [...byKey.values()]);
}
