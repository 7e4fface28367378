import { performance } from "node:perf_hooks";
import { v4 as uuidv4 } from "uuid";
import type { CompletionModel } from "./openaiClient";
import type { QuestionRecord } from "../models/quiz";
import {
  MalformedResponseError,
  MissingRequiredFieldError,
  ModelCallFailedError,
} from "../errors";

export const QUIZ_TEMPERATURE = 0.9;
export const QUESTION_ID_PREFIX = "q_llm_";

type AiQuestion = {
  question?: string;
  type?: string;
  options?: string[];
  correctAnswer?: string;
  explanation?: string;
  difficulty?: string;
};

const STRING_FIELDS = [
  "question",
  "type",
  "correctAnswer",
  "explanation",
  "difficulty",
] as const;

export const invokeModel = async (
  model: CompletionModel,
  prompt: string
): Promise<string> => {
  const start = performance.now();
  console.log(`[INFO] Calling LLM with temperature ${QUIZ_TEMPERATURE}`);

  try {
    const completion = await model.complete(prompt, QUIZ_TEMPERATURE);
    console.log(
      `[INFO] LLM call completed in ${(performance.now() - start).toFixed(0)} ms, response length: ${completion.length} characters`
    );
    return completion;
  } catch (err) {
    console.error(
      `[ERROR] LLM call failed after ${(performance.now() - start).toFixed(0)} ms`,
      err
    );
    throw new ModelCallFailedError(err);
  }
};

/**
 * Returns the text from the first "{" through the last "}", or null when no
 * such region exists. Models often wrap the JSON in prose or code fences.
 */
export const findJsonRegion = (text: string): string | null => {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end === -1 || end < start) {
    return null;
  }
  return text.slice(start, end + 1);
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const decodeAiQuestion = (json: string): AiQuestion => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new MalformedResponseError(
      `failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  if (!isRecord(parsed)) {
    throw new MalformedResponseError("response JSON is not an object");
  }

  const decoded: AiQuestion = {};

  for (const field of STRING_FIELDS) {
    const value = parsed[field];
    if (value === undefined || value === null) continue;
    if (typeof value !== "string") {
      throw new MalformedResponseError(`field "${field}" must be a string`);
    }
    decoded[field] = value;
  }

  const options = parsed.options;
  if (options !== undefined && options !== null) {
    if (
      !Array.isArray(options) ||
      !options.every((option): option is string => typeof option === "string")
    ) {
      throw new MalformedResponseError(
        'field "options" must be an array of strings'
      );
    }
    decoded.options = options;
  }

  return decoded;
};

export const generateQuestionId = () => `${QUESTION_ID_PREFIX}${uuidv4()}`;

export const extractQuestion = (
  rawResponse: string,
  noteIds: readonly number[]
): QuestionRecord => {
  const json = findJsonRegion(rawResponse);
  if (json === null) {
    console.error("[ERROR] No valid JSON found in LLM response");
    throw new MalformedResponseError("no valid JSON found in response");
  }

  const ai = decodeAiQuestion(json);

  if (!ai.question) {
    console.error("[ERROR] LLM response missing required question field");
    throw new MissingRequiredFieldError("question");
  }

  const record: QuestionRecord = {
    id: generateQuestionId(),
    text: ai.question,
    type: ai.type ?? "",
    difficulty: ai.difficulty ?? "",
    basedOnNotes: [...noteIds],
    ...(ai.options && ai.options.length > 0 ? { options: ai.options } : {}),
    ...(ai.correctAnswer ? { correctAnswer: ai.correctAnswer } : {}),
    ...(ai.explanation ? { explanation: ai.explanation } : {}),
  };

  console.log(
    `[INFO] Parsed LLM response into question ${record.id} (type: ${record.type}, difficulty: ${record.difficulty})`
  );
  return Object.freeze(record);
};
