import express from "express";
import type { QuizService, GenerationOverrides } from "../services/quizService";
import type {
  ConversationRole,
  ConversationTurn,
  QuestionRecord,
} from "../models/quiz";
import {
  describeQuizFailure,
  InvalidConversationError,
  MalformedResponseError,
  MissingRequiredFieldError,
  ModelCallFailedError,
  NoContentFoundError,
} from "../errors";

type QuizRequest = {
  noteIds: number[];
  conversation: ConversationTurn[];
  options: GenerationOverrides;
};

type ParsedQuizRequest =
  | { ok: true; value: QuizRequest }
  | { ok: false; error: string };

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const isIntegerArray = (value: unknown): value is number[] =>
  Array.isArray(value) && value.every((item) => Number.isInteger(item));

const isRole = (value: unknown): value is ConversationRole =>
  value === "user" || value === "assistant";

// Earlier assistant turns echo back the question they carried.
const parseQuestion = (value: unknown): QuestionRecord | null => {
  if (!isObject(value)) return null;
  const { id, text, type, options, correctAnswer, explanation, difficulty, basedOnNotes } =
    value;

  if (
    typeof id !== "string" ||
    typeof text !== "string" ||
    typeof type !== "string" ||
    typeof difficulty !== "string" ||
    !isIntegerArray(basedOnNotes)
  ) {
    return null;
  }

  const question: QuestionRecord = { id, text, type, difficulty, basedOnNotes };
  if (options !== undefined) {
    if (!isStringArray(options)) return null;
    Object.assign(question, { options });
  }
  if (correctAnswer !== undefined) {
    if (typeof correctAnswer !== "string") return null;
    Object.assign(question, { correctAnswer });
  }
  if (explanation !== undefined) {
    if (typeof explanation !== "string") return null;
    Object.assign(question, { explanation });
  }
  return question;
};

const parseTurn = (value: unknown): ConversationTurn | null => {
  if (!isObject(value)) return null;
  const { role, content, question } = value;
  if (!isRole(role) || typeof content !== "string") {
    return null;
  }
  if (question === undefined || question === null) {
    return { role, content };
  }

  const parsedQuestion = parseQuestion(question);
  return parsedQuestion ? { role, content, question: parsedQuestion } : null;
};

export const parseQuizRequest = (body: unknown): ParsedQuizRequest => {
  if (!isObject(body)) {
    return { ok: false, error: "Request body must be a JSON object" };
  }

  const { conversation, options = {} } = body;
  // null means "all notes", same as leaving the field out.
  const noteIds = body.noteIds ?? [];

  if (!Array.isArray(conversation)) {
    return { ok: false, error: "conversation must be an array" };
  }
  const turns: ConversationTurn[] = [];
  for (const raw of conversation) {
    const turn = parseTurn(raw);
    if (!turn) {
      return {
        ok: false,
        error:
          "each conversation message needs a role (user or assistant), string content and a well-formed question if one is attached",
      };
    }
    turns.push(turn);
  }

  if (!isIntegerArray(noteIds)) {
    return { ok: false, error: "noteIds must be an array of integers" };
  }

  if (!isObject(options)) {
    return { ok: false, error: "options must be an object" };
  }

  return {
    ok: true,
    value: {
      conversation: turns,
      noteIds,
      options: {
        difficulty: options.difficulty,
        questionType: options.questionType,
      },
    },
  };
};

export const quizErrorStatus = (err: unknown): number => {
  if (err instanceof InvalidConversationError) return 400;
  if (err instanceof NoContentFoundError) return 404;
  if (
    err instanceof ModelCallFailedError ||
    err instanceof MalformedResponseError ||
    err instanceof MissingRequiredFieldError
  ) {
    return 502;
  }
  return 500;
};

export const createQuizRouter = (quizService: QuizService) => {
  const router = express.Router();

  router.post("/generate-quiz", async (req, res) => {
    const parsed = parseQuizRequest(req.body);
    if (!parsed.ok) {
      return res.status(400).json({ success: false, error: parsed.error });
    }

    const { conversation, noteIds, options } = parsed.value;

    try {
      const { conversation: updated, metadata } = await quizService.generateQuiz(
        conversation,
        noteIds,
        options
      );

      return res.status(200).json({
        success: true,
        data: { conversation: updated },
        metadata,
      });
    } catch (err) {
      const message = describeQuizFailure(err);
      const status = quizErrorStatus(err);
      if (status === 500) {
        console.error("[ERROR] Unexpected error in /notes/generate-quiz:", err);
      }
      return res
        .status(status)
        .json({ success: false, error: `Failed to generate quiz: ${message}` });
    }
  });

  return router;
};
