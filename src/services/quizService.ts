import { performance } from "node:perf_hooks";
import type { CompletionModel } from "../OpenAI/openaiClient";
import { extractQuestion, invokeModel } from "../OpenAI/quizUtils";
import {
  buildQuizPrompt,
  defaultQuizPromptConfig,
  type QuizPromptConfig,
} from "../API/quizPrompts";
import {
  isDifficulty,
  isQuestionType,
  type ConversationTurn,
  type GenerationParameters,
  type QuizResult,
} from "../models/quiz";
import { InvalidConversationError, QuizError } from "../errors";
import { aggregateNoteContent, type NoteSource } from "./contentAggregator";
import { inferParameters } from "./parameterInference";

export const ASSISTANT_INTRO = "Here's a quiz question based on your notes:";

export type GenerationOverrides = {
  difficulty?: unknown;
  questionType?: unknown;
};

type QuizServiceDeps = {
  notes: NoteSource;
  model: CompletionModel;
  prompts?: QuizPromptConfig;
};

/**
 * Returns the last turn once the conversation is known to end with a
 * non-empty user message.
 */
export const validateConversation = (
  conversation: readonly ConversationTurn[]
): ConversationTurn => {
  const last = conversation[conversation.length - 1];
  if (!last) {
    throw new InvalidConversationError("conversation cannot be empty");
  }
  if (last.role !== "user") {
    throw new InvalidConversationError("last message must be from user");
  }
  if (last.content.trim() === "") {
    throw new InvalidConversationError("user message cannot be empty");
  }
  return last;
};

export const applyOverrides = (
  inferred: GenerationParameters,
  overrides: GenerationOverrides = {}
): GenerationParameters => ({
  difficulty: isDifficulty(overrides.difficulty)
    ? overrides.difficulty
    : inferred.difficulty,
  questionType: isQuestionType(overrides.questionType)
    ? overrides.questionType
    : inferred.questionType,
});

// Quiz errors keep their class so callers can map them; anything else is
// rewrapped with the stage in its message.
const withStage = async <T>(stage: string, run: () => Promise<T> | T) => {
  try {
    return await run();
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    console.error(`[ERROR] Quiz generation stage failed - ${stage}: ${detail}`);
    if (err instanceof QuizError) {
      err.stage = stage;
      throw err;
    }
    throw new Error(`${stage}: ${detail}`, { cause: err });
  }
};

export class QuizService {
  private readonly notes: NoteSource;
  private readonly model: CompletionModel;
  private readonly prompts: QuizPromptConfig;

  constructor({ notes, model, prompts = defaultQuizPromptConfig }: QuizServiceDeps) {
    this.notes = notes;
    this.model = model;
    this.prompts = prompts;
  }

  async generateQuiz(
    conversation: readonly ConversationTurn[],
    noteIds: readonly number[],
    overrides?: GenerationOverrides
  ): Promise<QuizResult> {
    const start = performance.now();
    console.log(
      `[INFO] Starting quiz generation with ${conversation.length} conversation messages and ${noteIds.length} note IDs`
    );

    const lastMessage = validateConversation(conversation);

    const notesContent = await withStage("failed to retrieve notes", () =>
      aggregateNoteContent(this.notes, noteIds)
    );

    const { difficulty, questionType } = applyOverrides(
      inferParameters(lastMessage.content),
      overrides
    );
    console.log(
      `[INFO] Generation parameters - difficulty: ${difficulty}, type: ${questionType}`
    );

    const prompt = buildQuizPrompt(
      notesContent,
      difficulty,
      questionType,
      this.prompts
    );
    console.log(`[INFO] Prepared LLM prompt with ${prompt.length} characters`);

    const completion = await withStage("failed to generate quiz with LLM", () =>
      invokeModel(this.model, prompt)
    );
    const question = await withStage("failed to parse LLM response", () =>
      extractQuestion(completion, noteIds)
    );

    const reply: ConversationTurn = {
      role: "assistant",
      content: ASSISTANT_INTRO,
      question,
    };

    const processingTimeMs = Math.round(performance.now() - start);
    console.log(
      `[INFO] Quiz generation completed in ${processingTimeMs} ms - question ID: ${question.id}`
    );

    return {
      conversation: [...conversation, reply],
      metadata: {
        generatedAt: new Date().toISOString(),
        tokensUsed: null,
        processingTimeMs,
      },
    };
  }
}
