export const DIFFICULTIES = ["easy", "medium", "hard"] as const;
export const QUESTION_TYPES = ["multiple-choice", "essay", "true-false"] as const;

export type Difficulty = (typeof DIFFICULTIES)[number];
export type QuestionType = (typeof QUESTION_TYPES)[number];

export type GenerationParameters = {
  difficulty: Difficulty;
  questionType: QuestionType;
};

/**
 * A generated question. `type` and `difficulty` hold whatever the model
 * wrote; they are not checked against {@link QuestionType} or
 * {@link Difficulty}.
 */
export type QuestionRecord = {
  readonly id: string;
  readonly text: string;
  readonly type: string;
  readonly options?: readonly string[];
  readonly correctAnswer?: string;
  readonly explanation?: string;
  readonly difficulty: string;
  readonly basedOnNotes: readonly number[];
};

export type ConversationRole = "user" | "assistant";

export type ConversationTurn = {
  role: ConversationRole;
  content: string;
  question?: QuestionRecord;
};

export type QuizMetadata = {
  generatedAt: string;
  // Not measured. Always null so nobody mistakes it for billing data.
  tokensUsed: null;
  processingTimeMs: number;
};

export type QuizResult = {
  conversation: ConversationTurn[];
  metadata: QuizMetadata;
};

export const isDifficulty = (value: unknown): value is Difficulty =>
  DIFFICULTIES.some((difficulty) => difficulty === value);

export const isQuestionType = (value: unknown): value is QuestionType =>
  QUESTION_TYPES.some((questionType) => questionType === value);
