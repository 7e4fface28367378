import type {
  Difficulty,
  GenerationParameters,
  QuestionType,
} from "../models/quiz";

type KeywordRule<T> = {
  value: T;
  keywords: readonly string[];
};

// Rules are checked in order; the first match wins.
const DIFFICULTY_RULES: readonly KeywordRule<Difficulty>[] = [
  { value: "easy", keywords: ["easy", "simple", "basic", "beginner"] },
  { value: "hard", keywords: ["hard", "difficult", "challenging", "advanced"] },
];

const QUESTION_TYPE_RULES: readonly KeywordRule<QuestionType>[] = [
  { value: "essay", keywords: ["essay", "explain", "describe", "discuss"] },
  { value: "true-false", keywords: ["true", "false", "yes", "no"] },
];

export const DEFAULT_DIFFICULTY: Difficulty = "medium";
export const DEFAULT_QUESTION_TYPE: QuestionType = "multiple-choice";

export const containsKeyword = (text: string, keywords: readonly string[]) => {
  const lower = text.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword.toLowerCase()));
};

const matchRules = <T>(
  text: string,
  rules: readonly KeywordRule<T>[],
  fallback: T
): T => rules.find((rule) => containsKeyword(text, rule.keywords))?.value ?? fallback;

export const inferDifficulty = (text: string): Difficulty =>
  matchRules(text, DIFFICULTY_RULES, DEFAULT_DIFFICULTY);

export const inferQuestionType = (text: string): QuestionType =>
  matchRules(text, QUESTION_TYPE_RULES, DEFAULT_QUESTION_TYPE);

export const inferParameters = (lastUserText: string): GenerationParameters => ({
  difficulty: inferDifficulty(lastUserText),
  questionType: inferQuestionType(lastUserText),
});
