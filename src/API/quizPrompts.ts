export type QuizPromptConfig = {
  readonly systemPrompt: string;
  // {notes}, {difficulty} and {questionType} are substituted by buildQuizPrompt.
  readonly userPromptTemplate: string;
};

export const quizSystemPrompt = `You are a quiz generator AI. Create educational quiz questions based on the provided study notes. Generate questions that test comprehension, application, and analysis of the material. Respond with valid JSON in this exact format:
{
  "question": "The question text here",
  "type": "multiple-choice",
  "options": ["A) Option 1", "B) Option 2", "C) Option 3", "D) Option 4"],
  "correctAnswer": "A",
  "explanation": "Explanation of why this is correct",
  "difficulty": "medium"
}

For essay questions, omit the options and correctAnswer fields. Valid difficulty levels are: easy, medium, hard. Valid types are: multiple-choice, essay, true-false.`;

export const quizUserPromptTemplate = `Based on these study notes:

{notes}

Generate a quiz question. Make it {difficulty} difficulty and format it as {questionType}. The question should test understanding of the key concepts from the notes.`;

export const defaultQuizPromptConfig: QuizPromptConfig = Object.freeze({
  systemPrompt: quizSystemPrompt,
  userPromptTemplate: quizUserPromptTemplate,
});

const fillTemplate = (template: string, values: Record<string, string>) =>
  template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match
  );

export const buildQuizPrompt = (
  notes: string,
  difficulty: string,
  questionType: string,
  config: QuizPromptConfig = defaultQuizPromptConfig
): string => {
  const userPrompt = fillTemplate(config.userPromptTemplate, {
    notes,
    difficulty,
    questionType,
  });
  return `${config.systemPrompt}\n\n${userPrompt}`;
};
