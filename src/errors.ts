export type QuizErrorCode =
  | "INVALID_CONVERSATION"
  | "NO_CONTENT_FOUND"
  | "MODEL_CALL_FAILED"
  | "MALFORMED_RESPONSE"
  | "MISSING_REQUIRED_FIELD";

export class QuizError extends Error {
  readonly code: QuizErrorCode;
  /** Pipeline stage that raised the error, set once it leaves that stage. */
  stage?: string;

  constructor(code: QuizErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Error message prefixed with the failing stage, when one is known. */
export const describeQuizFailure = (err: unknown): string => {
  if (err instanceof QuizError && err.stage) {
    return `${err.stage}: ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
};

export class InvalidConversationError extends QuizError {
  constructor(message: string) {
    super("INVALID_CONVERSATION", message);
  }
}

export class NoContentFoundError extends QuizError {
  constructor(message = "no notes found") {
    super("NO_CONTENT_FOUND", message);
  }
}

export class ModelCallFailedError extends QuizError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("MODEL_CALL_FAILED", `LLM generation failed: ${detail}`, { cause });
  }
}

export class MalformedResponseError extends QuizError {
  constructor(message: string, options?: ErrorOptions) {
    super("MALFORMED_RESPONSE", message, options);
  }
}

export class MissingRequiredFieldError extends QuizError {
  readonly field: string;

  constructor(field: string) {
    super("MISSING_REQUIRED_FIELD", `${field} field is required`);
    this.field = field;
  }
}

export class NoteNotFoundError extends Error {
  readonly noteId: number;

  constructor(noteId: number) {
    super(`note with id ${noteId} not found`);
    this.name = "NoteNotFoundError";
    this.noteId = noteId;
  }
}

export class InvalidNoteInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidNoteInputError";
  }
}
