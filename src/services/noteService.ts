import type { NoteRepository } from "../db/noteRepository";
import type { CreateNoteRequest, Note, UpdateNoteRequest } from "../models/note";
import { InvalidNoteInputError } from "../errors";

export const MAX_NOTE_LENGTH = 2000;

const assertValidId = (id: number) => {
  if (!Number.isInteger(id) || id <= 0) {
    throw new InvalidNoteInputError(`invalid note ID: ${id}`);
  }
};

const normalizeContent = (content: unknown): string => {
  if (typeof content !== "string") {
    throw new InvalidNoteInputError("content is required");
  }

  const trimmed = content.trim();
  if (trimmed === "") {
    throw new InvalidNoteInputError("content cannot be empty");
  }
  if (trimmed.length > MAX_NOTE_LENGTH) {
    throw new InvalidNoteInputError(
      `content cannot exceed ${MAX_NOTE_LENGTH} characters`
    );
  }

  return trimmed;
};

export class NoteService {
  constructor(private readonly repo: NoteRepository) {}

  async createNote(req: CreateNoteRequest): Promise<Note> {
    const content = normalizeContent(req.content);
    return this.repo.create(content);
  }

  async getNoteById(id: number): Promise<Note> {
    assertValidId(id);
    return this.repo.getById(id);
  }

  async getAllNotes(): Promise<Note[]> {
    return this.repo.getAll();
  }

  async updateNote(id: number, req: UpdateNoteRequest): Promise<Note> {
    assertValidId(id);
    if (req.content === undefined) {
      throw new InvalidNoteInputError("content field must be provided for update");
    }
    const content = normalizeContent(req.content);
    return this.repo.update(id, content);
  }

  async deleteNote(id: number): Promise<void> {
    assertValidId(id);
    await this.repo.delete(id);
  }
}
