import type { NoteRepository } from "../db/noteRepository";
import type { NoteContent } from "../models/note";
import { NoContentFoundError } from "../errors";

export type NoteSource = Pick<NoteRepository, "getAll" | "getById">;

export type SkippedNote = {
  id: number;
  error: unknown;
};

export type ResolvedNotes = {
  notes: NoteContent[];
  skipped: SkippedNote[];
};

export const NOTE_SEPARATOR = "\n\n---\n\n";

export const formatNote = (note: NoteContent) =>
  `Note ${note.id}: ${note.content}`;

/**
 * Fetches each id in order. A failed fetch lands in `skipped` and never
 * stops the fold.
 */
export const resolveNotesById = async (
  source: NoteSource,
  noteIds: readonly number[]
): Promise<ResolvedNotes> => {
  const result: ResolvedNotes = { notes: [], skipped: [] };

  for (const id of noteIds) {
    try {
      const note = await source.getById(id);
      result.notes.push({ id: note.id, content: note.content });
    } catch (error) {
      result.skipped.push({ id, error });
    }
  }

  return result;
};

export const aggregateNoteContent = async (
  source: NoteSource,
  noteIds: readonly number[]
): Promise<string> => {
  let notes: NoteContent[];

  if (noteIds.length === 0) {
    console.log("[INFO] No specific note IDs provided, fetching all notes");
    notes = await source.getAll();
  } else {
    console.log(`[INFO] Fetching ${noteIds.length} specific notes by ID`);
    const resolved = await resolveNotesById(source, noteIds);
    for (const { id, error } of resolved.skipped) {
      console.error(`[ERROR] Failed to get note with ID ${id}:`, error);
    }
    notes = resolved.notes;
  }

  if (notes.length === 0) {
    console.error("[ERROR] No notes found for quiz generation");
    throw new NoContentFoundError();
  }

  const content = notes.map(formatNote).join(NOTE_SEPARATOR);
  console.log(
    `[INFO] Combined ${notes.length} notes into content with ${content.length} characters`
  );
  return content;
};
