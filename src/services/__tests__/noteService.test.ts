import { beforeEach, describe, expect, it } from "vitest";
import { MAX_NOTE_LENGTH, NoteService } from "../noteService";
import { InMemoryNoteRepository } from "../../test/InMemoryNoteRepository";
import { InvalidNoteInputError, NoteNotFoundError } from "../../errors";

describe("NoteService", () => {
  let repo: InMemoryNoteRepository;
  let service: NoteService;

  beforeEach(() => {
    repo = new InMemoryNoteRepository();
    service = new NoteService(repo);
  });

  describe("createNote", () => {
    it("stores trimmed content", async () => {
      const note = await service.createNote({ content: "  Photosynthesis needs light.  " });

      expect(note.id).toBe(1);
      expect(note.content).toBe("Photosynthesis needs light.");
      await expect(repo.getById(1)).resolves.toMatchObject({
        content: "Photosynthesis needs light.",
      });
    });

    it("requires string content", async () => {
      await expect(service.createNote({})).rejects.toThrow("content is required");
      await expect(service.createNote({ content: 7 })).rejects.toBeInstanceOf(
        InvalidNoteInputError
      );
    });

    it("rejects blank content", async () => {
      await expect(service.createNote({ content: "   " })).rejects.toThrow(
        "content cannot be empty"
      );
    });

    it("accepts content at the length limit and rejects anything longer", async () => {
      await expect(
        service.createNote({ content: "a".repeat(MAX_NOTE_LENGTH) })
      ).resolves.toHaveProperty("id", 1);
      await expect(
        service.createNote({ content: "a".repeat(MAX_NOTE_LENGTH + 1) })
      ).rejects.toThrow("content cannot exceed 2000 characters");
    });
  });

  describe("getNoteById", () => {
    it("rejects non-positive ids without reaching the store", async () => {
      await expect(service.getNoteById(0)).rejects.toThrow("invalid note ID: 0");
      await expect(service.getNoteById(-3)).rejects.toBeInstanceOf(InvalidNoteInputError);
    });

    it("reports missing notes", async () => {
      await expect(service.getNoteById(9)).rejects.toBeInstanceOf(NoteNotFoundError);
    });
  });

  describe("getAllNotes", () => {
    it("lists newest first", async () => {
      await service.createNote({ content: "older" });
      await service.createNote({ content: "newer" });

      const notes = await service.getAllNotes();

      expect(notes.map((note) => note.content)).toEqual(["newer", "older"]);
    });
  });

  describe("updateNote", () => {
    it("replaces content and bumps updatedAt", async () => {
      const created = await service.createNote({ content: "draft" });

      const updated = await service.updateNote(created.id, { content: " final " });

      expect(updated.content).toBe("final");
      expect(updated.createdAt).toBe(created.createdAt);
      expect(updated.updatedAt > created.updatedAt).toBe(true);
    });

    it("requires the content field", async () => {
      await service.createNote({ content: "draft" });

      await expect(service.updateNote(1, {})).rejects.toThrow(
        "content field must be provided for update"
      );
    });

    it("rejects empty content", async () => {
      await service.createNote({ content: "draft" });

      await expect(service.updateNote(1, { content: "" })).rejects.toThrow(
        "content cannot be empty"
      );
    });

    it("reports missing notes", async () => {
      await expect(service.updateNote(5, { content: "x" })).rejects.toBeInstanceOf(
        NoteNotFoundError
      );
    });
  });

  describe("deleteNote", () => {
    it("removes the note", async () => {
      await service.createNote({ content: "temp" });

      await service.deleteNote(1);

      await expect(service.getNoteById(1)).rejects.toBeInstanceOf(NoteNotFoundError);
    });

    it("reports missing notes", async () => {
      await expect(service.deleteNote(1)).rejects.toThrow("note with id 1 not found");
    });
  });
});
