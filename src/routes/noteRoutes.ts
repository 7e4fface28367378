import express from "express";
import type { Response } from "express";
import type { NoteService } from "../services/noteService";
import { InvalidNoteInputError, NoteNotFoundError } from "../errors";

export const parseNoteId = (raw: string): number | null => {
  if (!/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
};

const sendNoteError = (res: Response, err: unknown, fallback: string) => {
  if (err instanceof NoteNotFoundError) {
    return res.status(404).json({ error: err.message });
  }
  if (err instanceof InvalidNoteInputError) {
    return res.status(400).json({ error: err.message });
  }
  console.error(`[ERROR] ${fallback}:`, err);
  return res.status(500).json({ error: fallback });
};

export const createNoteRouter = (noteService: NoteService) => {
  const router = express.Router();

  router.post("/", async (req, res) => {
    try {
      const note = await noteService.createNote(req.body ?? {});
      return res.status(201).json(note);
    } catch (e) {
      return sendNoteError(res, e, "Failed to create note");
    }
  });

  router.get("/", async (_req, res) => {
    try {
      const notes = await noteService.getAllNotes();
      return res.json(notes);
    } catch (e) {
      return sendNoteError(res, e, "Failed to retrieve notes");
    }
  });

  router.get("/:id", async (req, res) => {
    const id = parseNoteId(req.params.id);
    if (id === null) {
      return res.status(400).json({ error: "Invalid note ID" });
    }

    try {
      const note = await noteService.getNoteById(id);
      return res.json(note);
    } catch (e) {
      return sendNoteError(res, e, "Failed to retrieve note");
    }
  });

  router.put("/:id", async (req, res) => {
    const id = parseNoteId(req.params.id);
    if (id === null) {
      return res.status(400).json({ error: "Invalid note ID" });
    }

    try {
      const note = await noteService.updateNote(id, req.body ?? {});
      return res.json(note);
    } catch (e) {
      return sendNoteError(res, e, "Failed to update note");
    }
  });

  router.delete("/:id", async (req, res) => {
    const id = parseNoteId(req.params.id);
    if (id === null) {
      return res.status(400).json({ error: "Invalid note ID" });
    }

    try {
      await noteService.deleteNote(id);
      return res.status(204).end();
    } catch (e) {
      return sendNoteError(res, e, "Failed to delete note");
    }
  });

  return router;
};
