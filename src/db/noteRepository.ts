import type { SupabaseClient } from "@supabase/supabase-js";
import type { Note } from "../models/note";
import { NoteNotFoundError } from "../errors";

export interface NoteRepository {
  create(content: string): Promise<Note>;
  getById(id: number): Promise<Note>;
  // Newest first.
  getAll(): Promise<Note[]>;
  update(id: number, content: string): Promise<Note>;
  delete(id: number): Promise<void>;
}

export type NoteRow = {
  id: number;
  content: string;
  created_at: string;
  updated_at: string;
};

const NOTE_COLUMNS = "id, content, created_at, updated_at";

export const toNote = (row: NoteRow): Note => ({
  id: Number(row.id),
  content: row.content,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

export class SupabaseNoteRepository implements NoteRepository {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly table = "notes"
  ) {}

  async create(content: string): Promise<Note> {
    const { data, error } = await this.supabase
      .from(this.table)
      .insert({ content })
      .select(NOTE_COLUMNS)
      .single();

    if (error || !data) {
      throw new Error(`failed to create note: ${error?.message ?? "no row returned"}`);
    }

    return toNote(data);
  }

  async getById(id: number): Promise<Note> {
    const { data, error } = await this.supabase
      .from(this.table)
      .select(NOTE_COLUMNS)
      .eq("id", id)
      .maybeSingle();

    if (error) {
      throw new Error(`failed to get note: ${error.message}`);
    }
    if (!data) {
      throw new NoteNotFoundError(id);
    }

    return toNote(data);
  }

  async getAll(): Promise<Note[]> {
    const { data, error } = await this.supabase
      .from(this.table)
      .select(NOTE_COLUMNS)
      .order("created_at", { ascending: false });

    if (error) {
      throw new Error(`failed to query notes: ${error.message}`);
    }

    return (data ?? []).map(toNote);
  }

  async update(id: number, content: string): Promise<Note> {
    const { data, error } = await this.supabase
      .from(this.table)
      .update({ content, updated_at: new Date().toISOString() })
      .eq("id", id)
      .select(NOTE_COLUMNS)
      .maybeSingle();

    if (error) {
      throw new Error(`failed to update note: ${error.message}`);
    }
    if (!data) {
      throw new NoteNotFoundError(id);
    }

    return toNote(data);
  }

  async delete(id: number): Promise<void> {
    const { data, error } = await this.supabase
      .from(this.table)
      .delete()
      .eq("id", id)
      .select("id");

    if (error) {
      throw new Error(`failed to delete note: ${error.message}`);
    }
    if (!data || data.length === 0) {
      throw new NoteNotFoundError(id);
    }
  }
}
