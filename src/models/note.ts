export type NoteContent = {
  id: number;
  content: string;
};

export type Note = NoteContent & {
  createdAt: string;
  updatedAt: string;
};

export type CreateNoteRequest = {
  content?: unknown;
};

export type UpdateNoteRequest = {
  content?: unknown;
};
