/**
 * A personal text note. Every note belongs to exactly one user and is only
 * ever read or written through that user's id.
 */
export interface Note {
  readonly id: string;
  readonly userId: string;
  readonly title: string;
  readonly content: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export const NOTE_TITLE_MAX = 200;
export const NOTE_CONTENT_MAX = 500;

export interface NewNote {
  userId: string;
  title: string;
  content: string | null;
}

/** Fields left undefined are kept as they are; `content: null` clears it. */
export interface NoteChanges {
  title?: string;
  content?: string | null;
}

export interface NoteStore {
  insert(note: NewNote): Promise<Note>;
  listByUser(userId: string): Promise<Note[]>;
  findForUser(noteId: string, userId: string): Promise<Note | null>;
  /** Returns null when no note with that id belongs to the user. */
  update(noteId: string, userId: string, changes: NoteChanges): Promise<Note | null>;
  /** Returns false when no note with that id belongs to the user. */
  delete(noteId: string, userId: string): Promise<boolean>;
}
