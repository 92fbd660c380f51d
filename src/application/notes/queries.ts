import type { Note, NoteStore } from '../../domain/notes/note.js';
import { NotFoundError } from '../errors.js';

/**
 * Read side for notes. Everything is filtered by owner.
 */
export class NoteQueries {
  constructor(private notes: NoteStore) {}

  async listNotes(userId: string): Promise<Note[]> {
    return this.notes.listByUser(userId);
  }

  async getNote(noteId: string, userId: string): Promise<Note> {
    const note = await this.notes.findForUser(noteId, userId);
    if (!note) {
      throw new NotFoundError('Note not found');
    }
    return note;
  }
}
