import type { NoteStore } from '../../domain/notes/note.js';
import { NotFoundError } from '../errors.js';

export interface DeleteNoteCommand {
  userId: string;
  noteId: string;
}

export interface DeleteNoteResult {
  noteId: string;
}

export class DeleteNoteUseCase {
  constructor(private notes: NoteStore) {}

  async execute(command: DeleteNoteCommand): Promise<DeleteNoteResult> {
    const deleted = await this.notes.delete(command.noteId, command.userId);
    if (!deleted) {
      throw new NotFoundError('Note not found');
    }

    return { noteId: command.noteId };
  }
}
