import type { NoteStore } from '../../domain/notes/note.js';
import { NotFoundError } from '../errors.js';

export interface UpdateNoteCommand {
  userId: string;
  noteId: string;
  title?: string;
  content?: string | null;
}

export interface UpdateNoteResult {
  noteId: string;
}

export class UpdateNoteUseCase {
  constructor(private notes: NoteStore) {}

  async execute(command: UpdateNoteCommand): Promise<UpdateNoteResult> {
    const updated = await this.notes.update(command.noteId, command.userId, {
      title: command.title,
      content: command.content,
    });

    // Someone else's note looks exactly like a missing one
    if (!updated) {
      throw new NotFoundError('Note not found');
    }

    return { noteId: updated.id };
  }
}
