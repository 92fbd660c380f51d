import type { NoteStore } from '../../domain/notes/note.js';

export interface CreateNoteCommand {
  userId: string;
  title: string;
  content?: string | null;
}

export interface CreateNoteResult {
  noteId: string;
}

export class CreateNoteUseCase {
  constructor(private notes: NoteStore) {}

  async execute(command: CreateNoteCommand): Promise<CreateNoteResult> {
    const note = await this.notes.insert({
      userId: command.userId,
      title: command.title,
      content: command.content ?? null,
    });

    return { noteId: note.id };
  }
}
