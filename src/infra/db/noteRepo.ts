import type { Pool } from 'pg';
import type { NewNote, Note, NoteChanges, NoteStore } from '../../domain/notes/note.js';

interface NoteRow {
  id: string;
  user_id: string;
  title: string;
  content: string | null;
  created_at: Date;
  updated_at: Date;
}

const NOTE_COLUMNS = 'id, user_id, title, content, created_at, updated_at';

function toNote(row: NoteRow): Note {
  return {
    id: row.id,
    userId: row.user_id,
    title: row.title,
    content: row.content,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class NoteRepo implements NoteStore {
  constructor(private readonly pool: Pool) {}

  async insert(note: NewNote): Promise<Note> {
    const result = await this.pool.query<NoteRow>(
      `INSERT INTO notes (user_id, title, content)
       VALUES ($1, $2, $3)
       RETURNING ${NOTE_COLUMNS}`,
      [note.userId, note.title, note.content]
    );

    return toNote(result.rows[0]);
  }

  async listByUser(userId: string): Promise<Note[]> {
    const result = await this.pool.query<NoteRow>(
      `SELECT ${NOTE_COLUMNS}
       FROM notes
       WHERE user_id = $1
       ORDER BY created_at ASC, id ASC`,
      [userId]
    );

    return result.rows.map(toNote);
  }

  async findForUser(noteId: string, userId: string): Promise<Note | null> {
    const result = await this.pool.query<NoteRow>(
      `SELECT ${NOTE_COLUMNS} FROM notes WHERE id = $1 AND user_id = $2`,
      [noteId, userId]
    );

    const row = result.rows[0];
    return row ? toNote(row) : null;
  }

  async update(noteId: string, userId: string, changes: NoteChanges): Promise<Note | null> {
    // $3 and $5 flag which columns to touch, so `content: null` can clear a note
    const result = await this.pool.query<NoteRow>(
      `UPDATE notes
       SET title = CASE WHEN $3 THEN $4 ELSE title END,
           content = CASE WHEN $5 THEN $6 ELSE content END,
           updated_at = NOW()
       WHERE id = $1 AND user_id = $2
       RETURNING ${NOTE_COLUMNS}`,
      [
        noteId,
        userId,
        changes.title !== undefined,
        changes.title ?? null,
        changes.content !== undefined,
        changes.content ?? null,
      ]
    );

    const row = result.rows[0];
    return row ? toNote(row) : null;
  }

  async delete(noteId: string, userId: string): Promise<boolean> {
    const result = await this.pool.query(
      'DELETE FROM notes WHERE id = $1 AND user_id = $2',
      [noteId, userId]
    );

    return (result.rowCount ?? 0) > 0;
  }
}
