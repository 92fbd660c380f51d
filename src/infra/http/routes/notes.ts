import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import type { CreateNoteUseCase } from '../../../application/notes/createNote.js';
import type { UpdateNoteUseCase } from '../../../application/notes/updateNote.js';
import type { DeleteNoteUseCase } from '../../../application/notes/deleteNote.js';
import type { NoteQueries } from '../../../application/notes/queries.js';
import { NOTE_CONTENT_MAX, NOTE_TITLE_MAX, type Note } from '../../../domain/notes/note.js';
import { requireIdentity } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * components:
 *   schemas:
 *     Note:
 *       type: object
 *       properties:
 *         note_id: { type: string, format: uuid }
 *         user_id: { type: string, format: uuid }
 *         note_title: { type: string }
 *         note_content: { type: string, nullable: true }
 *         created_on: { type: string, format: date-time }
 *         last_update: { type: string, format: date-time }
 *
 * /notes:
 *   post:
 *     tags: [Notes]
 *     summary: Create a note
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [note_title]
 *             properties:
 *               note_title: { type: string, maxLength: 200 }
 *               note_content: { type: string, maxLength: 500, nullable: true }
 *     responses:
 *       201: { description: Created }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   get:
 *     tags: [Notes]
 *     summary: List the caller's notes, oldest first
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/Note' }
 *
 * /notes/{id}:
 *   parameters:
 *     - in: path
 *       name: id
 *       required: true
 *       schema: { type: string, format: uuid }
 *   get:
 *     tags: [Notes]
 *     summary: Fetch one note
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Note' }
 *       404:
 *         description: No such note for this user
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   put:
 *     tags: [Notes]
 *     summary: Change a note's title and/or content
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               note_title: { type: string, maxLength: 200 }
 *               note_content: { type: string, maxLength: 500, nullable: true }
 *     responses:
 *       200: { description: Updated }
 *       404:
 *         description: No such note for this user
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Notes]
 *     summary: Delete a note
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: Deleted }
 *       404:
 *         description: No such note for this user
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const noteParamsSchema = z.object({
  id: z.string().uuid(),
});

const createNoteBodySchema = z.object({
  note_title: z.string().trim().min(1).max(NOTE_TITLE_MAX),
  note_content: z.string().max(NOTE_CONTENT_MAX).nullable().optional(),
});

const updateNoteBodySchema = z
  .object({
    note_title: z.string().trim().min(1).max(NOTE_TITLE_MAX).optional(),
    note_content: z.string().max(NOTE_CONTENT_MAX).nullable().optional(),
  })
  .refine((body) => body.note_title !== undefined || body.note_content !== undefined, {
    message: 'Provide note_title or note_content',
  });

// validate() has already replaced req.body with these parsed shapes
type CreateNoteBody = z.infer<typeof createNoteBodySchema>;
type UpdateNoteBody = z.infer<typeof updateNoteBodySchema>;

function toNoteResponse(note: Note) {
  return {
    note_id: note.id,
    user_id: note.userId,
    note_title: note.title,
    note_content: note.content,
    created_on: note.createdAt.toISOString(),
    last_update: note.updatedAt.toISOString(),
  };
}

export interface NoteRouteDeps {
  createNoteUseCase: CreateNoteUseCase;
  updateNoteUseCase: UpdateNoteUseCase;
  deleteNoteUseCase: DeleteNoteUseCase;
  queries: NoteQueries;
}

export function createNoteRoutes(auth: RequestHandler, deps: NoteRouteDeps) {
  const router = Router();

  // All routes require authentication
  router.use(auth);

  router.post(
    '/',
    validate({ body: createNoteBodySchema }),
    asyncHandler(async (req, res) => {
      const { id: userId } = requireIdentity(req);
      const body: CreateNoteBody = req.body;
      const result = await deps.createNoteUseCase.execute({
        userId,
        title: body.note_title,
        content: body.note_content,
      });
      res.status(201).json({ message: 'Note created successfully', note_id: result.noteId });
    })
  );

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const { id: userId } = requireIdentity(req);
      const notes = await deps.queries.listNotes(userId);
      res.json(notes.map(toNoteResponse));
    })
  );

  router.get(
    '/:id',
    validate({ params: noteParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id: userId } = requireIdentity(req);
      const { id } = req.params;
      const note = await deps.queries.getNote(id, userId);
      res.json(toNoteResponse(note));
    })
  );

  router.put(
    '/:id',
    validate({ params: noteParamsSchema, body: updateNoteBodySchema }),
    asyncHandler(async (req, res) => {
      const { id: userId } = requireIdentity(req);
      const { id } = req.params;
      const body: UpdateNoteBody = req.body;
      const result = await deps.updateNoteUseCase.execute({
        userId,
        noteId: id,
        title: body.note_title,
        content: body.note_content,
      });
      res.json({ message: 'Note updated successfully', note_id: result.noteId });
    })
  );

  router.delete(
    '/:id',
    validate({ params: noteParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id: userId } = requireIdentity(req);
      const { id } = req.params;
      const result = await deps.deleteNoteUseCase.execute({ userId, noteId: id });
      res.json({ message: 'Note deleted successfully', note_id: result.noteId });
    })
  );

  return router;
}
