import { Router, type RequestHandler } from 'express';
import { requireIdentity } from '../middleware/auth.js';

/**
 * @openapi
 * /:
 *   post:
 *     tags: [Home]
 *     summary: Greet the logged-in user
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: Greeting
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 message: { type: string, example: Good Morning Ann! }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /me:
 *   get:
 *     tags: [Home]
 *     summary: The identity behind the bearer token
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: Resolved identity
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 id: { type: string, format: uuid }
 *                 name: { type: string }
 *                 email: { type: string, format: email }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */
export function createHomeRoutes(auth: RequestHandler) {
  const router = Router();

  router.post('/', auth, (req, res) => {
    const { name } = requireIdentity(req);
    res.json({ message: `Good Morning ${name}!` });
  });

  router.get('/me', auth, (req, res) => {
    const { id, name, email } = requireIdentity(req);
    res.json({ id, name, email });
  });

  return router;
}
