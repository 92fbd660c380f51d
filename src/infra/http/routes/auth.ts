import { Router } from 'express';
import { z } from 'zod';
import type { RegisterUseCase } from '../../../application/auth/register.js';
import type { LoginUseCase } from '../../../application/auth/login.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /signup:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     description: Does not log the user in; call /login afterwards.
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [user_name, user_email, password]
 *             properties:
 *               user_name: { type: string, maxLength: 100 }
 *               user_email: { type: string, format: email }
 *               password: { type: string, minLength: 8 }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 message: { type: string, example: User registered successfully }
 *       400:
 *         description: Validation error, or email already registered (code CONFLICT)
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /login:
 *   post:
 *     tags: [Auth]
 *     summary: Exchange email and password for a bearer token
 *     requestBody:
 *       required: true
 *       content:
 *         application/x-www-form-urlencoded:
 *           schema:
 *             type: object
 *             required: [username, password]
 *             properties:
 *               username: { type: string, description: The account email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 access_token: { type: string }
 *                 token_type: { type: string, example: bearer }
 *                 user_name: { type: string }
 *       400:
 *         description: Invalid username or password
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

const signupBodySchema = z.object({
  user_name: z.string().trim().min(1).max(100),
  user_email: z.string().trim().email().max(120),
  password: z.string().min(8).max(256),
});

const loginBodySchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});

// validate() has already replaced req.body with these parsed shapes
type SignupBody = z.infer<typeof signupBodySchema>;
type LoginBody = z.infer<typeof loginBodySchema>;

export interface AuthRouteDeps {
  registerUseCase: RegisterUseCase;
  loginUseCase: LoginUseCase;
}

export function createAuthRoutes({ registerUseCase, loginUseCase }: AuthRouteDeps) {
  const router = Router();

  router.post(
    '/signup',
    validate({ body: signupBodySchema }),
    asyncHandler(async (req, res) => {
      const body: SignupBody = req.body;
      const result = await registerUseCase.execute({
        name: body.user_name,
        email: body.user_email,
        password: body.password,
      });
      if (!result.ok) {
        throw result.error;
      }
      res.status(201).json({ message: 'User registered successfully' });
    })
  );

  router.post(
    '/login',
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body: LoginBody = req.body;
      const result = await loginUseCase.execute({
        email: body.username,
        password: body.password,
      });
      if (!result.ok) {
        throw result.error;
      }
      res.status(200).json({
        access_token: result.value.accessToken,
        token_type: result.value.tokenType,
        user_name: result.value.userName,
      });
    })
  );

  return router;
}
