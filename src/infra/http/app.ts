import express from 'express';
import type { TokenSettings } from '../../config.js';
import { LoginUseCase } from '../../application/auth/login.js';
import { RegisterUseCase } from '../../application/auth/register.js';
import { IdentityResolver } from '../../application/auth/resolveIdentity.js';
import { TokenService, type Clock } from '../../application/auth/tokenService.js';
import { CreateNoteUseCase } from '../../application/notes/createNote.js';
import { DeleteNoteUseCase } from '../../application/notes/deleteNote.js';
import { NoteQueries } from '../../application/notes/queries.js';
import { UpdateNoteUseCase } from '../../application/notes/updateNote.js';
import { PasswordHasher } from '../../domain/auth/password.js';
import type { UserStore } from '../../domain/auth/user.js';
import type { NoteStore } from '../../domain/notes/note.js';
import { describeError, logger } from '../logger.js';
import { authMiddleware } from './middleware/auth.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createAuthRoutes } from './routes/auth.js';
import { createHomeRoutes } from './routes/home.js';
import { createNoteRoutes } from './routes/notes.js';
import { createSwaggerRoutes } from './routes/swagger.js';

export interface AppDeps {
  token: TokenSettings;
  users: UserStore;
  notes: NoteStore;
  passwords?: PasswordHasher;
  clock?: Clock;
  /** Resolves when the database answers; used by /healthz. */
  checkDatabase?: () => Promise<unknown>;
}

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Wire use cases to their stores and mount every route. No listening, no
 * process state: server.ts does that, tests call this directly.
 */
export function createApp(deps: AppDeps): express.Express {
  const passwords = deps.passwords ?? new PasswordHasher();
  const tokens = new TokenService(deps.token, deps.clock);
  const resolver = new IdentityResolver(tokens, deps.users);
  const auth = authMiddleware(resolver);

  const app = express();
  app.disable('x-powered-by');
  app.use(express.json());
  // /login takes an OAuth2-style password form
  app.use(express.urlencoded({ extended: false }));

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res) => {
    const check = deps.checkDatabase ?? (() => Promise.resolve());
    withTimeout(check(), 2000)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch((error: unknown) => {
        logger.warn('http', 'Health check failed', describeError(error));
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      });
  });

  app.use(createSwaggerRoutes());

  app.use(
    createAuthRoutes({
      registerUseCase: new RegisterUseCase(deps.users, passwords),
      loginUseCase: new LoginUseCase(deps.users, passwords, tokens),
    })
  );

  app.use(createHomeRoutes(auth));

  app.use(
    '/notes',
    createNoteRoutes(auth, {
      createNoteUseCase: new CreateNoteUseCase(deps.notes),
      updateNoteUseCase: new UpdateNoteUseCase(deps.notes),
      deleteNoteUseCase: new DeleteNoteUseCase(deps.notes),
      queries: new NoteQueries(deps.notes),
    })
  );

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
