import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  ConflictError,
  InvalidCredentialsError,
  NotFoundError,
  UnauthorizedError,
} from '../../../application/errors.js';
import { describeError, logger } from '../../logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

function send(res: Response, status: number, body: ErrorResponse): void {
  res.status(status).json(body);
}

/** express.json()/urlencoded() reject unparseable bodies with this shape. */
function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    send(res, 400, {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    });
    return;
  }

  if (isBodyParseError(err)) {
    send(res, 400, { code: 'VALIDATION_ERROR', message: 'Malformed request body' });
    return;
  }

  if (err instanceof InvalidCredentialsError) {
    send(res, 400, { code: 'INVALID_CREDENTIALS', message: err.message });
    return;
  }

  if (err instanceof UnauthorizedError) {
    res.setHeader('WWW-Authenticate', 'Bearer');
    send(res, 401, { code: 'UNAUTHORIZED', message: err.message });
    return;
  }

  if (err instanceof ConflictError) {
    send(res, 400, { code: 'CONFLICT', message: err.message });
    return;
  }

  if (err instanceof NotFoundError) {
    send(res, 404, { code: 'NOT_FOUND', message: err.message });
    return;
  }

  // Hashing, signing, verification and store failures all end here.
  // The cause goes to the log, never to the client.
  logger.error('http', 'Unhandled error', {
    method: req.method,
    path: req.path,
    ...describeError(err),
    cause: err.cause instanceof Error ? err.cause.message : undefined,
  });
  send(res, 500, { code: 'INTERNAL_ERROR', message: 'Internal server error' });
}
