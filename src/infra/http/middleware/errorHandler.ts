import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { DuplicateEmailError } from '../../../domain/auth/errors.js';
import { NotFoundError, UnauthorizedError } from '../../../application/errors.js';
import type { Logger } from '../../logger.js';

/**
 * Error body for every failed request. `details` only accompanies
 * validation failures.
 */
export interface ErrorResponse {
  error: string;
  details?: Array<{ path: string; message: string }>;
}

function isBodyParseError(err: unknown): boolean {
  return (
    err instanceof SyntaxError &&
    'type' in err &&
    err.type === 'entity.parse.failed'
  );
}

/** Errors raised by body-parser and friends that are safe to show. */
function exposedHttpError(err: unknown): { status: number; message: string } | null {
  if (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500 &&
    'expose' in err &&
    err.expose === true
  ) {
    return { status: err.status, message: err.message };
  }
  return null;
}

function send(res: Response, status: number, body: ErrorResponse): void {
  res.status(status).json(body);
}

/**
 * Terminal error handler: maps known failures to their status and turns
 * anything else into a logged 500.
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof ZodError) {
      const details = err.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      }));
      send(res, 400, {
        error: details[0]?.message ?? 'Validation failed',
        details,
      });
      return;
    }

    if (isBodyParseError(err)) {
      send(res, 400, { error: 'Malformed JSON body' });
      return;
    }

    if (err instanceof DuplicateEmailError) {
      send(res, 400, { error: err.message });
      return;
    }

    if (err instanceof UnauthorizedError) {
      send(res, 401, { error: err.message });
      return;
    }

    if (err instanceof NotFoundError) {
      send(res, 404, { error: err.message });
      return;
    }

    const httpError = exposedHttpError(err);
    if (httpError) {
      send(res, httpError.status, { error: httpError.message });
      return;
    }

    logger.error({ err, method: req.method, url: req.originalUrl }, 'Unhandled error');
    send(res, 500, { error: 'Internal server error' });
  };
}
