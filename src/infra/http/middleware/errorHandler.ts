import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AccountError, ConflictError, NotFoundError } from '../../../application/errors.js';
import { error, failure, validationError } from '../envelope.js';

function httpStatusFor(err: AccountError): number {
  if (err instanceof NotFoundError) {
    return 404;
  }
  if (err instanceof ConflictError) {
    return 409;
  }
  // IncorrectPasswordError, UnauthorizedError
  return 401;
}

/**
 * Errors raised by express.json() before a route runs. They carry the raw
 * request text in `body`, so they must never be logged.
 */
interface BodyParserError extends Error {
  type: string;
  status: number;
}

function isBodyParserError(err: Error): err is BodyParserError {
  return (
    'type' in err &&
    typeof err.type === 'string' &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    res.status(400).json(validationError(err));
    return;
  }

  if (isBodyParserError(err)) {
    const message =
      err.type === 'entity.parse.failed' ? 'Malformed JSON body' : 'Invalid request body';
    res.status(err.status).json(error(message));
    return;
  }

  if (err instanceof AccountError) {
    if (err.category === 'Failure') {
      res.status(httpStatusFor(err)).json(failure(err.message));
      return;
    }

    // Misuse or tampering. Never log the path: it may hold a token.
    console.warn(`${err.name} (${req.method}): ${err.message}`);
    res.status(httpStatusFor(err)).json(error(err.message));
    return;
  }

  console.error('Error:', err);
  res.status(500).json(error('Internal server error'));
}
