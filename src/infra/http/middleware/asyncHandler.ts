import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Adapt an async route body to Express 4, which ignores returned promises:
 * a rejection is handed to next() so errorHandler can map it.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
