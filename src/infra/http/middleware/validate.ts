import { Request, Response, NextFunction } from 'express';
import { ZodSchema, ZodError } from 'zod';
import { validationError } from '../envelope.js';

export interface ValidationSchemas {
  body?: ZodSchema;
  params?: ZodSchema;
}

/**
 * Zod validation middleware.
 * Validates request body and params against the provided schemas.
 */
export function validate(schemas: ValidationSchemas) {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
      }
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      next();
    } catch (err) {
      if (err instanceof ZodError) {
        res.status(400).json(validationError(err));
        return;
      }
      next(err);
    }
  };
}
