import type { ZodError } from 'zod';

export type ResponseStatus = 'Success' | 'Failure' | 'Error';

/**
 * Body shape shared by every API response.
 */
export interface Envelope<T> {
  status: ResponseStatus;
  data: T;
  details?: object;
}

export function success<T>(data: T): Envelope<T> {
  return { status: 'Success', data };
}

export function failure(message: string): Envelope<string> {
  return { status: 'Failure', data: message };
}

export function error(message: string, details?: object): Envelope<string> {
  return details ? { status: 'Error', data: message, details } : { status: 'Error', data: message };
}

export function validationError(err: ZodError): Envelope<string> {
  return error('Validation failed', {
    issues: err.errors.map((e) => ({
      path: e.path.join('.'),
      message: e.message,
    })),
  });
}
