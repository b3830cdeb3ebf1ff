// middleware/validate.ts
import { Request } from 'express';
import { z, ZodTypeAny } from 'zod';
import logger from '../utils/logger';
import { ValidationError } from '../utils/AppError';

/**
 * Parses the query string against a Zod schema and returns the typed result.
 * Failures become a ValidationError (400) with one entry per issue.
 */
export const parseRequest = <T extends ZodTypeAny>(
  schema: T,
  req: Request
): z.output<T> => {
  const result = schema.safeParse(req.query);

  if (!result.success) {
    const details = result.error.errors.map((err) => ({
      field: err.path.join('.'),
      message: err.message,
    }));
    logger.warn(`🛡️ Validation Failed [${req.method} ${req.originalUrl}]: ${details.map((d) => d.message).join(', ')}`);
    throw new ValidationError('Invalid input data', details);
  }

  return result.data;
};
