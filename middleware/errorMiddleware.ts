// middleware/errorMiddleware.ts
import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';
import AppError, { RateLimitedError, ValidationError } from '../utils/AppError';

interface ErrorBody {
  status: 'fail' | 'error';
  code: string;
  message: string;
  details?: ValidationError['details'];
  retryAfter?: number;
  stack?: string;
}

// Errors raised by Express or its parsers carry an HTTP status (e.g. 400, 413)
const clientStatusOf = (err: unknown): number | undefined => {
  if (typeof err !== 'object' || err === null) return undefined;
  const status = 'statusCode' in err ? err.statusCode : 'status' in err ? err.status : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
};

const toAppError = (err: unknown): AppError => {
  if (err instanceof AppError) return err;
  const clientStatus = clientStatusOf(err);
  if (clientStatus !== undefined) {
    const message = err instanceof Error && err.message ? err.message : 'Bad Request';
    return new AppError(message, clientStatus, 'BAD_REQUEST');
  }
  return new AppError('Internal Server Error', 500, 'INTERNAL_ERROR');
};

// Express recognizes error handlers by their four parameters, so `next` stays even though unused
const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  // 1. Normalize
  const error = toAppError(err);

  // 2. Log the Error
  // Operational and client errors are expected; anything else is a bug
  if (error.statusCode < 500 || err instanceof AppError) {
    logger.warn(`⚠️ Operational Error [${req.method} ${req.originalUrl}]: ${error.message}`);
  } else {
    logger.error(`🔥 Unexpected Error [${req.method} ${req.originalUrl}]:`);
    logger.error(err);
  }

  const body: ErrorBody = {
    status: error.status,
    code: error.code,
    message: error.message,
  };

  if (error instanceof ValidationError && error.details.length > 0) {
    body.details = error.details;
  }

  if (error instanceof RateLimitedError) {
    res.setHeader('Retry-After', String(error.retryAfterSeconds));
    body.retryAfter = error.retryAfterSeconds;
  }

  // Only show stack in development
  if (process.env.NODE_ENV === 'development' && err instanceof Error) {
    body.stack = err.stack;
  }

  // 3. Send Response
  res.status(error.statusCode).json(body);
};

export { errorHandler };
